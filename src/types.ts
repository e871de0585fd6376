/**
 * Core types for the droplet inventory
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
