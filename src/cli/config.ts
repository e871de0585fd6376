/**
 * CLI Configuration
 *
 * Persistent settings stored in ~/.config/droplet-inventory/config.json (XDG standard).
 * Supports a custom location via --config-file or DIGITALOCEAN_INVENTORY_CONFIG.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { SettingsError } from './errors'

/**
 * All settings the config file may hold.
 */
export interface Config {
  /** DigitalOcean client id */
  clientId?: string | undefined
  /** DigitalOcean API key */
  apiKey?: string | undefined
  /** Directory for the cache artifacts */
  cachePath?: string | undefined
  /** Seconds before the cache is considered stale */
  cacheMaxAge?: number | undefined
}

/**
 * Get XDG config directory path.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'droplet-inventory')
}

/**
 * Get the config file path.
 * Priority: configFile arg > DIGITALOCEAN_INVENTORY_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.DIGITALOCEAN_INVENTORY_CONFIG) {
    return process.env.DIGITALOCEAN_INVENTORY_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(
  source: Record<string, unknown>,
  key: keyof Config,
  path: string
): string | undefined {
  const raw = source[key]
  if (raw === undefined || raw === null) return undefined
  if (typeof raw !== 'string') {
    throw new SettingsError(`Config key ${key} in ${path} must be a string`)
  }
  return raw
}

function readNumber(
  source: Record<string, unknown>,
  key: keyof Config,
  path: string
): number | undefined {
  const raw = source[key]
  if (raw === undefined || raw === null) return undefined
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new SettingsError(`Config key ${key} in ${path} must be a number`)
  }
  return raw
}

/**
 * Check parsed JSON against the Config shape. Unknown keys are ignored.
 */
export function parseConfig(value: unknown, path: string): Config {
  if (!isRecord(value)) {
    throw new SettingsError(`Config file ${path} must contain a JSON object`)
  }
  return {
    clientId: readString(value, 'clientId', path),
    apiKey: readString(value, 'apiKey', path),
    cachePath: readString(value, 'cachePath', path),
    cacheMaxAge: readNumber(value, 'cacheMaxAge', path)
  }
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist. Unparseable content is an error.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new SettingsError(`Could not parse config file ${path}: ${message}`)
  }
  return parseConfig(parsed, path)
}
