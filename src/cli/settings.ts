/**
 * Settings Resolution
 *
 * Assembles one Settings value from the config file, environment variables
 * and CLI arguments, in that order of increasing priority.
 */

import { type Config, loadConfig } from './config'
import { MissingCredentialsError, SettingsError } from './errors'
import type { Logger } from './logger'

/** Settings as they arrive from the command line (all optional, all strings) */
export interface SettingsArgs {
  clientId?: string | undefined
  apiKey?: string | undefined
  cachePath?: string | undefined
  cacheMaxAge?: string | undefined
}

export interface Settings {
  readonly clientId: string
  readonly apiKey: string
  readonly cachePath: string
  /** Seconds */
  readonly cacheMaxAge: number
}

type SettingSource = 'config' | 'env' | 'argument' | 'default'

interface Resolved<T> {
  readonly value: T
  readonly source: SettingSource
}

interface MergeInput {
  readonly config?: Config | null | undefined
  readonly env?: NodeJS.ProcessEnv | undefined
  readonly args?: SettingsArgs | undefined
}

interface ResolveOptions {
  /** CLI-supplied values */
  args?: SettingsArgs | undefined
  /** Custom config file path */
  configFile?: string | undefined
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined
  /** Logger for output */
  logger?: Logger | undefined
}

export const DEFAULT_CACHE_PATH = '.'
export const DEFAULT_CACHE_MAX_AGE = 0

/**
 * Last non-empty candidate wins; candidates are listed lowest priority first.
 */
function pick<T>(
  candidates: ReadonlyArray<readonly [T | undefined, SettingSource]>
): Resolved<T> | undefined {
  let resolved: Resolved<T> | undefined
  for (const [value, source] of candidates) {
    if (value === undefined || value === '') continue
    resolved = { value, source }
  }
  return resolved
}

function parseMaxAge(raw: string, source: SettingSource): number {
  const value = Number(raw.trim())
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new SettingsError(`Invalid cache max age "${raw}" (${source}): expected seconds >= 0`)
  }
  return value
}

/**
 * Merge the three sources into Settings.
 *
 * Priority for every setting:
 * 1. CLI argument (--client-id, --api-key, --cache-path, --cache-max-age)
 * 2. Environment variable (DIGITALOCEAN_CLIENT_ID, DIGITALOCEAN_API_KEY,
 *    DIGITALOCEAN_CACHE_PATH, DIGITALOCEAN_CACHE_MAX_AGE)
 * 3. Config file value
 *
 * @throws MissingCredentialsError when client id or API key is absent everywhere
 */
export function mergeSettings(input: MergeInput, logger?: Logger): Settings {
  const config = input.config ?? {}
  const env = input.env ?? {}
  const args = input.args ?? {}

  const clientId = pick([
    [config.clientId, 'config'],
    [env.DIGITALOCEAN_CLIENT_ID, 'env'],
    [args.clientId, 'argument']
  ])
  const apiKey = pick([
    [config.apiKey, 'config'],
    [env.DIGITALOCEAN_API_KEY, 'env'],
    [args.apiKey, 'argument']
  ])
  if (!clientId || !apiKey) {
    throw new MissingCredentialsError()
  }

  const cachePath = pick([
    [config.cachePath, 'config'],
    [env.DIGITALOCEAN_CACHE_PATH, 'env'],
    [args.cachePath, 'argument']
  ]) ?? { value: DEFAULT_CACHE_PATH, source: 'default' }

  const rawMaxAge = pick<string | number>([
    [config.cacheMaxAge, 'config'],
    [env.DIGITALOCEAN_CACHE_MAX_AGE, 'env'],
    [args.cacheMaxAge, 'argument']
  ])
  let cacheMaxAge: Resolved<number> = { value: DEFAULT_CACHE_MAX_AGE, source: 'default' }
  if (rawMaxAge) {
    const value = parseMaxAge(String(rawMaxAge.value), rawMaxAge.source)
    cacheMaxAge = { value, source: rawMaxAge.source }
  }

  logger?.verbose(`Client id from ${clientId.source}, API key from ${apiKey.source}`)
  logger?.verbose(`Cache path: ${cachePath.value} (${cachePath.source})`)
  logger?.verbose(`Cache max age: ${cacheMaxAge.value}s (${cacheMaxAge.source})`)

  return {
    clientId: clientId.value,
    apiKey: apiKey.value,
    cachePath: cachePath.value,
    cacheMaxAge: cacheMaxAge.value
  }
}

/**
 * Load the config file and resolve Settings from all three sources.
 */
export async function resolveSettings(options: ResolveOptions = {}): Promise<Settings> {
  const { args, configFile, env = process.env, logger } = options
  const config = await loadConfig(configFile)
  if (config) {
    logger?.verbose('Loaded config file')
  }
  return mergeSettings({ config, env, args }, logger)
}
