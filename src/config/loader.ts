import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { LocalDbConfigSchema, type LocalDbConfig } from '../types/config.js'
import type { ConnectionOptions } from '../storage/connection.js'
import { DEFAULT_CONFIG } from './defaults.js'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

const ENV_PREFIX = 'LOCALDB_'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Overlay `overrides` on `base`; nested objects merge, everything else replaces. */
function mergeInto(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const merged = { ...base }
  for (const [key, value] of Object.entries(overrides)) {
    const current = merged[key]
    merged[key] = isRecord(current) && isRecord(value) ? mergeInto(current, value) : value
  }
  return merged
}

/** Env values arrive as strings; integers and booleans become typed for pragmas. */
function envValue(raw: string): string | number | boolean {
  const lower = raw.toLowerCase()
  if (lower === 'true' || lower === 'false') return lower === 'true'
  return /^\d+$/.test(raw) ? Number(raw) : raw
}

/**
 * Apply LOCALDB_ environment overrides in place. `__` separates nesting
 * levels, and segments match existing keys regardless of case:
 *   LOCALDB_DATABASE__BACKUPDIR=./backups -> database.backupDir
 *   LOCALDB_DATABASE__CONNECTIONOPTIONS___FK=true -> database.connectionOptions._fk
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  for (const [name, raw] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || raw === undefined) continue

    const path = name.slice(ENV_PREFIX.length).toLowerCase().split('__')
    let node = config
    path.forEach((segment, i) => {
      const key = Object.keys(node).find((k) => k.toLowerCase() === segment) ?? segment
      if (i === path.length - 1) {
        node[key] = envValue(raw)
        return
      }
      const child = node[key]
      if (isRecord(child)) {
        node = child
      } else {
        const created: Record<string, unknown> = {}
        node[key] = created
        node = created
      }
    })
  }
}

function freezeDeep<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (isRecord(child)) freezeDeep(child)
  }
  Object.freeze(value)
  return value
}

/**
 * Load, validate, and return a frozen LocalDbConfig.
 *
 * Pipeline: read file -> parse JSON -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to localdb.config.json
 * @returns Frozen, validated LocalDbConfig
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string): LocalDbConfig {
  // 1. Read file
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  // 2. Parse JSON
  let userConfig: unknown
  try {
    userConfig = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isRecord(userConfig)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }

  // 3. Merge with defaults (deep clone so defaults are never shared or frozen)
  const config: Record<string, unknown> = JSON.parse(JSON.stringify(mergeInto(DEFAULT_CONFIG, userConfig)))

  // 4. Apply environment variable overrides
  applyEnvOverrides(config, process.env)

  // 5. Validate with TypeBox
  if (!Value.Check(LocalDbConfigSchema, config)) {
    const errors = [...Value.Errors(LocalDbConfigSchema, config)]
    const fields = errors.map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  // 6. Freeze and return
  return freezeDeep(config)
}

/** Connection options from config, as the strings the connection layer expects. */
export function toConnectionOptions(config: LocalDbConfig): ConnectionOptions {
  const options: ConnectionOptions = {}
  for (const [key, value] of Object.entries(config.database.connectionOptions)) {
    options[key] = String(value)
  }
  return options
}
