import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { SessionError } from './errors.js'
import { SqliteConnection } from './sqlite.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('connection')

/** Extra connection options, merged into any already embedded in the path. */
export type ConnectionOptions = Record<string, string>

/**
 * A database path plus its query-string options.
 *
 * `dsn` is the canonical string form: the file, then the parameters sorted by
 * key. Repeated keys keep every value; the last one is the effective one.
 */
export interface ConnectionTarget {
  file: string
  params: URLSearchParams
  dsn: string
}

function unescapeComponent(raw: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '))
  } catch (err) {
    throw new SessionError('INVALID_TARGET', `invalid escape in connection options: "${raw}"`, { cause: err })
  }
}

function parseQuery(query: string): URLSearchParams {
  const params = new URLSearchParams()
  for (const pair of query.split('&')) {
    if (pair === '') continue
    if (pair.includes(';')) {
      throw new SessionError('INVALID_TARGET', `invalid semicolon separator in connection options: "${pair}"`)
    }
    const eq = pair.indexOf('=')
    const key = eq === -1 ? pair : pair.slice(0, eq)
    const value = eq === -1 ? '' : pair.slice(eq + 1)
    params.append(unescapeComponent(key), unescapeComponent(value))
  }
  return params
}

/**
 * Merge explicit options into the query string embedded in `path`.
 *
 * The merge is additive: a key present in both places keeps both values, with
 * the explicit one last so it takes precedence when the options are applied.
 * A path without a query and without options is returned unchanged.
 */
export function assembleConnectionTarget(path: string, options: ConnectionOptions = {}): ConnectionTarget {
  const qmark = path.indexOf('?')
  const file = qmark === -1 ? path : path.slice(0, qmark)
  const optionEntries = Object.entries(options)

  if (qmark === -1 && optionEntries.length === 0) {
    return { file, params: new URLSearchParams(), dsn: path }
  }

  const params = qmark === -1 ? new URLSearchParams() : parseQuery(path.slice(qmark + 1))
  for (const [key, value] of optionEntries) {
    params.append(key, value)
  }
  params.sort()

  const encoded = params.toString()
  return { file, params, dsn: encoded === '' ? file : `${file}?${encoded}` }
}

function lastValue(params: URLSearchParams, ...keys: string[]): string | undefined {
  let found: string | undefined
  for (const key of keys) {
    const values = params.getAll(key)
    if (values.length > 0) found = values[values.length - 1]
  }
  return found
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false
    default:
      throw new SessionError('INVALID_TARGET', `invalid boolean for ${key}: "${value}"`)
  }
}

function parseInteger(key: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new SessionError('INVALID_TARGET', `invalid integer for ${key}: "${value}"`)
  }
  return parseInt(value, 10)
}

function parseChoice(key: string, value: string, choices: readonly string[]): string {
  const upper = value.toUpperCase()
  if (!choices.includes(upper)) {
    throw new SessionError('INVALID_TARGET', `invalid value for ${key}: "${value}" (expected one of ${choices.join(', ')})`)
  }
  return upper
}

const JOURNAL_MODES = ['DELETE', 'TRUNCATE', 'PERSIST', 'MEMORY', 'WAL', 'OFF'] as const
const SYNCHRONOUS_MODES = ['OFF', 'NORMAL', 'FULL', 'EXTRA', '0', '1', '2', '3'] as const

/** Keys recognised by openConnection; every alias of an option is listed. */
const KNOWN_KEYS = new Set([
  'mode',
  '_busy_timeout',
  '_timeout',
  '_journal_mode',
  '_journal',
  '_foreign_keys',
  '_fk',
  '_synchronous',
  '_sync',
  '_cache_size',
])

/**
 * Open a better-sqlite3 connection for an assembled target.
 *
 * Recognised options become driver options or PRAGMAs; unknown ones are
 * logged and ignored. The parent directory of a file database is created.
 */
export function openConnection(target: ConnectionTarget): SqliteConnection {
  const { params } = target
  for (const key of new Set(params.keys())) {
    if (!KNOWN_KEYS.has(key)) {
      log.warn(`ignoring unsupported connection option "${key}"`)
    }
  }

  const options: Database.Options = {}
  let file = target.file

  const mode = lastValue(params, 'mode')
  switch (mode) {
    case undefined:
    case 'rwc':
      break
    case 'ro':
      options.readonly = true
      options.fileMustExist = true
      break
    case 'rw':
      options.fileMustExist = true
      break
    case 'memory':
      file = ':memory:'
      break
    default:
      throw new SessionError('INVALID_TARGET', `invalid value for mode: "${mode}"`)
  }

  const timeout = lastValue(params, '_busy_timeout', '_timeout')
  if (timeout !== undefined) {
    options.timeout = parseInteger('_busy_timeout', timeout)
  }

  const journalMode = lastValue(params, '_journal_mode', '_journal')
  const foreignKeys = lastValue(params, '_foreign_keys', '_fk')
  const synchronous = lastValue(params, '_synchronous', '_sync')
  const cacheSize = lastValue(params, '_cache_size')

  // Validate everything before touching the file system.
  const pragmas: string[] = []
  if (journalMode !== undefined) {
    pragmas.push(`journal_mode = ${parseChoice('_journal_mode', journalMode, JOURNAL_MODES)}`)
  }
  if (foreignKeys !== undefined) {
    pragmas.push(`foreign_keys = ${parseBoolean('_foreign_keys', foreignKeys) ? 'ON' : 'OFF'}`)
  }
  if (synchronous !== undefined) {
    pragmas.push(`synchronous = ${parseChoice('_synchronous', synchronous, SYNCHRONOUS_MODES)}`)
  }
  if (cacheSize !== undefined) {
    pragmas.push(`cache_size = ${parseInteger('_cache_size', cacheSize)}`)
  }

  if (file !== ':memory:' && file !== '' && !options.fileMustExist) {
    mkdirSync(dirname(file), { recursive: true })
  }

  const db = new Database(file, options)
  try {
    for (const pragma of pragmas) {
      db.pragma(pragma)
    }
  } catch (err) {
    db.close()
    throw err
  }

  return new SqliteConnection(db, file)
}
