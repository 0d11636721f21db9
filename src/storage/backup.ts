import { copyFileSync, mkdirSync } from 'node:fs'
import { join, parse } from 'node:path'
import type { SqliteConnection } from './sqlite.js'
import { SessionError } from './errors.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('backup')

/**
 * Name of the backup taken before upgrading `file` to `version`.
 *
 * The version tag goes between the base name and the extension so backups
 * sort next to the database: `test.db` -> `test.before_v2_upgrade.db`,
 * `test` -> `test.before_v2_upgrade`.
 */
export function backupFileName(file: string, version: number): string {
  const { name, ext } = parse(file)
  return `${name}.before_v${version}_upgrade${ext}`
}

/**
 * Copy the database file verbatim into `backupDir` ahead of an upgrade.
 *
 * WAL databases are checkpointed first so the main file holds every
 * committed page.
 *
 * @returns Path of the backup file
 * @throws SessionError BACKUP_FAILED if any step fails; the upgrade must not proceed
 */
export function backupDatabase(conn: SqliteConnection, backupDir: string, version: number): string {
  const destination = join(backupDir, backupFileName(conn.file, version))
  try {
    if (conn.pragma('journal_mode') === 'wal') {
      conn.pragma('wal_checkpoint(TRUNCATE)')
    }
    mkdirSync(backupDir, { recursive: true })
    copyFileSync(conn.file, destination)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new SessionError('BACKUP_FAILED', `unable to back up ${conn.file} to ${destination}: ${reason}`, {
      cause: err,
    })
  }
  log.info(`backed up ${conn.file} to ${destination}`)
  return destination
}
