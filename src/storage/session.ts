import type { Handle } from './interface.js'
import type { SqliteConnection } from './sqlite.js'
import { assembleConnectionTarget, openConnection, type ConnectionOptions } from './connection.js'
import { FallbackVersionStore, PragmaVersionStore, type VersionStore } from './version.js'
import { initDatabase, type Schema } from './schema.js'
import { TransactionRunner, type TransactionWork } from './transaction.js'
import { StatementCache } from './statement-cache.js'
import { backupDatabase } from './backup.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('session')

export interface OpenOptions {
  /** Database file, optionally followed by `?key=value` connection options. */
  file: string

  /** Schema the database is validated against and upgraded to. */
  schema: Schema

  /** Defaults to PragmaVersionStore. */
  versionStore?: VersionStore

  /**
   * When set, the database file is copied into this directory before an
   * upgrade is attempted, as `${base}.before_v${version}_upgrade${ext}`.
   */
  backupDir?: string

  /** Added to any options already embedded in `file`; these win on conflict. */
  connectionOptions?: ConnectionOptions
}

/**
 * An open database whose schema is current.
 *
 * Owns its connection exclusively. After close(), outstanding statements and
 * transaction handles must not be used.
 */
export class Session {
  private readonly runner: TransactionRunner
  private cache: StatementCache | null = null

  /** Use openSession(); the schema passed here is assumed to be a private copy. */
  constructor(
    private readonly conn: SqliteConnection,
    private readonly schema: Schema,
    readonly openedAt: Date,
  ) {
    this.runner = new TransactionRunner(conn)
  }

  get file(): string {
    return this.conn.file
  }

  get applicationId(): number {
    return this.schema.applicationId
  }

  get schemaVersion(): number {
    return this.schema.latestVersion()
  }

  /** See TransactionRunner.wrapTx. */
  wrapTx(work: TransactionWork): void {
    this.runner.wrapTx(work)
  }

  /** Root handle for ad-hoc queries outside wrapTx. */
  handle(): Handle {
    return this.conn
  }

  /** Statement cache over the root handle, created on first use. */
  get statements(): StatementCache {
    if (!this.cache) {
      this.cache = new StatementCache((query) => this.conn.prepare(query))
    }
    return this.cache
  }

  /** Close cached statements, then the connection. Closing twice is a no-op. */
  close(): void {
    try {
      this.cache?.close()
    } finally {
      this.conn.close()
    }
  }
}

/**
 * Open (creating if needed) a database and bring its schema up to date.
 *
 * The upgrade always runs in one transaction. If the database holds a newer
 * version than the schema, or a non-zero application id of another schema,
 * the transaction is discarded, the connection closed and the error thrown.
 * Either a fully usable session is returned or nothing is.
 *
 * Note that `application_id` and `user_version` are reserved: they hold the
 * schema's id and version.
 */
export function openSession(options: OpenOptions): Session {
  const openedAt = new Date()

  const target = assembleConnectionTarget(options.file, options.connectionOptions)
  const conn = openConnection(target)

  try {
    const schema = options.schema.copy()
    const store = options.versionStore ?? new PragmaVersionStore()
    const session = new Session(conn, schema, openedAt)

    if (options.backupDir) {
      // Probe only the primary store: a fallback reader is consulted inside the
      // upgrade transaction, once.
      const probe = store instanceof FallbackVersionStore ? store.primary : store
      const storedVersion = probe.getUserVersion(conn)
      if (storedVersion < schema.latestVersion() && !conn.memory && conn.file !== '') {
        backupDatabase(conn, options.backupDir, schema.latestVersion())
      }
    }

    const result = initDatabase(session, schema, store)
    log.debug(`opened ${target.dsn} at v${result.version} (application_id ${result.applicationId})`)
    return session
  } catch (err) {
    conn.close()
    throw err
  }
}
