import type Database from 'better-sqlite3'
import type { Handle, PreparedStatement, RunResult } from './interface.js'
import { InvariantError } from './errors.js'

/**
 * better-sqlite3 statement behind the PreparedStatement interface.
 *
 * better-sqlite3 finalizes statements on garbage collection, so close() only
 * retires the wrapper; further use throws.
 */
export class SqliteStatement implements PreparedStatement {
  private closed = false

  /**
   * @param stmt - compiled better-sqlite3 statement
   * @param assertUsable - extra liveness check, e.g. that the owning transaction is still open
   */
  constructor(
    private readonly stmt: Database.Statement,
    private readonly assertUsable: () => void = () => {},
  ) {}

  get source(): string {
    return this.stmt.source
  }

  run(params: unknown[] = []): RunResult {
    this.check()
    const result = this.stmt.run(...params)
    return {
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    }
  }

  get<T>(params: unknown[] = []): T | undefined {
    this.check()
    return this.stmt.get(...params) as T | undefined
  }

  all<T>(params: unknown[] = []): T[] {
    this.check()
    return this.stmt.all(...params) as T[]
  }

  close(): void {
    this.closed = true
  }

  private check(): void {
    if (this.closed) {
      throw new InvariantError('STATEMENT_CLOSED', `statement used after close: ${this.stmt.source}`)
    }
    this.assertUsable()
  }
}

/**
 * Root handle over a better-sqlite3 connection.
 *
 * Synchronous like the driver underneath; a session owns exactly one.
 */
export class SqliteConnection implements Handle {
  /**
   * @param db - open better-sqlite3 database
   * @param file - path the connection was opened on, or ':memory:'
   */
  constructor(
    private readonly db: Database.Database,
    readonly file: string,
  ) {}

  get inTransaction(): boolean {
    return this.db.inTransaction
  }

  get open(): boolean {
    return this.db.open
  }

  get memory(): boolean {
    return this.db.memory
  }

  /** Read a PRAGMA as a single value. */
  pragma(name: string): unknown {
    return this.db.pragma(name, { simple: true })
  }

  exec(sql: string): void {
    this.db.exec(sql)
  }

  run(sql: string, params: unknown[] = []): RunResult {
    const result = this.db.prepare(sql).run(...params)
    return {
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    }
  }

  get<T>(sql: string, params: unknown[] = []): T | undefined {
    return this.db.prepare(sql).get(...params) as T | undefined
  }

  all<T>(sql: string, params: unknown[] = []): T[] {
    return this.db.prepare(sql).all(...params) as T[]
  }

  prepare(sql: string, assertUsable?: () => void): PreparedStatement {
    return new SqliteStatement(this.db.prepare(sql), assertUsable)
  }

  close(): void {
    this.db.close()
  }
}

/**
 * Handle scoped to one transaction on a SqliteConnection.
 *
 * Deliberately has no commit or rollback: the transaction runner owns those.
 * Once the runner finalizes the transaction every call throws, including
 * calls on statements prepared through this handle.
 */
export class TransactionHandle implements Handle {
  private active = true

  constructor(private readonly conn: SqliteConnection) {}

  get isActive(): boolean {
    return this.active
  }

  /** Called by the transaction runner once commit or rollback has been attempted. */
  retire(): void {
    this.active = false
  }

  exec(sql: string): void {
    this.assertActive()
    this.conn.exec(sql)
  }

  run(sql: string, params?: unknown[]): RunResult {
    this.assertActive()
    return this.conn.run(sql, params)
  }

  get<T>(sql: string, params?: unknown[]): T | undefined {
    this.assertActive()
    return this.conn.get<T>(sql, params)
  }

  all<T>(sql: string, params?: unknown[]): T[] {
    this.assertActive()
    return this.conn.all<T>(sql, params)
  }

  prepare(sql: string): PreparedStatement {
    this.assertActive()
    return this.conn.prepare(sql, () => this.assertActive())
  }

  private assertActive(): void {
    if (!this.active) {
      throw new InvariantError('HANDLE_CLOSED', 'transaction handle used after the transaction finished')
    }
  }
}
