/**
 * Result from a SQL write operation.
 */
export interface RunResult {
  changes: number
  lastInsertRowid: number | bigint
}

/**
 * A statement compiled once and executed many times.
 *
 * Using a statement after close() throws.
 */
export interface PreparedStatement {
  /** The SQL text the statement was prepared from. */
  readonly source: string
  run(params?: unknown[]): RunResult
  get<T>(params?: unknown[]): T | undefined
  all<T>(params?: unknown[]): T[]
  close(): void
}

/**
 * Capability set shared by the root connection and by transaction handles.
 *
 * Calling any method after the owning transaction has finished, or after the
 * connection has been closed, throws.
 */
export interface Handle {
  /** Execute one or more SQL statements that return no rows. */
  exec(sql: string): void

  /** Execute a write SQL statement. Returns changes count and last insert rowid. */
  run(sql: string, params?: unknown[]): RunResult

  /** Execute a read SQL statement. Returns a single row or undefined. */
  get<T>(sql: string, params?: unknown[]): T | undefined

  /** Execute a read SQL statement. Returns all matching rows. */
  all<T>(sql: string, params?: unknown[]): T[]

  prepare(sql: string): PreparedStatement
}
