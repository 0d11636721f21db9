import type { PreparedStatement, RunResult } from './interface.js'

/** Compiles a query. May be asynchronous; the cache never holds a lock across it. */
export type Preparer = (query: string) => PreparedStatement | Promise<PreparedStatement>

/**
 * A prepared statement owned by a StatementCache entry.
 *
 * close() removes the entry (only if it still points at this statement) and
 * then closes the underlying statement. Closing twice is a no-op.
 */
export class CachedStatement implements PreparedStatement {
  private closed = false

  constructor(
    private readonly stmt: PreparedStatement,
    private readonly detach: (self: CachedStatement) => void,
  ) {}

  get source(): string {
    return this.stmt.source
  }

  get isClosed(): boolean {
    return this.closed
  }

  run(params?: unknown[]): RunResult {
    return this.stmt.run(params)
  }

  get<T>(params?: unknown[]): T | undefined {
    return this.stmt.get<T>(params)
  }

  all<T>(params?: unknown[]): T[] {
    return this.stmt.all<T>(params)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.detach(this)
    this.stmt.close()
  }
}

/**
 * Caching layer for prepared statements over a single connection.
 *
 * Statements stay cached until either their own close() or the cache's
 * close() is called. Calling prepare() while close() runs is undefined
 * behaviour; once close() returns the cache can be reused.
 */
export class StatementCache {
  private readonly cache = new Map<string, CachedStatement>()

  constructor(private readonly preparer: Preparer) {}

  /** Number of statements currently cached. */
  get size(): number {
    return this.cache.size
  }

  /**
   * Return the cached statement for `query`, preparing it on a miss.
   *
   * Repeated calls with identical text return the same object until that
   * statement is closed. When two callers miss at once, the first to finish
   * preparing is cached and returned to both; the other statement is closed.
   */
  async prepare(query: string): Promise<CachedStatement> {
    const cached = this.cache.get(query)
    if (cached) return cached

    const fresh = new CachedStatement(await this.preparer(query), (self) => {
      if (this.cache.get(query) === self) {
        this.cache.delete(query)
      }
    })

    const winner = this.cache.get(query)
    if (winner) {
      fresh.close()
      return winner
    }

    this.cache.set(query, fresh)
    return fresh
  }

  /**
   * Close and discard every cached statement.
   *
   * Every statement is attempted; failures are collected into one error.
   *
   * @throws AggregateError listing each statement that failed to close
   */
  close(): void {
    const failures: Error[] = []
    for (const [query, stmt] of [...this.cache]) {
      this.cache.delete(query)
      try {
        stmt.close()
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        failures.push(new Error(`error closing \`${query}': ${reason}`, { cause: err }))
      }
    }

    if (failures.length > 0) {
      throw new AggregateError(failures, `failed to close ${failures.length} cached statement(s)`)
    }
  }
}
