import type { Handle } from './interface.js'
import { TransactionHandle, type SqliteConnection } from './sqlite.js'
import { InvariantError } from './errors.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('transaction')

/**
 * Unit of work run inside a transaction. It must not commit or roll back the
 * handle itself; throwing discards the transaction.
 *
 * Work is synchronous: the session has one connection, and anything else run
 * on it while a transaction is open would become part of that transaction.
 */
export type TransactionWork = (tx: Handle) => void

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  )
}

/**
 * Runs units of work in BEGIN/COMMIT/ROLLBACK envelopes on one connection.
 *
 * A transaction opens and finalizes within a single call, so no other code
 * can run on the connection in between.
 */
export class TransactionRunner {
  constructor(private readonly conn: SqliteConnection) {}

  /**
   * Begin a transaction and invoke `work` with a handle scoped to it.
   *
   * If `work` throws, the transaction is rolled back and the same error is
   * rethrown. Otherwise the transaction is committed and any commit error is
   * rethrown. Exactly one of commit or rollback is attempted.
   *
   * @throws InvariantError ROLLBACK_FAILED when the rollback itself fails; the
   *   transaction's end state is then unknown
   * @throws InvariantError TRANSACTION_ENDED when `work` ended the transaction
   * @throws InvariantError ASYNC_WORK when `work` returns a promise; the
   *   transaction is rolled back before the promise settles
   */
  wrapTx(work: TransactionWork): void {
    if (typeof work !== 'function') {
      throw new InvariantError('INVALID_WORK', 'wrapTx expects a function taking a transaction handle')
    }

    this.conn.exec('BEGIN')
    const tx = new TransactionHandle(this.conn)

    // Rollback is armed from here until a commit is attempted.
    let result: unknown
    try {
      result = work(tx)
    } catch (err) {
      this.rollback(tx, err)
      throw err
    }

    if (isThenable(result)) {
      const err = new InvariantError('ASYNC_WORK', 'transaction work must not return a promise')
      this.rollback(tx, err)
      // The work continues against a retired handle; its failure is reported here.
      result.then(undefined, (late: unknown) => {
        log.warn(`asynchronous transaction work failed after rollback: ${messageOf(late)}`)
      })
      throw err
    }

    if (!this.conn.inTransaction) {
      tx.retire()
      throw new InvariantError('TRANSACTION_ENDED', 'transaction was ended by the wrapped work')
    }

    this.commit(tx)
  }

  private commit(tx: TransactionHandle): void {
    tx.retire()
    try {
      this.conn.exec('COMMIT')
    } catch (err) {
      // A failed COMMIT can leave the transaction open (SQLITE_BUSY); it never
      // took effect, so release the connection for the next caller.
      if (this.conn.inTransaction) {
        log.warn(`commit failed, rolling back: ${messageOf(err)}`)
        this.rollback(tx, err)
      }
      throw err
    }
  }

  private rollback(tx: TransactionHandle, cause: unknown): void {
    tx.retire()
    if (!this.conn.inTransaction) {
      // SQLite rolls back on its own after some errors (SQLITE_FULL, SQLITE_IOERR).
      log.warn(`transaction already rolled back by the engine: ${messageOf(cause)}`)
      return
    }
    try {
      this.conn.exec('ROLLBACK')
    } catch (rollbackErr) {
      throw new InvariantError(
        'ROLLBACK_FAILED',
        `rollback failed (${messageOf(rollbackErr)}) after: ${messageOf(cause)}`,
        { cause },
      )
    }
  }
}
