/** Ordinary failures a caller can react to; the database is left untouched. */
export type SessionErrorCode =
  | 'IDENTITY_MISMATCH'
  | 'VERSION_TOO_NEW'
  | 'INVALID_TARGET'
  | 'INVALID_VERSION'
  | 'BACKUP_FAILED'
  | 'NO_MIGRATIONS'

export class SessionError extends Error {
  constructor(
    public readonly code: SessionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'SessionError'
  }
}

/**
 * Violated internal invariants: misuse of the API or a transaction whose end
 * state is unknown. These are not meant to be caught and retried.
 */
export type InvariantErrorCode =
  | 'NON_INCREMENTAL_VERSION'
  | 'ROLLBACK_FAILED'
  | 'TRANSACTION_ENDED'
  | 'HANDLE_CLOSED'
  | 'STATEMENT_CLOSED'
  | 'INVALID_WORK'
  | 'ASYNC_WORK'

export class InvariantError extends Error {
  constructor(
    public readonly code: InvariantErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'InvariantError'
  }
}
