import type { Handle } from './interface.js'
import { SessionError } from './errors.js'

/**
 * Reads the schema identity and version recorded for a database.
 * A value of 0 means "never initialized".
 */
export interface VersionReader {
  getApplicationId(handle: Handle): number
  getUserVersion(handle: Handle): number
}

/** Reads and records the schema identity and version of a database. */
export interface VersionStore extends VersionReader {
  setApplicationId(handle: Handle, applicationId: number): void
  setUserVersion(handle: Handle, version: number): void
}

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1

function assertInt32(field: string, value: number): void {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new SessionError('INVALID_VERSION', `${field} must be a 32-bit signed integer, got ${value}`)
  }
}

type HeaderField = 'application_id' | 'user_version'

/**
 * Default store: the `application_id` and `user_version` fields of the SQLite
 * file header, reached through PRAGMAs. No table is involved, so the values
 * exist before any migration has run.
 */
export class PragmaVersionStore implements VersionStore {
  getApplicationId(handle: Handle): number {
    return this.read(handle, 'application_id')
  }

  getUserVersion(handle: Handle): number {
    return this.read(handle, 'user_version')
  }

  setApplicationId(handle: Handle, applicationId: number): void {
    this.write(handle, 'application_id', applicationId)
  }

  setUserVersion(handle: Handle, version: number): void {
    this.write(handle, 'user_version', version)
  }

  private read(handle: Handle, field: HeaderField): number {
    const row = handle.get<Record<HeaderField, number>>(`PRAGMA ${field}`)
    return row?.[field] ?? 0
  }

  private write(handle: Handle, field: HeaderField, value: number): void {
    assertInt32(field, value)
    // PRAGMA arguments cannot be bound; the value is a validated integer.
    handle.exec(`PRAGMA ${field} = ${value}`)
  }
}

/**
 * Adopts databases that recorded their identity and version some other way.
 *
 * Reads go to the primary store first; only a 0 ("uninitialized") answer is
 * passed on to the fallback reader. After the first successful open the
 * primary holds real values, so the fallback is never asked again for that
 * database, whichever session object opens it.
 */
export class FallbackVersionStore implements VersionStore {
  constructor(
    readonly primary: VersionStore,
    readonly fallback: VersionReader,
  ) {}

  getApplicationId(handle: Handle): number {
    const applicationId = this.primary.getApplicationId(handle)
    if (applicationId !== 0) return applicationId
    return this.fallback.getApplicationId(handle)
  }

  getUserVersion(handle: Handle): number {
    const version = this.primary.getUserVersion(handle)
    if (version !== 0) return version
    return this.fallback.getUserVersion(handle)
  }

  setApplicationId(handle: Handle, applicationId: number): void {
    this.primary.setApplicationId(handle, applicationId)
  }

  setUserVersion(handle: Handle, version: number): void {
    this.primary.setUserVersion(handle, version)
  }
}
