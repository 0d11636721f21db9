import { crc32c } from '@node-rs/crc32'
import type { Handle } from './interface.js'
import type { VersionStore } from './version.js'
import type { TransactionRunner } from './transaction.js'
import { InvariantError, SessionError } from './errors.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('schema')

export interface Schema {
  /** Identifies the family of databases this schema belongs to. */
  readonly applicationId: number

  /** Highest database version the schema can produce. */
  latestVersion(): number

  /** Deep copy, so an open session is unaffected by later registrations. */
  copy(): Schema

  /**
   * Bring a database at `currentVersion` up to date.
   * Returns the new version, which may equal the current one.
   */
  upgrade(tx: Handle, currentVersion: number): number
}

/** CRC-32C of the script, read as a signed 32-bit integer. */
export function applicationIdFor(rootScript: string): number {
  return crc32c(rootScript) | 0
}

/**
 * Schema made of SQL scripts: the root script is version 1 and every
 * upgrade registered with defineUpgrade adds one version.
 */
export class SqlSchema implements Schema {
  /**
   * Defaults to the CRC-32C of the root script. May be overridden before the
   * schema is used to open a database, never after.
   */
  applicationId: number

  private readonly versions: string[]

  constructor(rootScript: string) {
    this.applicationId = applicationIdFor(rootScript)
    this.versions = [rootScript]
  }

  /**
   * Register the script that migrates version `newVersion - 1` to `newVersion`.
   *
   * The root is version 1, so the first call must pass 2, the next 3, and so
   * on. Only affects sessions opened afterwards.
   *
   * @throws InvariantError NON_INCREMENTAL_VERSION for any other version number
   */
  defineUpgrade(newVersion: number, script: string): this {
    if (this.versions.length + 1 !== newVersion) {
      throw new InvariantError(
        'NON_INCREMENTAL_VERSION',
        `non-incremental upgrade version ${newVersion}, expected ${this.versions.length + 1}`,
      )
    }
    this.versions.push(script)
    return this
  }

  latestVersion(): number {
    return this.versions.length
  }

  upgrade(tx: Handle, currentVersion: number): number {
    const latest = this.latestVersion()
    for (let i = currentVersion; i < latest; i++) {
      tx.exec(this.versions[i])
    }
    return latest
  }

  copy(): SqlSchema {
    const dupe = new SqlSchema(this.versions[0])
    dupe.applicationId = this.applicationId
    dupe.versions.push(...this.versions.slice(1))
    return dupe
  }
}

export interface UpgradeResult {
  applicationId: number
  previousVersion: number
  version: number
}

/**
 * Validate and upgrade a database inside a single transaction.
 *
 * Steps: check the stored application id, record the schema's id, check the
 * stored version, run the pending scripts in order, record the new version.
 * Any failure rolls everything back, leaving identity and version as found.
 *
 * @throws SessionError IDENTITY_MISMATCH when the file belongs to another schema
 * @throws SessionError VERSION_TOO_NEW when the file is newer than the schema
 */
export function initDatabase(
  runner: Pick<TransactionRunner, 'wrapTx'>,
  schema: Schema,
  store: VersionStore,
): UpgradeResult {
  const result: UpgradeResult = {
    applicationId: schema.applicationId,
    previousVersion: 0,
    version: 0,
  }

  runner.wrapTx((tx) => {
    const applicationId = store.getApplicationId(tx)
    if (applicationId !== 0 && applicationId !== schema.applicationId) {
      throw new SessionError(
        'IDENTITY_MISMATCH',
        `application_id (${applicationId}) does not match schema ID (${schema.applicationId})`,
      )
    }

    store.setApplicationId(tx, schema.applicationId)

    const userVersion = store.getUserVersion(tx)
    if (userVersion > schema.latestVersion()) {
      throw new SessionError(
        'VERSION_TOO_NEW',
        `user_version (${userVersion}) is higher than the schema version (${schema.latestVersion()})`,
      )
    }
    if (userVersion < 0) {
      throw new SessionError('INVALID_VERSION', `user_version (${userVersion}) is negative`)
    }

    const version = schema.upgrade(tx, userVersion)
    store.setUserVersion(tx, version)

    result.previousVersion = userVersion
    result.version = version
  })

  if (result.version !== result.previousVersion) {
    log.info(`upgraded schema from v${result.previousVersion} to v${result.version}`)
  }
  return result
}
