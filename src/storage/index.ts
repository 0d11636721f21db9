export type { Handle, PreparedStatement, RunResult } from './interface.js'
export { SqliteConnection, SqliteStatement, TransactionHandle } from './sqlite.js'
export { assembleConnectionTarget, openConnection } from './connection.js'
export type { ConnectionOptions, ConnectionTarget } from './connection.js'
export { PragmaVersionStore, FallbackVersionStore } from './version.js'
export type { VersionReader, VersionStore } from './version.js'
export { TransactionRunner } from './transaction.js'
export type { TransactionWork } from './transaction.js'
export { StatementCache, CachedStatement } from './statement-cache.js'
export type { Preparer } from './statement-cache.js'
export { SqlSchema, applicationIdFor, initDatabase } from './schema.js'
export type { Schema, UpgradeResult } from './schema.js'
export { backupFileName, backupDatabase } from './backup.js'
export { loadMigrations, schemaFromMigrations, loadSchemaFromDirectory } from './migrations.js'
export type { Migration } from './migrations.js'
export { Session, openSession } from './session.js'
export type { OpenOptions } from './session.js'
export { SessionError, InvariantError } from './errors.js'
export type { SessionErrorCode, InvariantErrorCode } from './errors.js'
