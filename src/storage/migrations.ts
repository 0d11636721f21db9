import { readdirSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { SqlSchema } from './schema.js'
import { InvariantError, SessionError } from './errors.js'

/**
 * A database migration with version number, description, and SQL to run.
 */
export interface Migration {
  version: number
  description: string
  up: string
}

const MIGRATION_FILE = /^(\d+)[-_]?(.*)\.sql$/i

/**
 * Read the numbered `.sql` files of a directory, in version order.
 *
 * `0001_create_notes.sql` becomes version 1 described as "create notes".
 * Files that do not start with a number are ignored.
 */
export function loadMigrations(dir: string): Migration[] {
  const migrations: Migration[] = []
  for (const entry of readdirSync(dir)) {
    const match = MIGRATION_FILE.exec(entry)
    if (!match) continue
    migrations.push({
      version: parseInt(match[1], 10),
      description: match[2].replace(/[-_]+/g, ' ').trim(),
      up: readFileSync(join(dir, entry), 'utf-8'),
    })
  }
  return migrations.sort((a, b) => a.version - b.version)
}

/**
 * Build a schema whose root is the first migration and whose upgrades are
 * the rest, in order. Versions must run 1, 2, 3, ... without gaps.
 *
 * @throws SessionError NO_MIGRATIONS for an empty list
 * @throws InvariantError NON_INCREMENTAL_VERSION on a gap or duplicate
 */
export function schemaFromMigrations(migrations: Migration[]): SqlSchema {
  const [root, ...upgrades] = migrations
  if (!root) {
    throw new SessionError('NO_MIGRATIONS', 'no migrations to build a schema from')
  }
  if (root.version !== 1) {
    throw new InvariantError('NON_INCREMENTAL_VERSION', `first migration must be version 1, got ${root.version}`)
  }
  const schema = new SqlSchema(root.up)
  for (const migration of upgrades) {
    schema.defineUpgrade(migration.version, migration.up)
  }
  return schema
}

/** loadMigrations then schemaFromMigrations. */
export function loadSchemaFromDirectory(dir: string): SqlSchema {
  const migrations = loadMigrations(dir)
  if (migrations.length === 0) {
    throw new SessionError('NO_MIGRATIONS', `no migration files found in ${dir}`)
  }
  return schemaFromMigrations(migrations)
}
