import type { Command } from 'commander'
import { assembleConnectionTarget, openConnection } from '../../storage/connection.js'
import { PragmaVersionStore } from '../../storage/version.js'
import { output } from '../output.js'

/**
 * Register the `inspect` command on the Commander program.
 *
 * Opens a database read-only and shows its recorded identity, version and
 * tables without running any migration.
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show the application id, schema version and tables of a database')
    .argument('<file>', 'database file')
    .action((file: string) => {
      let conn
      try {
        conn = openConnection(assembleConnectionTarget(file, { mode: 'ro' }))
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
        return
      }

      try {
        const versions = new PragmaVersionStore()
        const tables = conn
          .all<{ name: string }>(
            "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
          )
          .map((t) => t.name)

        output.info(`Database: ${file}`)
        output.info(`Application ID: ${versions.getApplicationId(conn)}`)
        output.info(`User Version: ${versions.getUserVersion(conn)}`)
        if (tables.length > 0) {
          output.info('Tables:')
          output.table(tables.map((name) => ({ Table: name })))
        } else {
          output.info('Tables: None')
        }
      } finally {
        conn.close()
      }
    })
}
