import type { Command } from 'commander'
import { loadConfig, toConnectionOptions, DEFAULT_CONFIG } from '../../config/index.js'
import type { LocalDbConfig } from '../../types/config.js'
import { loadSchemaFromDirectory } from '../../storage/migrations.js'
import { openSession } from '../../storage/session.js'
import { PragmaVersionStore } from '../../storage/version.js'
import { setLogLevel } from '../../utils/logger.js'
import { output } from '../output.js'

interface UpgradeOptions {
  config?: string
  file?: string
  migrations?: string
  backupDir?: string
}

/**
 * Register the `upgrade` command on the Commander program.
 *
 * Builds the schema from the migrations directory and opens the database
 * with it, which applies any pending migrations in one transaction
 * (after a backup, when a backup directory is configured).
 */
export function registerUpgradeCommand(program: Command): void {
  program
    .command('upgrade')
    .description('Apply pending migrations to a database')
    .option('-c, --config <path>', 'configuration file path')
    .option('-f, --file <path>', 'database file (overrides the configuration)')
    .option('-m, --migrations <dir>', 'directory of numbered .sql migrations')
    .option('-b, --backup-dir <dir>', 'copy the database here before upgrading')
    .action((options: UpgradeOptions) => {
      try {
        const config: LocalDbConfig = options.config ? loadConfig(options.config) : DEFAULT_CONFIG
        setLogLevel(config.log.level)

        const file = options.file ?? config.database.path
        const schema = loadSchemaFromDirectory(options.migrations ?? config.migrations.dir)
        const session = openSession({
          file,
          schema,
          backupDir: options.backupDir ?? (config.database.backupDir || undefined),
          connectionOptions: toConnectionOptions(config),
        })

        try {
          const version = new PragmaVersionStore().getUserVersion(session.handle())
          output.success(`${session.file} is at version ${version} (application_id ${session.applicationId})`)
        } finally {
          session.close()
        }
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
