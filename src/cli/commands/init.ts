import { existsSync, mkdirSync, writeFileSync } from 'node:fs'
import type { Command } from 'commander'
import { DEFAULT_CONFIG } from '../../config/index.js'
import type { LocalDbConfig } from '../../types/config.js'
import { output } from '../output.js'

/**
 * Register the `init` command on the Commander program.
 *
 * Writes a starter localdb.config.json and creates the migrations directory
 * it points at.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a starter configuration file and migrations directory')
    .option('-o, --output <path>', 'output file path', 'localdb.config.json')
    .option('-m, --migrations <dir>', 'migrations directory', DEFAULT_CONFIG.migrations.dir)
    .action((options: { output: string; migrations: string }) => {
      const configPath = options.output

      if (existsSync(configPath)) {
        output.warn(`Configuration file already exists: ${configPath}`)
        output.warn('Use a different path with --output or remove the existing file.')
        process.exit(1)
        return
      }

      const config: LocalDbConfig = {
        ...DEFAULT_CONFIG,
        migrations: { dir: options.migrations },
      }
      writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n')
      mkdirSync(options.migrations, { recursive: true })

      output.info(`Configuration written to ${configPath}`)
      output.info(`Add numbered .sql files to ${options.migrations} (0001_init.sql, ...), then run: localdb upgrade -c ${configPath}`)
    })
}
