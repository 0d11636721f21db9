import type { LocalDbConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: LocalDbConfig = {
  database: {
    path: './data/local.db',
    backupDir: '',
    connectionOptions: {},
  },
  migrations: {
    dir: './migrations',
  },
  log: {
    level: 'info',
  },
}
