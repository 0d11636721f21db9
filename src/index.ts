export * from './storage/index.js'
export { loadConfig, ConfigError, toConnectionOptions, DEFAULT_CONFIG } from './config/index.js'
export { LocalDbConfigSchema } from './types/config.js'
export type { LocalDbConfig } from './types/config.js'
export { logger, createLogger, setLogLevel } from './utils/logger.js'
export type { LogLevel } from './utils/logger.js'
