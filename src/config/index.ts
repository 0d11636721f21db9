export { loadConfig, ConfigError, toConnectionOptions } from './loader.js'
export { DEFAULT_CONFIG } from './defaults.js'
