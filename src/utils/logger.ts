/**
 * Logger utility
 */

import { Logger } from 'tslog'
import type { ILogObj } from 'tslog'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

const LEVELS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value)
}

/** tslog minLevel for a LOG_LEVEL value; unknown values fall back to info. */
export function levelFromEnv(value: string | undefined = process.env.LOG_LEVEL): number {
  const level = value?.toLowerCase()
  return level !== undefined && isLogLevel(level) ? LEVELS[level] : LEVELS.info
}

export const logger = new Logger<ILogObj>({
  name: 'localdb',
  minLevel: levelFromEnv(),
  prettyLogTemplate:
    '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
})

// Sub-loggers copy their settings on creation, so level changes are fanned out here.
const subLoggers: Logger<ILogObj>[] = []

export function setLogLevel(level: LogLevel): void {
  logger.settings.minLevel = LEVELS[level]
  for (const sub of subLoggers) {
    sub.settings.minLevel = LEVELS[level]
  }
}

export function createLogger(name: string): Logger<ILogObj> {
  const sub = logger.getSubLogger({ name })
  subLoggers.push(sub)
  return sub
}
