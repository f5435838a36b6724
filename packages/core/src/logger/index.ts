import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/config.js'

export type { Logger } from 'pino'

/** Process-wide logger. pino-pretty is used when asked for and everywhere outside production. */
export function createLogger(config: LoggingConfig, name = 'snipkeep'): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name,
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty', options: { ignore: 'pid,hostname' } } }
      : {}),
  })
}
