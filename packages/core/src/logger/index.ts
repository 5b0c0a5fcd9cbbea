import pino, { type DestinationStream, type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/store-config.js'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  /** Raw JSON output stream; ignored when the pretty transport is used */
  destination?: DestinationStream
}

export function createLogger(
  config: LoggingConfig,
  options?: CreateLoggerOptions,
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  const pinoOptions = {
    name: 'shelf-index',
    level: config.level,
  }

  if (usePretty) {
    return pino({ ...pinoOptions, transport: { target: 'pino-pretty' } })
  }
  return options?.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions)
}
