import bunyan from 'bunyan'

export type Logger = bunyan

export interface LoggerOptions {
  /** File receiving debug-level records */
  debugLog?: string

  /** Additional streams, e.g. a ring buffer */
  streams?: bunyan.Stream[]
}

/**
 * Create the driver's logger. Without a debug log or extra streams it
 * discards every record.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const streams: bunyan.Stream[] = [...(options.streams ?? [])]
  if (options.debugLog) {
    streams.push({
      level: 'debug',
      path: options.debugLog,
    })
  }

  return bunyan.createLogger({
    name: 'automata',
    streams,
  })
}
