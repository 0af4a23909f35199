/**
 * Structured console logger. One JSON object per line.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogThreshold = (typeof LOG_LEVELS)[number]
export type LogLevel = Exclude<LogThreshold, 'silent'>
export type LogFields = Record<string, unknown>

export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
}

export type LogSink = (level: LogLevel, line: string) => void

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message }
  }
  return value
}

export function createLogger(
  threshold: LogThreshold = 'info',
  sink: LogSink = consoleSink,
  clock: () => Date = () => new Date()
): Logger {
  const minimum = LOG_LEVELS.indexOf(threshold)

  function write(level: LogLevel, message: string, fields: LogFields = {}): void {
    if (LOG_LEVELS.indexOf(level) < minimum) return
    const entry: LogFields = { level, time: clock().toISOString(), msg: message }
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = serializeField(value)
    }
    sink(level, JSON.stringify(entry))
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  }
}
