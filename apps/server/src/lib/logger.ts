/**
 * Structured logger: one JSON object per line, info and below to stdout,
 * warn and error to stderr. Lines below the configured level are dropped.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  /** Logger that adds `bindings` to every line. */
  child(bindings: LogFields): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  bindings?: LogFields
  /** Line sink; defaults to process.stdout / process.stderr. */
  write?: (line: string, level: LogLevel) => void
}

function defaultWrite(line: string, level: LogLevel): void {
  const stream = SEVERITY[level] >= SEVERITY.warn ? process.stderr : process.stdout
  stream.write(line + '\n')
}

/** Error objects do not survive JSON.stringify; keep message and stack. */
export function serializeError(err: unknown): LogFields {
  if (err instanceof Error) return { error: err.message, errorName: err.name, stack: err.stack }
  return { error: String(err) }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', bindings = {}, write = defaultWrite } = options
  const threshold = SEVERITY[level]

  const emit = (lineLevel: LogLevel, event: string, fields?: LogFields): void => {
    if (SEVERITY[lineLevel] < threshold) return
    const entry = {
      ts: new Date().toISOString(),
      level: lineLevel,
      event,
      ...bindings,
      ...fields,
    }
    write(JSON.stringify(entry), lineLevel)
  }

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (extra) => createLogger({ level, write, bindings: { ...bindings, ...extra } }),
  }
}
