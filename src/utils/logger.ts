/**
 * Structured JSON logger — one object per line.
 *
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"info","message":"Plan complete","unitsSold":12}
 *
 * Threshold comes from LOG_LEVEL (default "info").
 * Levels in ascending severity: debug, info, warn, error.
 * The default sink sends errors to stderr and everything else to stdout;
 * `stderrSink` sends every level to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value)
}

function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** Where serialized lines go. Defaults to process stdout/stderr. */
export interface LogSink {
  out(line: string): void
  err(line: string): void
}

const processSink: LogSink = {
  out: (line) => { process.stdout.write(line) },
  err: (line) => { process.stderr.write(line) },
}

/** Every level to stderr, leaving stdout free for program output. */
export const stderrSink: LogSink = {
  out: (line) => { process.stderr.write(line) },
  err: (line) => { process.stderr.write(line) },
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  defaults?: Record<string, unknown>
}

export class Logger {
  private readonly threshold: number
  private readonly sink: LogSink
  private readonly defaults: Record<string, unknown>

  constructor(options: LoggerOptions = {}) {
    this.threshold = LEVEL_PRIORITY[options.level ?? resolveLevel(process.env.LOG_LEVEL)]
    this.sink = options.sink ?? processSink
    this.defaults = options.defaults ?? {}
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.defaults,
      ...context,
    }

    const line = JSON.stringify(entry) + '\n'
    if (level === 'error') {
      this.sink.err(line)
    } else {
      this.sink.out(line)
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= this.threshold
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context)
  }

  /** Logger with the same threshold and sink that adds fixed fields to every line. */
  child(defaults: Record<string, unknown>): Logger {
    const level = LOG_LEVELS.find((l) => LEVEL_PRIORITY[l] === this.threshold) ?? 'info'
    return new Logger({ level, sink: this.sink, defaults: { ...this.defaults, ...defaults } })
  }
}

/** Shared logger instance for the planner and CLI. */
export const logger = new Logger()
