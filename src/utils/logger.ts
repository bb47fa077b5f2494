import { createWriteStream, mkdirSync, type WriteStream } from 'fs'
import { dirname } from 'path'
import chalk from 'chalk'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

/**
 * Destination for formatted log records
 */
export interface LogSink {
  /** Lowest level this sink accepts */
  readonly level: LogLevel
  write(level: LogLevel, line: string, args: unknown[]): void
  close?(): Promise<void>
}

/**
 * Logger interface for named loggers
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  /** Logger that shares sinks with this one and prefixes a further name */
  child: (name: string) => Logger
  /** Flush and close every sink */
  close: () => Promise<void>
}

/**
 * Format a log message with timestamp
 */
function formatMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString()
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`
  return `${prefix} ${message}`
}

function accepts(sink: LogSink, level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[sink.level]
}

/**
 * Sink that writes coloured records to the console
 */
export function consoleSink(options: { level?: LogLevel; quiet?: boolean } = {}): LogSink {
  const level: LogLevel = options.quiet ? 'error' : options.level ?? 'info'

  const colors: Record<LogLevel, (s: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red
  }

  return {
    level,
    write(recordLevel, line, args) {
      const colored = colors[recordLevel](line)
      switch (recordLevel) {
        case 'debug':
          console.debug(colored, ...args)
          break
        case 'info':
          console.info(colored, ...args)
          break
        case 'warn':
          console.warn(colored, ...args)
          break
        case 'error':
          console.error(colored, ...args)
          break
      }
    }
  }
}

function reportFileError(path: string): (error: Error) => void {
  return error => {
    console.error(chalk.red(formatMessage('error', `cannot write log file ${path}: ${error.message}`)))
  }
}

/**
 * Sink that appends plain records to a log file
 *
 * The parent directory is created on the first record. Once the file fails
 * (open or write), `onError` is called and later records are dropped.
 */
export function fileSink(
  path: string,
  level: LogLevel = 'debug',
  onError: (error: Error) => void = reportFileError(path)
): LogSink {
  let stream: WriteStream | undefined
  let failed = false

  const fail = (error: unknown) => {
    failed = true
    onError(error instanceof Error ? error : new Error(String(error)))
  }

  const open = (): WriteStream | undefined => {
    try {
      mkdirSync(dirname(path), { recursive: true })
    } catch (error) {
      fail(error)
      return undefined
    }
    const created = createWriteStream(path, { flags: 'a' })
    created.on('error', fail)
    return created
  }

  return {
    level,
    write(_recordLevel, line, args) {
      if (failed) {
        return
      }
      const target = stream ?? open()
      if (!target) {
        return
      }
      stream = target
      const extra = args.length > 0 ? ' ' + args.map(arg => String(arg)).join(' ') : ''
      target.write(line + extra + '\n')
    },
    close() {
      const current = stream
      stream = undefined
      if (!current || failed) {
        current?.destroy()
        return Promise.resolve()
      }
      return new Promise<void>(resolve => {
        current.once('error', () => resolve())
        current.end(() => resolve())
      })
    }
  }
}

/**
 * Sink that keeps records in memory
 */
export interface MemorySink extends LogSink {
  readonly records: Array<{ level: LogLevel; message: string }>
}

export function memorySink(level: LogLevel = 'debug'): MemorySink {
  const records: Array<{ level: LogLevel; message: string }> = []
  return {
    level,
    records,
    write(recordLevel, line) {
      // timestamp and level prefix stripped
      records.push({ level: recordLevel, message: line.replace(/^\[[^\]]+\] \[[A-Z]+\] /, '') })
    }
  }
}

/**
 * Create a named logger instance writing to the given sinks
 */
export function createLogger(name: string, sinks: LogSink[] = [consoleSink()]): Logger {
  const prefix = (msg: string) => `[${name}] ${msg}`

  const log = (level: LogLevel, message: string, args: unknown[]) => {
    const line = formatMessage(level, prefix(message))
    for (const sink of sinks) {
      if (accepts(sink, level)) {
        sink.write(level, line, args)
      }
    }
  }

  return {
    debug: (message: string, ...args: unknown[]) => log('debug', message, args),
    info: (message: string, ...args: unknown[]) => log('info', message, args),
    warn: (message: string, ...args: unknown[]) => log('warn', message, args),
    error: (message: string, ...args: unknown[]) => log('error', message, args),
    child: (childName: string) => createLogger(`${name}:${childName}`, sinks),
    close: async () => {
      await Promise.all(sinks.map(sink => sink.close?.()))
    }
  }
}

