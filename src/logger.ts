// Leveled logger for mailmirror.
// Writes timestamped lines to stderr (colored with picocolors on a TTY), or appends
// them to a log file when one is configured so an interactive terminal stays clean.
// Detached remote failures and sync failures are reported here, never to callers.

import fs from 'node:fs'
import path from 'node:path'
import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string, err?: unknown): void
}

export interface LoggerOptions {
  debug?: boolean
  logFile?: string
  /** Destination for stderr output. Tests pass a collector. */
  write?: (line: string) => void
}

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
}

export function formatLine(level: LogLevel, msg: string, now = new Date()): string {
  return `${now.toISOString()} [${level.toUpperCase()}] ${msg}`
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const isTTY = process.stderr.isTTY ?? false
  const toStderr = options.write ?? ((line: string) => process.stderr.write(line + '\n'))

  let logFile = options.logFile
  if (logFile) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true })
  }

  function emit(level: LogLevel, msg: string) {
    if (level === 'debug' && !options.debug) return
    const line = formatLine(level, msg)
    if (logFile) {
      try {
        fs.appendFileSync(logFile, line + '\n')
        return
      } catch (err) {
        // Unwritable log file: switch to stderr for the rest of the session
        const failed = logFile
        logFile = undefined
        toStderr(pc.red(formatLine('error', `Cannot write ${failed}: ${String(err)}`)))
      }
    }
    toStderr(isTTY && !options.write ? LEVEL_COLORS[level](line) : line)
  }

  return {
    debug: (msg) => emit('debug', msg),
    info: (msg) => emit('info', msg),
    warn: (msg) => emit('warn', msg),
    error: (msg, err) => emit('error', err === undefined ? msg : `${msg}: ${describeError(err)}`),
  }
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
