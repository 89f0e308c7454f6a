/**
 * Structured logging.
 *
 * Emits one JSON line per entry with `ts`, `level`, `msg` and any extra
 * fields. Writes to stdout unless a sink is given.
 */

import type { LogLevel } from './env.js'

export type LogSink = (line: string) => void

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** A logger that adds `bindings` to every entry. */
  child(bindings: LogFields): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  bindings?: LogFields
}

type EntryLevel = Exclude<LogLevel, 'silent'>

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
}

function stdoutSink(line: string): void {
  process.stdout.write(line + '\n')
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? 'info']
  const sink = options.sink ?? stdoutSink
  const bindings = options.bindings ?? {}

  function emit(level: EntryLevel, msg: string, fields?: LogFields): void {
    if (SEVERITY[level] < threshold) return
    const entry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...bindings,
      ...fields,
    }
    sink(JSON.stringify(entry))
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (extra) => createLogger({ ...options, bindings: { ...bindings, ...extra } }),
  }
}
