/**
 * Structured logging for workbench operations.
 *
 * Emits one JSON line per event to stdout with:
 * - timestamp, level, message, and any extra fields
 *
 * Events below the configured level are dropped.
 */

import type { LogLevel } from '@curvelab/config'

export type LogFields = Record<string, unknown>

export interface LogSink {
  write(line: string): unknown
}

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Logger that adds `fields` to every event. */
  child(fields: LogFields): Logger
}

interface LoggerOptions {
  /** Minimum level written. Defaults to info. */
  level?: LogLevel
  /** Defaults to process.stdout. */
  sink?: LogSink
  fields?: LogFields
  clock?: () => Date
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const sink: LogSink = options.sink ?? process.stdout
  const base = options.fields ?? {}
  const clock = options.clock ?? (() => new Date())

  const emit = (at: LogLevel, msg: string, fields: LogFields = {}): void => {
    if (LEVEL_RANK[at] < LEVEL_RANK[level]) return
    const entry = { ts: clock().toISOString(), level: at, msg, ...base, ...fields }
    sink.write(JSON.stringify(entry) + '\n')
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (fields) => createLogger({ level, sink, clock, fields: { ...base, ...fields } }),
  }
}
