import { z } from 'zod'
import { SettingsError, type Env } from './settings.js'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const logLevelSchema = z.enum(LOG_LEVELS)

/** `LOG_LEVEL` from the environment, `info` when unset. */
export function resolveLogLevel(env: Env = process.env): LogLevel {
  const raw = env['LOG_LEVEL']
  if (raw === undefined || raw.trim() === '') return 'info'
  const parsed = logLevelSchema.safeParse(raw.trim().toLowerCase())
  if (!parsed.success) {
    throw new SettingsError('LOG_LEVEL', `Invalid LOG_LEVEL "${raw}": expected one of ${LOG_LEVELS.join(', ')}.`)
  }
  return parsed.data
}
