import { z } from 'zod'
import type { SmoothingPreset } from '@curvelab/curve-core'

const SMOOTHING_PRESET_NAMES = [
  'butterworth-8',
  'butterworth-4',
  'rectangular',
  'gaussian',
] as const satisfies readonly SmoothingPreset[]

export const OUTLIER_ACTIONS = ['none', 'hide', 'remove'] as const

export type OutlierAction = (typeof OUTLIER_ACTIONS)[number]

const pointsPerOctave = z.number().int().nonnegative()
const positiveNumber = z.number().finite().positive()

/** Analysis settings with the defaults the workbench starts from. */
export const analysisSettingsSchema = z
  .object({
    importPpo: pointsPerOctave.default(0),
    exportPpo: pointsPerOctave.default(0),
    pinnedFrequency: positiveNumber.default(1000),
    interpolationPpo: pointsPerOctave.positive().default(96),
    smoothingType: z.enum(SMOOTHING_PRESET_NAMES).default('butterworth-8'),
    smoothingBandwidth: positiveNumber.default(1 / 3),
    smoothingResolution: pointsPerOctave.positive().default(96),
    meanSelected: z.boolean().default(true),
    medianSelected: z.boolean().default(true),
    outlierFenceIqr: z.number().finite().nonnegative().default(1.5),
    outlierAction: z.enum(OUTLIER_ACTIONS).default('none'),
    bestFitResolution: pointsPerOctave.positive().default(24),
    bestFitCriticalStart: positiveNumber.default(200),
    bestFitCriticalEnd: positiveNumber.default(5000),
    bestFitCriticalWeight: positiveNumber.default(1),
  })
  .strict()
  .refine((s) => s.bestFitCriticalStart < s.bestFitCriticalEnd, {
    message: 'bestFitCriticalStart must be below bestFitCriticalEnd',
    path: ['bestFitCriticalStart'],
  })

export type AnalysisSettings = z.output<typeof analysisSettingsSchema>

export type SettingKey = keyof AnalysisSettings

/** All setting keys for iteration. */
export const SETTING_KEYS: SettingKey[] = [
  'importPpo',
  'exportPpo',
  'pinnedFrequency',
  'interpolationPpo',
  'smoothingType',
  'smoothingBandwidth',
  'smoothingResolution',
  'meanSelected',
  'medianSelected',
  'outlierFenceIqr',
  'outlierAction',
  'bestFitResolution',
  'bestFitCriticalStart',
  'bestFitCriticalEnd',
  'bestFitCriticalWeight',
]

export const DEFAULT_SETTINGS: AnalysisSettings = analysisSettingsSchema.parse({})

export type Env = Record<string, string | undefined>

export const ENV_PREFIX = 'CURVELAB_'

/** `smoothingBandwidth` → `CURVELAB_SMOOTHING_BANDWIDTH` */
export function envKey(key: SettingKey): string {
  return ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase()
}

function readEnvValue(key: SettingKey, raw: string): unknown {
  const value = raw.trim()
  if (typeof DEFAULT_SETTINGS[key] === 'boolean') {
    if (value === 'true' || value === '1') return true
    if (value === 'false' || value === '0') return false
    return value
  }
  if (typeof DEFAULT_SETTINGS[key] === 'number') {
    // e.g. CURVELAB_SMOOTHING_BANDWIDTH=1/6
    const fraction = /^(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)$/.exec(value)
    if (fraction) return Number(fraction[1]) / Number(fraction[2])
    return value === '' ? value : Number(value)
  }
  return value
}

/** Settings found in the environment, still unvalidated. */
export function readEnvSettings(env: Env): Record<string, unknown> {
  const found: Record<string, unknown> = {}
  for (const key of SETTING_KEYS) {
    const raw = env[envKey(key)]
    if (raw !== undefined) found[key] = readEnvValue(key, raw)
  }
  return found
}

export class SettingsError extends Error {
  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(message)
    this.name = 'SettingsError'
  }
}

/**
 * Resolve settings: explicit overrides > environment > defaults. An override
 * set to undefined counts as not given.
 * Fails fast on the first invalid value, naming the setting.
 */
export function resolveSettings(overrides: Partial<AnalysisSettings> = {}, env: Env = process.env): AnalysisSettings {
  const given = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
  const parsed = analysisSettingsSchema.safeParse({ ...readEnvSettings(env), ...given })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const key = SETTING_KEYS.find((k) => k === issue?.path[0])
    if (key === undefined) {
      throw new SettingsError('settings', `Invalid settings: ${issue?.message ?? 'invalid value'}.`)
    }
    const source = key in given ? 'override' : `environment variable ${envKey(key)}`
    throw new SettingsError(key, `Invalid setting ${key} (${source}): ${issue?.message ?? 'invalid value'}.`)
  }
  return parsed.data
}
