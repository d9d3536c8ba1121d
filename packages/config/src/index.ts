// Shared configuration: analysis settings with environment overrides, log level.

export {
  analysisSettingsSchema,
  resolveSettings,
  readEnvSettings,
  envKey,
  SettingsError,
  DEFAULT_SETTINGS,
  SETTING_KEYS,
  OUTLIER_ACTIONS,
  ENV_PREFIX,
  type AnalysisSettings,
  type SettingKey,
  type OutlierAction,
  type Env,
} from './settings.js'

export { resolveLogLevel, LOG_LEVELS, type LogLevel } from './log-level.js'
