// Curve workbench: an ordered, named curve collection with the analysis
// operations wired to settings and structured logging.

export { Workbench, type WorkbenchOptions, type AggregateResult, type OutlierResult, type BestFitResult } from './workbench.js'
export { CurveRegistry, type CurveEntry } from './registry.js'
export { RegistryError, isRegistryError, type RegistryErrorKind } from './errors.js'
export { createLogger, type Logger, type LogSink, type LogFields } from './logger.js'
export { formatBestFitReport, BEST_FIT_TITLE } from './report.js'
