/**
 * Curve workbench: the registry, the analysis settings and a logger.
 *
 * Every operation computes all of its results before it touches the
 * registry, so a failure leaves the collection as it was. Operations are
 * logged on completion with their duration; failures are logged at error
 * level and rethrown.
 */

import {
  baseAndSuffixes,
  curveFromPairs,
  curveName,
  curvePoints,
  derivedName,
  iqrFences,
  meanAndMedian,
  rankBestFit,
  representativeBaseName,
  resampleToGrid,
  smoothCurve,
  smoothingAlgorithm,
  smoothingDescriptor,
  fullName,
  validateCurve,
  type BestFitReport,
  type Curve,
  type CurveId,
  type CurveName,
} from '@curvelab/curve-core'
import { resolveLogLevel, resolveSettings, type AnalysisSettings, type Env } from '@curvelab/config'
import { RegistryError } from './errors.js'
import { createLogger, type LogFields, type Logger } from './logger.js'
import { CurveRegistry } from './registry.js'
import { formatBestFitReport } from './report.js'

export interface WorkbenchOptions {
  /** Explicit settings; take precedence over the environment. */
  settings?: Partial<AnalysisSettings>
  env?: Env
  logger?: Logger
  registry?: CurveRegistry
}

export interface AggregateResult {
  meanId?: CurveId
  medianId?: CurveId
}

export interface OutlierResult {
  medianId: CurveId
  lowerFenceId: CurveId
  upperFenceId: CurveId
  outliers: CurveId[]
}

export interface BestFitResult {
  report: BestFitReport
  text: string
}

function asName(name: string | CurveName): CurveName {
  return typeof name === 'string' ? curveName(name) : name
}

function curvesLabel(count: number): string {
  return `${count} curves`
}

export class Workbench {
  readonly registry: CurveRegistry
  readonly settings: AnalysisSettings
  private readonly log: Logger

  constructor(options: WorkbenchOptions = {}) {
    const env = options.env ?? process.env
    this.settings = resolveSettings(options.settings ?? {}, env)
    this.registry = options.registry ?? new CurveRegistry()
    this.log = options.logger ?? createLogger({ level: resolveLogLevel(env) })
  }

  // -------------------------------------------------------------------------
  // Import / export
  // -------------------------------------------------------------------------

  /** Validate a pair of raw sequences, resample at `importPpo`, and append it. */
  importCurve(rawFrequencies: unknown, rawAmplitudes: unknown, name: string | CurveName): CurveId {
    return this.run('import', {}, () => this.addImported(validateCurve(rawFrequencies, rawAmplitudes), name))
  }

  /** Same as importCurve for `[frequency, amplitude]` rows. */
  importPairs(pairs: unknown, name: string | CurveName): CurveId {
    return this.run('import', {}, () => this.addImported(curveFromPairs(pairs), name))
  }

  /** `[frequency, amplitude]` rows, resampled at `exportPpo`. */
  exportCurve(id: CurveId): Array<[number, number]> {
    return this.run('export', { id }, () => {
      const { curve } = this.registry.get(id)
      return curvePoints(resampleToGrid(curve, this.settings.exportPpo, this.settings.pinnedFrequency))
    })
  }

  /** Tab-separated text lines, one per point. */
  exportTable(id: CurveId): string[] {
    return this.exportCurve(id).map(([f, a]) => `${f}\t${a}`)
  }

  // -------------------------------------------------------------------------
  // Per-curve processing
  // -------------------------------------------------------------------------

  interpolate(ids: readonly CurveId[]): CurveId[] {
    const ppo = this.settings.interpolationPpo
    return this.run('interpolate', { count: ids.length, ppo }, () =>
      this.deriveEach(ids, `interpolated to ${ppo} ppo`, (curve) =>
        resampleToGrid(curve, ppo, this.settings.pinnedFrequency),
      ),
    )
  }

  smooth(ids: readonly CurveId[]): CurveId[] {
    const { smoothingType, smoothingBandwidth, smoothingResolution } = this.settings
    return this.run('smooth', { count: ids.length, type: smoothingType }, () => {
      const algorithm = smoothingAlgorithm(smoothingType, {
        bandwidth: smoothingBandwidth,
        resolution: smoothingResolution,
        pinnedFrequency: this.settings.pinnedFrequency,
      })
      return this.deriveEach(ids, smoothingDescriptor(algorithm), (curve) => smoothCurve(curve, algorithm))
    })
  }

  // -------------------------------------------------------------------------
  // Group statistics
  // -------------------------------------------------------------------------

  /** Mean and/or median of the selection, inserted at the top. */
  meanAndMedian(ids: readonly CurveId[]): AggregateResult {
    return this.run('mean_and_median', { count: ids.length }, () => {
      const { meanSelected, medianSelected } = this.settings
      if (!meanSelected && !medianSelected) {
        this.log.warn('mean_and_median: neither mean nor median selected')
        return {}
      }

      const curves = this.selection(ids)
      const result = meanAndMedian(curves)
      const base = this.groupBaseName(ids)
      const count = curvesLabel(curves.size)

      const out: AggregateResult = {}
      let index = 0
      if (meanSelected) {
        out.meanId = this.registry.add(result.mean, curveName(base, [`mean, ${count}`]), { index: index++ })
      }
      if (medianSelected) {
        out.medianId = this.registry.add(result.median, curveName(base, [`median, ${count}`]), { index })
      }
      return out
    })
  }

  /**
   * IQR fences of the selection. Median, lower and upper fence go to the
   * top; outliers are then hidden or removed according to `outlierAction`.
   */
  detectOutliers(ids: readonly CurveId[]): OutlierResult {
    const k = this.settings.outlierFenceIqr
    const action = this.settings.outlierAction
    return this.run('detect_outliers', { count: ids.length, k, action }, () => {
      const curves = this.selection(ids)
      const fences = iqrFences(curves, k)
      const base = this.groupBaseName(ids)
      const count = curvesLabel(curves.size)

      const acted = fences.outliers.length > 0
      const actionSuffix =
        acted && action === 'hide'
          ? ['calculated before hiding outliers']
          : acted && action === 'remove'
            ? ['calculated before removing outliers']
            : []
      const named = (descriptor: string) => curveName(base, [descriptor, ...actionSuffix])

      const medianId = this.registry.add(fences.median, named(`median, ${count}`), { index: 0 })
      const lowerFenceId = this.registry.add(fences.lowerFence, named(`-${k.toFixed(1)}xIQR, ${count}`), { index: 1 })
      const upperFenceId = this.registry.add(fences.upperFence, named(`+${k.toFixed(1)}xIQR, ${count}`), { index: 2 })

      if (acted) {
        if (action === 'hide') this.registry.hide(fences.outliers)
        if (action === 'remove') this.registry.remove(fences.outliers)
      }
      this.log.debug('detect_outliers: classified', { outliers: fences.outliers })

      return { medianId, lowerFenceId, upperFenceId, outliers: fences.outliers }
    })
  }

  // -------------------------------------------------------------------------
  // Best fit
  // -------------------------------------------------------------------------

  /** Rank every curve against the reference (argument or the registry's). */
  bestFit(referenceId?: CurveId): BestFitResult {
    return this.run('best_fit', {}, () => {
      const id = referenceId ?? this.registry.reference()?.id
      if (id === undefined) {
        throw new RegistryError('SelectionRequired', 'Best fit needs a reference curve.')
      }
      const reference = this.registry.get(id)

      const candidates = new Map(this.registry.entries().map((entry): [CurveId, Curve] => [entry.id, entry.curve]))
      const report = rankBestFit(reference.curve, candidates, {
        referenceId: id,
        resolution: this.settings.bestFitResolution,
        pinnedFrequency: this.settings.pinnedFrequency,
        criticalBand: {
          start: this.settings.bestFitCriticalStart,
          end: this.settings.bestFitCriticalEnd,
          weight: this.settings.bestFitCriticalWeight,
        },
      })

      if (!report.weighting.applied) {
        this.log.warn('best_fit: no grid point inside the critical band, weighting skipped', {
          start: this.settings.bestFitCriticalStart,
          end: this.settings.bestFitCriticalEnd,
        })
      }

      const text = formatBestFitReport(
        report,
        (entryId) => fullName(this.registry.get(entryId).name),
        (entryId) => this.registry.get(entryId).name.prefix ?? '',
      )
      return { report, text }
    })
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private addImported(curve: Curve, name: string | CurveName): CurveId {
    const { importPpo, pinnedFrequency } = this.settings
    const stored = importPpo > 0 ? resampleToGrid(curve, importPpo, pinnedFrequency) : curve
    const id = this.registry.add(stored, asName(name))
    this.log.debug('import: added', { id, points: stored.frequencies.length })
    return id
  }

  private selection(ids: readonly CurveId[]): Map<CurveId, Curve> {
    if (ids.length === 0) throw new RegistryError('SelectionRequired', 'No curves selected.')
    return new Map(ids.map((id): [CurveId, Curve] => [id, this.registry.get(id).curve]))
  }

  private groupBaseName(ids: readonly CurveId[]): string {
    return representativeBaseName(ids.map((id) => baseAndSuffixes(this.registry.get(id).name)))
  }

  /** Derived curve per source, each inserted right after its source. */
  private deriveEach(ids: readonly CurveId[], descriptor: string, transform: (curve: Curve) => Curve): CurveId[] {
    const sources = this.selection(ids)
    const results = [...sources].map(([id, curve]) => ({ id, curve: transform(curve) }))
    return results.map(({ id, curve }) => {
      const source = this.registry.get(id)
      return this.registry.add(curve, derivedName(source.name, descriptor), {
        index: this.registry.indexOf(id) + 1,
      })
    })
  }

  private run<T>(operation: string, fields: LogFields, fn: () => T): T {
    const start = performance.now()
    try {
      const result = fn()
      this.log.info(operation, { ...fields, ms: Number((performance.now() - start).toFixed(1)) })
      return result
    } catch (error) {
      this.log.error(`${operation} failed`, {
        ...fields,
        error: error instanceof Error ? error.message : String(error),
        kind: error instanceof Error && 'kind' in error ? error.kind : undefined,
      })
      throw error
    }
  }
}
