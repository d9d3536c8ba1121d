import { describe, it, expect } from 'vitest'
import { fullName, isCurveError, logFrequencyGrid, type CurveId } from '@curvelab/curve-core'
import type { AnalysisSettings } from '@curvelab/config'
import { Workbench } from '../workbench.js'
import { createLogger } from '../logger.js'
import { isRegistryError } from '../errors.js'
import { captureSink, type CaptureSink } from './helpers.js'

function setup(settings: Partial<AnalysisSettings> = {}): { bench: Workbench; sink: CaptureSink } {
  const sink = captureSink()
  const bench = new Workbench({ settings, env: {}, logger: createLogger({ level: 'debug', sink }) })
  return { bench, sink }
}

function labels(bench: Workbench): string[] {
  return bench.registry.entries().map((e) => fullName(e.name))
}

function amplitudesOf(bench: Workbench, id: CurveId): readonly number[] {
  return bench.registry.get(id).curve.amplitudes
}

describe('Workbench import and export', () => {
  it('imports raw sequences as they are when importPpo is 0', () => {
    const { bench } = setup()
    const id = bench.importCurve(['100', '200', '400'], [1, 2, 3], 'Woofer A')
    expect(id).toBe('curve-1')
    expect(labels(bench)).toEqual(['1. Woofer A'])
    expect(bench.exportTable(id)).toEqual(['100\t1', '200\t2', '400\t3'])
  })

  it('resamples on import', () => {
    const { bench } = setup({ importPpo: 1 })
    const id = bench.importCurve([100, 1000], [0, 10], 'Line')
    expect(bench.registry.get(id).curve.frequencies).toEqual([125, 250, 500, 1000])
  })

  it('resamples on export', () => {
    const { bench } = setup({ exportPpo: 1 })
    const id = bench.importPairs([[250, 1], [500, 2], [1000, 3]], 'On grid')
    expect(bench.exportCurve(id)).toEqual([[250, 1], [500, 2], [1000, 3]])
  })

  it('logs a rejected import and leaves the registry untouched', () => {
    const { bench, sink } = setup()
    expect(() => bench.importCurve([200, 100], [1, 2], 'Bad')).toThrow(
      'Frequencies must be strictly increasing: 100 at index 1 follows 200.',
    )
    expect(bench.registry.size).toBe(0)
    const [event] = sink.events()
    expect(event).toMatchObject({ level: 'error', msg: 'import failed', kind: 'InvalidAxis' })
  })
})

describe('Workbench processing', () => {
  it('inserts interpolated curves right after their source', () => {
    const { bench } = setup({ interpolationPpo: 1 })
    const a = bench.importCurve([100, 1000], [0, 10], 'A')
    bench.importCurve([100, 1000], [0, 10], 'B')
    const [derived] = bench.interpolate([a])
    expect(labels(bench)).toEqual(['1. A', '2. A - interpolated to 1 ppo', '3. B'])
    expect(bench.registry.get(derived).curve.frequencies).toEqual([125, 250, 500, 1000])
  })

  it('smooths with the configured preset and names the result', () => {
    const { bench } = setup({ smoothingType: 'rectangular', smoothingBandwidth: 2 })
    const id = bench.importCurve([100, 200, 400, 800], [0, 3, 6, 9], 'Driver')
    const [smoothed] = bench.smooth([id])
    expect(labels(bench)).toEqual(['1. Driver', '2. Driver - smoothed 2 oct, rectangular'])
    expect(amplitudesOf(bench, smoothed)).toEqual([1.5, 3, 6, 7.5])
  })

  it('requires a selection', () => {
    const { bench } = setup()
    try {
      bench.smooth([])
      expect.unreachable()
    } catch (error) {
      expect(isRegistryError(error, 'SelectionRequired')).toBe(true)
    }
  })
})

describe('Workbench group statistics', () => {
  it('puts mean and median at the top under the shared base name', () => {
    const { bench } = setup()
    const ids = [bench.importCurve([1000], [80], 'Sample run 1'), bench.importCurve([1000], [90], 'Sample run 2')]
    const { meanId, medianId } = bench.meanAndMedian(ids)
    expect(labels(bench)).toEqual([
      '1. Sample run - mean, 2 curves',
      '2. Sample run - median, 2 curves',
      '3. Sample run 1',
      '4. Sample run 2',
    ])
    expect(meanId && amplitudesOf(bench, meanId)).toEqual([85])
    expect(medianId && amplitudesOf(bench, medianId)).toEqual([85])
  })

  it('honours the mean and median selection', () => {
    const { bench } = setup({ meanSelected: false })
    const ids = [bench.importCurve([1000], [80], 'X 1'), bench.importCurve([1000], [90], 'X 2')]
    const result = bench.meanAndMedian(ids)
    expect(result.meanId).toBeUndefined()
    expect(labels(bench)[0]).toBe('1. X - median, 2 curves')
  })

  it('fails on a single curve without adding anything', () => {
    const { bench, sink } = setup()
    const id = bench.importCurve([1000], [80], 'Lonely')
    expect(() => bench.meanAndMedian([id])).toThrow(/A minimum of 2 curves/)
    expect(bench.registry.size).toBe(1)
    expect(sink.events().at(-1)).toMatchObject({ level: 'error', kind: 'InsufficientCurves' })
  })

  const units: Array<[string, number]> = [
    ['Unit A', 80],
    ['Unit B', 81],
    ['Unit C', 82],
    ['Unit D', 120],
  ]

  it('adds the median and fences and hides outliers', () => {
    const { bench } = setup({ outlierAction: 'hide' })
    const ids = units.map(([name, level]) => bench.importCurve([1000], [level], name))
    const result = bench.detectOutliers(ids)
    expect(result.outliers).toEqual([ids[3]])
    expect(labels(bench).slice(0, 3)).toEqual([
      '1. Unit - median, 4 curves - calculated before hiding outliers',
      '2. Unit - -1.5xIQR, 4 curves - calculated before hiding outliers',
      '3. Unit - +1.5xIQR, 4 curves - calculated before hiding outliers',
    ])
    expect(amplitudesOf(bench, result.upperFenceId)).toEqual([107.625])
    expect(bench.registry.get(ids[3]).visible).toBe(false)
  })

  it('removes outliers when asked to', () => {
    const { bench } = setup({ outlierAction: 'remove' })
    const ids = units.map(([name, level]) => bench.importCurve([1000], [level], name))
    bench.detectOutliers(ids)
    expect(bench.registry.size).toBe(6)
    expect(bench.registry.has(ids[3])).toBe(false)
    expect(labels(bench)[0]).toBe('1. Unit - median, 4 curves - calculated before removing outliers')
  })

  it('names no action when hiding finds no outliers', () => {
    const { bench } = setup({ outlierAction: 'hide' })
    const ids = units.slice(0, 3).map(([name, level]) => bench.importCurve([1000], [level], name))
    const result = bench.detectOutliers(ids)
    expect(result.outliers).toEqual([])
    expect(labels(bench).slice(0, 3)).toEqual([
      '1. Unit - median, 3 curves',
      '2. Unit - -1.5xIQR, 3 curves',
      '3. Unit - +1.5xIQR, 3 curves',
    ])
    expect(bench.registry.visibleEntries().length).toBe(6)
  })

  it('leaves outliers alone by default', () => {
    const { bench } = setup()
    const ids = units.map(([name, level]) => bench.importCurve([1000], [level], name))
    bench.detectOutliers(ids)
    expect(labels(bench)[1]).toBe('2. Unit - -1.5xIQR, 4 curves')
    expect(bench.registry.get(ids[3]).visible).toBe(true)
  })
})

describe('Workbench best fit', () => {
  const grid = logFrequencyGrid(20, 20000, 12, 1000)
  const shape = grid.map((f) => 80 + 5 * Math.sin(Math.log2(f)))

  function loaded(settings: Partial<AnalysisSettings> = {}) {
    const { bench, sink } = setup({ bestFitResolution: 12, ...settings })
    const ref = bench.importCurve(grid, shape, 'Reference')
    const louder = bench.importCurve(grid, shape.map((a) => a + 3), 'Louder')
    const outside = bench.importCurve([30000, 40000], [80, 80], 'Ultrasonic')
    return { bench, sink, ref, louder, outside }
  }

  it('needs a reference', () => {
    const { bench } = loaded()
    expect(() => bench.bestFit()).toThrow('Best fit needs a reference curve.')
  })

  it('ranks every curve against the registry reference', () => {
    const { bench, ref, louder, outside } = loaded()
    bench.registry.setReference(ref)
    const { report, text } = bench.bestFit()
    expect(report.entries.map((e) => e.id)).toEqual([ref, louder, outside])
    expect(report.entries[0].standardDeviation).toBe(0)
    expect(report.referencePointCount).toBe(grid.length)

    const lines = text.split('\n')
    expect(lines[1]).toBe(`Reference: 1    Amount of frequency points: ${grid.length}`)
    expect(lines[4]).toBe('1. Reference   0.0000')
    expect(lines[6]).toBe('3. Ultrasonic     n/a')
  })

  it('warns when the critical band holds no grid point', () => {
    const { bench, sink, ref } = loaded({ bestFitCriticalStart: 30000, bestFitCriticalEnd: 40000 })
    const { report } = bench.bestFit(ref)
    expect(report.weighting.applied).toBe(false)
    expect(sink.events().some((e) => e['level'] === 'warn')).toBe(true)
  })

  it('reports an unknown reference id', () => {
    const { bench } = loaded()
    try {
      bench.bestFit('nope')
      expect.unreachable()
    } catch (error) {
      expect(isRegistryError(error, 'UnknownCurve')).toBe(true)
      expect(isCurveError(error)).toBe(false)
    }
  })
})
