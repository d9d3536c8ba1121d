import type { BestFitReport, CurveId } from '@curvelab/curve-core'

export const BEST_FIT_TITLE = '-- Standard deviation of weighted residual error (Swr) --'

function formatDeviation(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(4)
}

/**
 * Plain-text best-fit table. The reference line uses `referenceLabelOf`,
 * which the workbench sets to the positional prefix:
 *
 *   -- Standard deviation of weighted residual error (Swr) --
 *   Reference: 1    Amount of frequency points: 240
 *
 *   Item name       Swr
 *   1. Woofer A  0.0000
 */
export function formatBestFitReport(
  report: BestFitReport,
  labelOf: (id: CurveId) => string,
  referenceLabelOf: (id: CurveId) => string = labelOf,
): string {
  const reference = report.referenceId === undefined ? 'none' : referenceLabelOf(report.referenceId)
  const rows = report.entries.map((entry) => [labelOf(entry.id), formatDeviation(entry.standardDeviation)] as const)

  const nameWidth = Math.max('Item name'.length, ...rows.map(([name]) => name.length))
  const valueWidth = Math.max('Swr'.length, ...rows.map(([, value]) => value.length))
  const row = (name: string, value: string) => `${name.padEnd(nameWidth)}  ${value.padStart(valueWidth)}`

  return [
    BEST_FIT_TITLE,
    `Reference: ${reference}    Amount of frequency points: ${report.referencePointCount}`,
    '',
    row('Item name', 'Swr'),
    ...rows.map(([name, value]) => row(name, value)),
  ].join('\n')
}
