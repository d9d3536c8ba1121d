import type { CurveId } from '@curvelab/curve-core'

export type RegistryErrorKind = 'UnknownCurve' | 'DuplicateCurve' | 'SelectionRequired'

export class RegistryError extends Error {
  constructor(
    public readonly kind: RegistryErrorKind,
    message: string,
    public readonly ids: readonly CurveId[] = [],
  ) {
    super(message)
    this.name = 'RegistryError'
  }
}

export function isRegistryError(error: unknown, kind?: RegistryErrorKind): error is RegistryError {
  if (!(error instanceof RegistryError)) return false
  return kind === undefined || error.kind === kind
}
