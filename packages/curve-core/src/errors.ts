// ---------------------------------------------------------------------------
// Typed failures
// ---------------------------------------------------------------------------
// Every operation either returns fresh values or throws one of these before
// touching anything.

export type CurveErrorKind =
  | 'InvalidAxis'
  | 'ShapeMismatch'
  | 'NonNumeric'
  | 'InsufficientData'
  | 'InvalidResolution'
  | 'UnsupportedAlgorithm'
  | 'InsufficientCurves';

export class CurveError extends Error {
  constructor(
    public readonly kind: CurveErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'CurveError';
  }
}

/** Narrow an unknown throwable to a CurveError, optionally of one kind. */
export function isCurveError(error: unknown, kind?: CurveErrorKind): error is CurveError {
  if (!(error instanceof CurveError)) return false;
  return kind === undefined || error.kind === kind;
}
