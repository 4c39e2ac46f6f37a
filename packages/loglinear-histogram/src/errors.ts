export type HistogramErrorKind =
  // construction
  | 'MemoryBudgetExceeded'
  | 'GeometryTooLarge'
  // recording
  | 'ValueTooSmall'
  | 'ValueTooLarge'
  | 'InvalidValue'
  | 'InvalidCount'
  | 'UnknownError'
  // queries
  | 'NoData'
  | 'InvalidPercentile'
  | 'Underflow'
  | 'Overflow'
  | 'ScanFailed';

/**
 * Every failure a histogram reports. Failures are returned inside a `Result`
 * rather than thrown; switch on `kind` to tell them apart.
 */
export class HistogramError extends Error {
  override readonly name = 'HistogramError';
  readonly kind: HistogramErrorKind;

  constructor(kind: HistogramErrorKind, message: string) {
    super(message);
    this.kind = kind;
  }
}
