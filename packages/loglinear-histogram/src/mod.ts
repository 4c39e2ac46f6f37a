export {BucketCursor, type Bucket} from './bucket-cursor.ts';
export {
  DEFAULT_CONFIG,
  histogramConfig,
  histogramConfigFromEnv,
  histogramConfigSchema,
  logConfigFromEnv,
  type HistogramConfig,
  type HistogramConfigInput,
} from './config.ts';
export {MAX_COUNT, type MissedCounts} from './count-store.ts';
export {HistogramError, type HistogramErrorKind} from './errors.ts';
export {
  BUCKET_RECORD_SIZE,
  bucketGeometry,
  type BucketGeometry,
} from './geometry.ts';
export {
  Histogram,
  type HistogramOptions,
  type HistogramSummary,
} from './histogram.ts';
export {err, ok, unwrap, type Result} from '../../shared/src/result.ts';
