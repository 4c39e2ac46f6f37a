import {err, ok, type Result} from '../../shared/src/result.ts';
import type {HistogramConfig} from './config.ts';
import {HistogramError} from './errors.ts';

/** Bytes accounted per bucket: a record of three 64-bit fields (id, value, count). */
export const BUCKET_RECORD_SIZE = 24;

/**
 * Largest layout that is allocated: 2^27 counters, a 1 GiB `Float64Array`.
 * Anything larger is rejected up front rather than left to the allocator.
 */
export const MAX_BUCKETS_TOTAL = 2 ** 27;

/**
 * The fixed bucket layout derived from a {@link HistogramConfig}.
 *
 * Values `1..linearMax` each get their own bucket. Above that, every
 * power-of-two octave `[2^k, 2^(k+1))` is split into `bucketsInner`
 * equal-width buckets, so the relative error stays at `1 / bucketsInner`
 * regardless of magnitude.
 */
export type BucketGeometry = {
  readonly bucketsInner: number;
  readonly bucketsOuter: number;
  readonly bucketsTotal: number;
  readonly memoryUsed: number;
  readonly linearMax: number;
  readonly linearPower: number;
};

export function bucketGeometry(
  config: HistogramConfig,
): Result<BucketGeometry, HistogramError> {
  const bucketsInner = config.radix ** config.precision;
  const linearPower = bitLength(bucketsInner);
  const linearMax = 2 ** linearPower - 1;
  const maxValuePower = bitLength(config.maxValue);
  const bucketsOuter = Math.max(0, maxValuePower - linearPower);
  const bucketsTotal = bucketsInner * bucketsOuter + linearMax;
  const memoryUsed = bucketsTotal * BUCKET_RECORD_SIZE;

  if (bucketsTotal > MAX_BUCKETS_TOTAL) {
    return err(
      new HistogramError(
        'GeometryTooLarge',
        `${bucketsTotal} buckets exceeds the limit of ${MAX_BUCKETS_TOTAL}`,
      ),
    );
  }
  if (config.maxMemory > 0 && config.maxMemory < memoryUsed) {
    return err(
      new HistogramError(
        'MemoryBudgetExceeded',
        `histogram needs ${memoryUsed} bytes but maxMemory is ${config.maxMemory}`,
      ),
    );
  }

  return ok(
    Object.freeze({
      bucketsInner,
      bucketsOuter,
      bucketsTotal,
      memoryUsed,
      linearMax,
      linearPower,
    }),
  );
}

/**
 * Position of the highest set bit of a positive safe integer, i.e.
 * `floor(log2(n))`. Computed on the bits directly since `Math.log2` rounds
 * up just below large powers of two.
 */
export function floorLog2(n: number): number {
  const high = Math.floor(n / 2 ** 32);
  if (high > 0) {
    return 63 - Math.clz32(high);
  }
  return 31 - Math.clz32(n);
}

/** Number of bits needed to represent `n`; 0 for 0. */
export function bitLength(n: number): number {
  return n < 1 ? 0 : floorLog2(n) + 1;
}
