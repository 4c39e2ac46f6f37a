import type {LogContext, LogSink} from '@rocicorp/logger';
import {createLogContext} from '../../shared/src/logging.ts';
import {err, ok, type Result} from '../../shared/src/result.ts';
import {BucketCursor, type Bucket} from './bucket-cursor.ts';
import {
  DEFAULT_CONFIG,
  histogramConfig,
  histogramConfigFromEnv,
  logConfigFromEnv,
  type HistogramConfig,
  type HistogramConfigInput,
} from './config.ts';
import {
  CountStore,
  MAX_COUNT,
  saturatingAdd,
  type MissedCounts,
} from './count-store.ts';
import {HistogramError, type HistogramErrorKind} from './errors.ts';
import {bucketGeometry, type BucketGeometry} from './geometry.ts';
import {IndexMapper} from './index-mapper.ts';
import {StatisticsEngine} from './statistics.ts';

export type HistogramOptions = {
  /** Defaults to warnings and errors on the console. */
  lc?: LogContext | undefined;
};

export type HistogramSummary = {
  entries: number;
  buckets: number;
  missed: MissedCounts;
  minimum: number | undefined;
  mean: number | undefined;
  maximum: number | undefined;
  stddev: number | undefined;
  p50: number | undefined;
  p90: number | undefined;
  p99: number | undefined;
  p999: number | undefined;
};

const defaultLogContext = createLogContext({
  log: {level: 'warn', format: 'text'},
});

/**
 * A fixed-memory log-linear histogram of positive integer samples.
 *
 * ```ts
 * const h = unwrap(Histogram.configured({maxValue: 1_000_000}));
 * for (const latency of latencies) {
 *   h.increment(latency);
 * }
 * const p99 = h.percentile(99);
 * ```
 *
 * All bucket storage is allocated by the factory. Failures are returned as
 * `Result`s carrying a {@link HistogramError}; samples that are rejected are
 * still counted in {@link entries} and in {@link missed}.
 */
export class Histogram implements Iterable<Bucket> {
  readonly config: HistogramConfig;
  readonly geometry: BucketGeometry;

  readonly #lc: LogContext;
  readonly #mapper: IndexMapper;
  readonly #store: CountStore;
  readonly #stats: StatisticsEngine;
  readonly #warned = new Set<HistogramErrorKind>();

  private constructor(
    lc: LogContext,
    config: HistogramConfig,
    geometry: BucketGeometry,
  ) {
    this.#lc = lc;
    this.config = config;
    this.geometry = geometry;
    this.#mapper = new IndexMapper(geometry);
    this.#store = new CountStore(geometry.bucketsTotal);
    this.#stats = new StatisticsEngine(this.#store, this.#mapper);
  }

  /** A histogram with the default configuration. */
  static create(
    options: HistogramOptions = {},
  ): Result<Histogram, HistogramError> {
    return Histogram.configured(DEFAULT_CONFIG, options);
  }

  /**
   * Configures a histogram from `<prefix>*` environment variables (see
   * `histogramConfigFromEnv`) and logs at `<prefix>LOG_LEVEL` in
   * `<prefix>LOG_FORMAT`, to `sink` when one is given.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    prefix = 'HISTOGRAM_',
    sink?: LogSink,
  ): Result<Histogram, HistogramError> {
    const lc = createLogContext(
      {log: logConfigFromEnv(env, prefix)},
      {},
      sink,
    );
    return Histogram.configured(histogramConfigFromEnv(env, prefix), {lc});
  }

  /**
   * Fails with `MemoryBudgetExceeded` when a non-zero `maxMemory` cannot hold
   * the bucket array, and with `GeometryTooLarge` when the layout has more
   * than 2^27 buckets or cannot be allocated. Malformed config values throw a
   * TypeError.
   */
  static configured(
    input: HistogramConfigInput,
    options: HistogramOptions = {},
  ): Result<Histogram, HistogramError> {
    const lc = (options.lc ?? defaultLogContext).withContext(
      'component',
      'histogram',
    );
    const config = histogramConfig(input);
    const geometry = bucketGeometry(config);
    if (!geometry.ok) {
      lc.warn?.('cannot allocate histogram', geometry.error);
      return geometry;
    }
    let histogram: Histogram;
    try {
      histogram = new Histogram(lc, config, geometry.value);
    } catch (e) {
      if (!(e instanceof RangeError)) {
        throw e;
      }
      const error = new HistogramError(
        'GeometryTooLarge',
        `cannot allocate ${geometry.value.bucketsTotal} buckets: ${e.message}`,
      );
      lc.warn?.('cannot allocate histogram', error);
      return err(error);
    }
    lc.debug?.(
      `allocated ${geometry.value.bucketsTotal} buckets`,
      `(${geometry.value.memoryUsed} bytes)`,
      config,
    );
    return ok(histogram);
  }

  /** Zeroes every counter. The bucket array is reused. */
  clear(): void {
    this.#store.clear();
    this.#warned.clear();
    this.#lc.debug?.('cleared');
  }

  increment(value: number): Result<void, HistogramError> {
    return this.record(value, 1);
  }

  /**
   * Adds `count` samples of `value`. `entries()` grows by `count` even when
   * the value is rejected.
   */
  record(value: number, count: number): Result<void, HistogramError> {
    if (!Number.isInteger(count) || count < 0 || count > MAX_COUNT) {
      return err(
        new HistogramError(
          'InvalidCount',
          `count must be an integer between 0 and ${MAX_COUNT}, got ${count}`,
        ),
      );
    }

    const store = this.#store;
    store.addEntries(count);

    if (value < 1) {
      store.addMissedSmall(count);
      return this.#reject(
        'ValueTooSmall',
        `sample value ${value} is below 1`,
        count,
      );
    }
    if (value > this.config.maxValue) {
      store.addMissedLarge(count);
      return this.#reject(
        'ValueTooLarge',
        `sample value ${value} exceeds maxValue ${this.config.maxValue}`,
        count,
      );
    }
    if (!Number.isInteger(value)) {
      store.addMissedUnknown(count);
      return this.#reject(
        'InvalidValue',
        `sample value ${value} is not an integer`,
        count,
      );
    }

    const index = this.#mapper.getIndex(value);
    if (index === undefined) {
      store.addMissedUnknown(count);
      return this.#reject(
        'UnknownError',
        `no bucket for sample value ${value}`,
        count,
      );
    }
    store.addAt(index, count);
    return ok(undefined);
  }

  #reject(
    kind: HistogramErrorKind,
    message: string,
    count: number,
  ): Result<never, HistogramError> {
    if (count > 0 && !this.#warned.has(kind)) {
      this.#warned.add(kind);
      this.#lc.warn?.(
        `${message}; further ${kind} samples are counted without logging`,
      );
    }
    return err(new HistogramError(kind, message));
  }

  /**
   * Re-records every bucket of `other` at its representative value. This is
   * lossy when the two geometries differ. `other`'s missed counters are not
   * carried over.
   *
   * @returns the number of samples this histogram rejected.
   */
  merge(other: Histogram): number {
    let rejected = 0;
    for (const bucket of other) {
      if (!this.record(bucket.value, bucket.count).ok) {
        rejected = saturatingAdd(rejected, bucket.count);
      }
    }
    if (!sameGeometry(this.geometry, other.geometry)) {
      this.#lc.debug?.(
        `merged ${other.bucketsTotal()} buckets into ${this.bucketsTotal()},`,
        `${rejected} samples rejected`,
      );
    }
    return rejected;
  }

  /** The count of the bucket holding `value`; `undefined` when out of range. */
  get(value: number): number | undefined {
    if (
      !Number.isInteger(value) ||
      value < 1 ||
      value > this.config.maxValue
    ) {
      return undefined;
    }
    const index = this.#mapper.getIndex(value);
    return index === undefined ? undefined : this.#store.countAt(index);
  }

  percentile(p: number): Result<number, HistogramError> {
    return this.#stats.percentile(p);
  }

  minimum(): Result<number, HistogramError> {
    return this.#stats.minimum();
  }

  maximum(): Result<number, HistogramError> {
    return this.#stats.maximum();
  }

  mean(): Result<number, HistogramError> {
    return this.#stats.mean();
  }

  stdvar(): Result<number, HistogramError> {
    return this.#stats.stdvar();
  }

  stddev(): number | undefined {
    return this.#stats.stddev();
  }

  /** Every sample recorded since the last clear, rejected ones included. */
  entries(): number {
    return this.#store.entries;
  }

  bucketsTotal(): number {
    return this.geometry.bucketsTotal;
  }

  missed(): MissedCounts {
    return this.#store.missed();
  }

  summary(): HistogramSummary {
    const value = (r: Result<number, HistogramError>) =>
      r.ok ? r.value : undefined;
    return {
      entries: this.entries(),
      buckets: this.bucketsTotal(),
      missed: this.missed(),
      minimum: value(this.minimum()),
      mean: value(this.mean()),
      maximum: value(this.maximum()),
      stddev: this.stddev(),
      p50: value(this.percentile(50)),
      p90: value(this.percentile(90)),
      p99: value(this.percentile(99)),
      p999: value(this.percentile(99.9)),
    };
  }

  /** A cursor over every bucket, independent of any other cursor. */
  cursor(): BucketCursor {
    return new BucketCursor(this.#store, this.#mapper);
  }

  [Symbol.iterator](): BucketCursor {
    return this.cursor();
  }

  toString(): string {
    return `(${this.entries()} total)`;
  }
}

function sameGeometry(a: BucketGeometry, b: BucketGeometry): boolean {
  return (
    a.bucketsInner === b.bucketsInner &&
    a.bucketsTotal === b.bucketsTotal &&
    a.linearMax === b.linearMax
  );
}
