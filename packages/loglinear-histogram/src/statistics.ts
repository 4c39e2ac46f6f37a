import {err, ok, type Result} from '../../shared/src/result.ts';
import type {ReadonlyCountStore} from './count-store.ts';
import {HistogramError} from './errors.ts';
import type {IndexMapper} from './index-mapper.ts';

/**
 * Percentile and moment queries. Each query is a full scan of the bucket
 * array; nothing is maintained incrementally.
 */
export class StatisticsEngine {
  readonly #store: ReadonlyCountStore;
  readonly #mapper: IndexMapper;

  constructor(store: ReadonlyCountStore, mapper: IndexMapper) {
    this.#store = store;
    this.#mapper = mapper;
  }

  /**
   * Returns the representative value of the bucket holding the `p`th
   * percentile, `p` in `[0, 100]`.
   *
   * Percentiles at or above 50 are found by scanning down from the top
   * bucket, so samples rejected as too large count against them; lower
   * percentiles scan up from the bottom and count samples rejected as too
   * small. When the rejected samples alone reach the target rank the query
   * fails with `Underflow` (bottom) or `Overflow` (top).
   */
  percentile(p: number): Result<number, HistogramError> {
    const store = this.#store;
    const total = store.entries;
    if (total < 1) {
      return noData();
    }
    if (!(p >= 0 && p <= 100)) {
      return err(
        new HistogramError(
          'InvalidPercentile',
          `percentile must be between 0 and 100, got ${p}`,
        ),
      );
    }

    let need = Math.min(Math.ceil(total * (p / 100)), total);
    need = total - need;

    let index = store.length - 1;
    let step = -1;
    let have = store.missedLarge;

    if (p < 50) {
      index = 0;
      step = 1;
      need = total - need;
      have = store.missedSmall;
    }

    if (need === 0) {
      need = 1;
    }

    if (have >= need) {
      return index === 0
        ? err(
            new HistogramError(
              'Underflow',
              `percentile ${p} falls among ${have} samples below the range`,
            ),
          )
        : err(
            new HistogramError(
              'Overflow',
              `percentile ${p} falls among ${have} samples above the range`,
            ),
          );
    }

    for (; index >= 0 && index < store.length; index += step) {
      have += store.countAt(index);
      if (have >= need) {
        return ok(this.#mapper.indexValue(index));
      }
    }
    return err(
      new HistogramError(
        'ScanFailed',
        `percentile ${p} not reached: ${have} of ${need} samples found in buckets`,
      ),
    );
  }

  minimum(): Result<number, HistogramError> {
    return this.percentile(0);
  }

  maximum(): Result<number, HistogramError> {
    return this.percentile(100);
  }

  /** Mean of the representative values, rounded up. */
  mean(): Result<number, HistogramError> {
    const store = this.#store;
    const total = store.entries;
    if (total < 1) {
      return noData();
    }

    let mean = 0;
    for (let index = 0; index < store.length; index++) {
      mean += (this.#mapper.indexValue(index) * store.countAt(index)) / total;
    }
    return ok(Math.ceil(mean));
  }

  /** Variance around the rounded-up mean, itself rounded up. */
  stdvar(): Result<number, HistogramError> {
    const store = this.#store;
    const total = store.entries;
    const meanResult = this.mean();
    if (!meanResult.ok) {
      return meanResult;
    }
    const m = meanResult.value;

    let stdvar = 0;
    for (let index = 0; index < store.length; index++) {
      const v = this.#mapper.indexValue(index);
      const c = store.countAt(index);
      stdvar += c * v * v - 2 * c * m * v + c * m * m;
    }
    stdvar /= total;

    return ok(Math.ceil(stdvar));
  }

  /** Square root of {@link stdvar}, rounded up; `undefined` when empty. */
  stddev(): number | undefined {
    const stdvar = this.stdvar();
    if (!stdvar.ok) {
      return undefined;
    }
    return Math.ceil(Math.sqrt(stdvar.value));
  }
}

function noData(): Result<never, HistogramError> {
  return err(new HistogramError('NoData', 'histogram has no entries'));
}
