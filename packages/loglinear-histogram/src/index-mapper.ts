import {floorLog2, type BucketGeometry} from './geometry.ts';

/**
 * Maps sample values to bucket indexes and back.
 *
 * `getIndex` is exact in the linear region and lossy above it;
 * `indexValue` returns the representative (lowest, rounded up) value of a
 * bucket, which always maps back to the same index.
 */
export class IndexMapper {
  readonly #geometry: BucketGeometry;

  constructor(geometry: BucketGeometry) {
    this.#geometry = geometry;
  }

  /**
   * Returns the bucket index for `value`, or `undefined` if `value` is below
   * 1 or lands outside the bucket array. Callers reject values above
   * `maxValue` before asking.
   */
  getIndex(value: number): number | undefined {
    if (value < 1) {
      return undefined;
    }
    const {bucketsInner, bucketsTotal, linearMax, linearPower} =
      this.#geometry;

    if (value <= linearMax) {
      return value - 1;
    }

    const outer = floorLog2(value);
    const remain = value - 2 ** outer;
    // Products above 2^53 may have been rounded; redo them on bigints.
    const product = bucketsInner * remain;
    const inner =
      product <= Number.MAX_SAFE_INTEGER
        ? Math.floor(product / 2 ** outer)
        : Number((BigInt(bucketsInner) * BigInt(remain)) >> BigInt(outer));
    const index = linearMax + bucketsInner * (outer - linearPower) + inner;

    return index < bucketsTotal ? index : undefined;
  }

  indexValue(index: number): number {
    const {bucketsInner, linearMax, linearPower} = this.#geometry;
    if (index < linearMax) {
      return index + 1;
    }

    const logIndex = index - linearMax;
    const outer = Math.floor(logIndex / bucketsInner);
    const inner = logIndex - outer * bucketsInner;

    const base = 2 ** (outer + linearPower);
    return base + ceilDiv(inner * base, bucketsInner);
  }
}

/** `ceil(n / d)` for non-negative integers, exact for any `n` a number holds. */
function ceilDiv(n: number, d: number): number {
  if (n <= Number.MAX_SAFE_INTEGER) {
    const q = Math.floor(n / d);
    return q * d < n ? q + 1 : q;
  }
  const bn = BigInt(n);
  const bd = BigInt(d);
  return Number((bn + bd - 1n) / bd);
}
