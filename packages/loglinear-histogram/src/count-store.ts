/** Counters clamp here instead of losing integer precision. */
export const MAX_COUNT = Number.MAX_SAFE_INTEGER;

export function saturatingAdd(a: number, b: number): number {
  return Math.min(a + b, MAX_COUNT);
}

export type MissedCounts = {
  /** Samples below 1. */
  readonly small: number;
  /** Samples above `maxValue`. */
  readonly large: number;
  /** Samples that could not be placed in a bucket. */
  readonly unknown: number;
};

export interface ReadonlyCountStore {
  readonly length: number;
  readonly entries: number;
  readonly missedSmall: number;
  readonly missedLarge: number;
  readonly missedUnknown: number;
  countAt(index: number): number;
}

/**
 * A fixed array of saturating bucket counters plus totals for samples that
 * did not land in a bucket. Storage is allocated once.
 */
export class CountStore implements ReadonlyCountStore {
  readonly #counts: Float64Array;
  #entries = 0;
  #missedSmall = 0;
  #missedLarge = 0;
  #missedUnknown = 0;

  constructor(length: number) {
    this.#counts = new Float64Array(length);
  }

  get length(): number {
    return this.#counts.length;
  }

  get entries(): number {
    return this.#entries;
  }

  get missedSmall(): number {
    return this.#missedSmall;
  }

  get missedLarge(): number {
    return this.#missedLarge;
  }

  get missedUnknown(): number {
    return this.#missedUnknown;
  }

  countAt(index: number): number {
    return this.#counts[index];
  }

  addEntries(count: number): void {
    this.#entries = saturatingAdd(this.#entries, count);
  }

  addMissedSmall(count: number): void {
    this.#missedSmall = saturatingAdd(this.#missedSmall, count);
  }

  addMissedLarge(count: number): void {
    this.#missedLarge = saturatingAdd(this.#missedLarge, count);
  }

  addMissedUnknown(count: number): void {
    this.#missedUnknown = saturatingAdd(this.#missedUnknown, count);
  }

  addAt(index: number, count: number): void {
    this.#counts[index] = saturatingAdd(this.#counts[index], count);
  }

  missed(): MissedCounts {
    return {
      small: this.#missedSmall,
      large: this.#missedLarge,
      unknown: this.#missedUnknown,
    };
  }

  clear(): void {
    this.#counts.fill(0);
    this.#entries = 0;
    this.#missedSmall = 0;
    this.#missedLarge = 0;
    this.#missedUnknown = 0;
  }
}
