import type {ReadonlyCountStore} from './count-store.ts';
import type {IndexMapper} from './index-mapper.ts';

export type Bucket = {
  readonly id: number;
  /** Representative value of the bucket. */
  readonly value: number;
  readonly count: number;
};

/**
 * Walks every bucket in index order. Each cursor keeps its own position, so
 * any number can be open on the same histogram. After the last bucket the
 * cursor reports `done` once and rewinds, so it can be iterated again.
 *
 * Counts are read lazily; recording while a cursor is open is visible to the
 * buckets it has not reached yet.
 */
export class BucketCursor implements IterableIterator<Bucket> {
  readonly #store: ReadonlyCountStore;
  readonly #mapper: IndexMapper;
  #position = 0;

  constructor(store: ReadonlyCountStore, mapper: IndexMapper) {
    this.#store = store;
    this.#mapper = mapper;
  }

  get position(): number {
    return this.#position;
  }

  next(): IteratorResult<Bucket> {
    const id = this.#position;
    if (id >= this.#store.length) {
      this.#position = 0;
      return {done: true, value: undefined};
    }
    this.#position++;
    return {
      done: false,
      value: {
        id,
        value: this.#mapper.indexValue(id),
        count: this.#store.countAt(id),
      },
    };
  }

  reset(): void {
    this.#position = 0;
  }

  [Symbol.iterator](): BucketCursor {
    return this;
  }
}
