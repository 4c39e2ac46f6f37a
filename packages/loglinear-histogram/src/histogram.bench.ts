import {generateMersenne53Randomizer} from '@faker-js/faker';
import {bench, describe} from 'vitest';
import {unwrap} from '../../shared/src/result.ts';
import {Histogram} from './histogram.ts';

const N = 1e5;
const randomizer = generateMersenne53Randomizer(42);

// Exponentially distributed latencies in nanoseconds, mean 2ms.
const latencies: number[] = [];
for (let i = 0; i < N; i++) {
  latencies.push(1 + Math.floor(-Math.log(1 - randomizer.next()) * 2e6));
}

const filled = unwrap(Histogram.create());
for (const v of latencies) {
  filled.increment(v);
}

describe('Histogram', () => {
  bench('increment', () => {
    const h = unwrap(Histogram.create());
    for (const v of latencies) {
      h.increment(v);
    }
  });

  bench('percentile', () => {
    filled.percentile(50);
    filled.percentile(99);
    filled.percentile(99.9);
  });

  bench('mean and stddev', () => {
    filled.mean();
    filled.stddev();
  });

  bench('merge', () => {
    const h = unwrap(Histogram.create());
    h.merge(filled);
  });
});
