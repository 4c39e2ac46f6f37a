import {LogContext} from '@rocicorp/logger';
import {expect, test} from 'vitest';
import {TestLogSink} from '../../shared/src/logging-test-utils.ts';
import {
  Histogram,
  HistogramError,
  histogramConfigFromEnv,
  unwrap,
} from './mod.ts';

test('latency percentiles from an env-configured histogram', () => {
  const lc = new LogContext('info', undefined, new TestLogSink());
  const config = histogramConfigFromEnv({
    ['HISTOGRAM_MAX_VALUE']: '1000',
    ['HISTOGRAM_PRECISION']: '4',
  });
  const h = unwrap(Histogram.configured(config, {lc}));

  for (let v = 1; v <= 100; v++) {
    unwrap(h.increment(v));
  }

  expect(unwrap(h.percentile(50))).toBe(51);
  expect(unwrap(h.minimum())).toBe(1);
  expect(unwrap(h.maximum())).toBe(100);
  expect(unwrap(h.mean())).toBe(51);
});

test('failures unwrap to a HistogramError', () => {
  const h = unwrap(Histogram.create({lc: new LogContext('error')}));
  expect(() => unwrap(h.percentile(50))).toThrow(HistogramError);
  expect(() => unwrap(h.increment(0))).toThrow('sample value 0 is below 1');
});
