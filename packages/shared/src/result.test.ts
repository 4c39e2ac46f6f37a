import {expect, test} from 'vitest';
import {err, ok, unwrap} from './result.ts';

test('ok and err are discriminated by the ok flag', () => {
  expect(ok(3)).toEqual({ok: true, value: 3});
  expect(err('nope')).toEqual({ok: false, error: 'nope'});
});

test('unwrap returns the value of an ok result', () => {
  expect(unwrap(ok('value'))).toBe('value');
});

test('unwrap rethrows an Error unchanged', () => {
  const e = new RangeError('out of range');
  expect(() => unwrap(err(e))).toThrow(e);
});

test('unwrap wraps a non-Error error', () => {
  expect(() => unwrap(err('plain'))).toThrow(new Error('plain'));
});
