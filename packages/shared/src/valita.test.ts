import {expect, test} from 'vitest';
import * as v from './valita.ts';

const schema = v.object({
  n: v.number(),
  s: v.string().optional(),
});

test('parse returns the value when it conforms', () => {
  expect(v.parse({n: 1}, schema)).toEqual({n: 1});
});

test('parse throws a TypeError when it does not conform', () => {
  expect(() => v.parse({n: 'one'}, schema)).toThrow(TypeError);
});

test('strict mode rejects unknown keys', () => {
  expect(v.is({n: 1, extra: true}, schema, 'strict')).toBe(false);
  expect(v.is({n: 1, extra: true}, schema, 'strip')).toBe(true);
});

test('test reports failures without throwing', () => {
  const res = v.test({}, schema);
  expect(res.ok).toBe(false);
  if (!res.ok) {
    expect(typeof res.error).toBe('string');
    expect(res.error.length).toBeGreaterThan(0);
  }
});
