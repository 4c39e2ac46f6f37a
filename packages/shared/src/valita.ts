import * as v from '@badrap/valita';

export * from '@badrap/valita';

export type ParseOptionsMode = 'passthrough' | 'strict' | 'strip';

/**
 * Parses `value` against `schema`, throwing a TypeError that describes the
 * first issue when it does not conform.
 */
export function parse<T>(
  value: unknown,
  schema: v.Type<T>,
  mode?: ParseOptionsMode,
): T {
  const res = test(value, schema, mode);
  if (!res.ok) {
    throw new TypeError(res.error);
  }
  return res.value;
}

export function is<T>(
  value: unknown,
  schema: v.Type<T>,
  mode?: ParseOptionsMode,
): value is T {
  return test(value, schema, mode).ok;
}

export function test<T>(
  value: unknown,
  schema: v.Type<T>,
  mode?: ParseOptionsMode,
): {ok: true; value: T} | {ok: false; error: string} {
  const res = schema.try(value, mode ? {mode} : undefined);
  if (res.ok) {
    return {ok: true, value: res.value};
  }
  return {ok: false, error: res.message};
}
