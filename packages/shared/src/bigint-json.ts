/**
 * JSON.stringify that writes bigint values as plain numbers instead of
 * throwing.
 */
export function stringify(value: unknown, space?: string | number): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === 'bigint' ? Number(v) : v),
    space,
  );
}
