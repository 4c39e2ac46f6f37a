import {parseLogConfig, type LogConfig} from '../../shared/src/logging.ts';
import * as v from '../../shared/src/valita.ts';

/** The inner bucket count, `radix ** precision`, is a 32-bit quantity. */
export const MAX_BUCKETS_INNER = 2 ** 32 - 1;

const MAX_MEMORY = 2 ** 32 - 1;

export type HistogramConfig = {
  /** Significant digits (in `radix`) kept exact within each octave. */
  readonly precision: number;
  /** Upper bound in bytes for the bucket array; 0 means unbounded. */
  readonly maxMemory: number;
  /** Largest sample value that is stored. */
  readonly maxValue: number;
  readonly radix: number;
};

export const DEFAULT_CONFIG: HistogramConfig = Object.freeze({
  precision: 3,
  maxMemory: 0,
  maxValue: 60_000_000_000,
  radix: 10,
});

function integer(min: number, max: number) {
  return v
    .number()
    .assert(
      n => Number.isInteger(n) && n >= min && n <= max,
      `must be an integer between ${min} and ${max}`,
    );
}

export const histogramConfigSchema = v.object({
  precision: integer(0, 31).optional(),
  maxMemory: integer(0, MAX_MEMORY).optional(),
  maxValue: integer(1, Number.MAX_SAFE_INTEGER).optional(),
  radix: integer(2, MAX_BUCKETS_INNER).optional(),
});

export type HistogramConfigInput = v.Infer<typeof histogramConfigSchema>;

/**
 * Validates `input`, fills in defaults and returns a frozen config. Throws a
 * TypeError for malformed input.
 */
export function histogramConfig(input: unknown = {}): HistogramConfig {
  const parsed = v.parse(input, histogramConfigSchema, 'strict');
  const config = {...DEFAULT_CONFIG, ...withoutUndefined(parsed)};
  if (config.radix ** config.precision > MAX_BUCKETS_INNER) {
    throw new TypeError(
      `radix ** precision must not exceed ${MAX_BUCKETS_INNER}, got ${config.radix} ** ${config.precision}`,
    );
  }
  return Object.freeze(config);
}

const envNumber = v.string().chain(s => {
  const n = Number(s);
  return s.trim() !== '' && Number.isFinite(n)
    ? v.ok(n)
    : v.err(`expected a number, got "${s}"`);
});

/**
 * Reads `<prefix>PRECISION`, `<prefix>MAX_MEMORY`, `<prefix>MAX_VALUE` and
 * `<prefix>RADIX`. Unset variables take their defaults.
 */
export function histogramConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix = 'HISTOGRAM_',
): HistogramConfig {
  const read = (name: string): number | undefined => {
    const raw = env[prefix + name];
    if (raw === undefined) {
      return undefined;
    }
    const res = v.test(raw, envNumber);
    if (!res.ok) {
      throw new TypeError(`${prefix}${name}: ${res.error}`);
    }
    return res.value;
  };
  return histogramConfig({
    precision: read('PRECISION'),
    maxMemory: read('MAX_MEMORY'),
    maxValue: read('MAX_VALUE'),
    radix: read('RADIX'),
  });
}

/**
 * Reads `<prefix>LOG_LEVEL` (`debug`, `info`, `warn` or `error`) and
 * `<prefix>LOG_FORMAT` (`text` or `json`).
 */
export function logConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix = 'HISTOGRAM_',
): LogConfig {
  return parseLogConfig({
    level: env[prefix + 'LOG_LEVEL'],
    format: env[prefix + 'LOG_FORMAT'],
  });
}

function withoutUndefined(input: HistogramConfigInput): Partial<HistogramConfig> {
  const out: {-readonly [K in keyof HistogramConfig]?: number} = {};
  if (input.precision !== undefined) out.precision = input.precision;
  if (input.maxMemory !== undefined) out.maxMemory = input.maxMemory;
  if (input.maxValue !== undefined) out.maxValue = input.maxValue;
  if (input.radix !== undefined) out.radix = input.radix;
  return out;
}
