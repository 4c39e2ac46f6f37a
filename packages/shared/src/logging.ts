/* eslint-disable no-console */
import {
  type Context,
  type LogLevel,
  type LogSink,
  LogContext,
} from '@rocicorp/logger';
import chalk from 'chalk';
import {pid} from 'node:process';
import {stringify} from './bigint-json.ts';
import * as v from './valita.ts';

const logLevelSchema = v.union(
  v.literal('debug'),
  v.literal('info'),
  v.literal('warn'),
  v.literal('error'),
);

export const logConfigSchema = v.object({
  level: logLevelSchema.optional(),
  format: v.union(v.literal('text'), v.literal('json')).optional(),
});

export type LogConfig = {
  level: LogLevel;
  format: 'text' | 'json';
};

/** Validates a partial log config and fills in `info` / `text`. */
export function parseLogConfig(input: unknown = {}): LogConfig {
  const {level = 'info', format = 'text'} = v.parse(input, logConfigSchema);
  return {level, format};
}

const colors = {
  debug: chalk.grey,
  info: chalk.whiteBright,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Writes colorized output to the console. Only useful when stdout is a TTY.
 */
export const colorConsole = {
  log: (...args: unknown[]) => {
    console.log(...args);
  },
  debug: (...args: unknown[]) => {
    console.debug(colors.debug(...args));
  },
  info: (...args: unknown[]) => {
    console.info(colors.info(...args));
  },
  warn: (...args: unknown[]) => {
    console.warn(colors.warn(...args));
  },
  error: (...args: unknown[]) => {
    console.error(colors.error(...args));
  },
};

export const consoleSink: LogSink = {
  log(level, context, ...args) {
    colorConsole[level](
      ...stringifyContext(context),
      ...args.map(stringifyValue),
    );
  },
};

export function getLogSink(config: LogConfig): LogSink {
  return config.format === 'json' ? consoleJsonLogSink : consoleSink;
}

export function createLogContext(
  {log}: {log: LogConfig},
  context: Context = {},
  sink = getLogSink(log),
): LogContext {
  return new LogContext(log.level, {pid, ...context}, sink);
}

export const consoleJsonLogSink: LogSink = {
  log(level: LogLevel, context: Context | undefined, ...args: unknown[]): void {
    // A trailing object or Error is merged into the record as fields.
    const lastObj = errorOrObject(args.at(-1));
    if (lastObj) {
      args.pop();
    }
    const message = args.length
      ? {
          message: args.map(stringifyValue).join(' '),
        }
      : undefined;

    console[level](
      stringify({
        level: level.toUpperCase(),
        ...context,
        ...lastObj,
        ...message,
      }),
    );
  },
};

export function errorOrObject(v: unknown): object | undefined {
  if (v instanceof Error) {
    return {
      ...v, // subclasses may carry enumerable fields such as `kind`
      name: v.name,
      errorMsg: v.message,
      stack: v.stack,
      ...('cause' in v ? {cause: errorOrObject(v.cause)} : null),
    };
  }
  if (v && typeof v === 'object') {
    return v;
  }
  return undefined;
}

export function stringifyContext(context: Context | undefined): string[] {
  const args = [];
  for (const [k, v] of Object.entries(context ?? {})) {
    const arg = v === undefined ? k : `${k}=${String(v)}`;
    args.push(arg);
  }
  return args;
}

function stringifyValue(v: unknown): string {
  if (typeof v === 'string') {
    return v;
  }
  return stringify(v);
}
