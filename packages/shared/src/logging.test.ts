import {LogContext} from '@rocicorp/logger';
import {afterEach, describe, expect, test, vi} from 'vitest';
import {
  consoleJsonLogSink,
  createLogContext,
  errorOrObject,
  getLogSink,
  consoleSink,
  parseLogConfig,
  stringifyContext,
} from './logging.ts';
import {TestLogSink} from './logging-test-utils.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseLogConfig', () => {
  test('fills in defaults', () => {
    expect(parseLogConfig()).toEqual({level: 'info', format: 'text'});
  });

  test('keeps explicit values', () => {
    expect(parseLogConfig({level: 'debug', format: 'json'})).toEqual({
      level: 'debug',
      format: 'json',
    });
  });

  test('rejects unknown levels', () => {
    expect(() => parseLogConfig({level: 'trace'})).toThrow(TypeError);
  });
});

test('getLogSink picks the sink by format', () => {
  expect(getLogSink({level: 'info', format: 'json'})).toBe(consoleJsonLogSink);
  expect(getLogSink({level: 'info', format: 'text'})).toBe(consoleSink);
});

test('createLogContext honors the level and adds the pid', () => {
  const sink = new TestLogSink();
  const lc = createLogContext(
    {log: {level: 'warn', format: 'text'}},
    {component: 'test'},
    sink,
  );
  lc.info?.('dropped');
  lc.warn?.('kept');

  expect(sink.at('info')).toEqual([]);
  expect(sink.at('warn')).toEqual([['kept']]);
  const [[, context]] = sink.messages;
  expect(context).toMatchObject({component: 'test', pid: process.pid});
});

test('json sink merges a trailing object into the record', () => {
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  consoleJsonLogSink.log('warn', {component: 'c'}, 'value', 12, {
    kind: 'ValueTooLarge',
  });
  expect(warn).toHaveBeenCalledTimes(1);
  expect(JSON.parse(String(warn.mock.calls[0][0]))).toEqual({
    level: 'WARN',
    component: 'c',
    kind: 'ValueTooLarge',
    message: 'value 12',
  });
});

test('json sink writes bigint values as numbers', () => {
  const info = vi.spyOn(console, 'info').mockImplementation(() => {});
  consoleJsonLogSink.log('info', undefined, {count: 5n});
  expect(JSON.parse(String(info.mock.calls[0][0]))).toEqual({
    level: 'INFO',
    count: 5,
  });
});

test('errorOrObject flattens errors', () => {
  const e = new Error('boom');
  expect(errorOrObject(e)).toMatchObject({name: 'Error', errorMsg: 'boom'});
  expect(errorOrObject('text')).toBeUndefined();
  expect(errorOrObject({a: 1})).toEqual({a: 1});
});

test('stringifyContext renders key=value pairs', () => {
  expect(stringifyContext({component: 'histogram', flag: undefined})).toEqual(
    ['component=histogram', 'flag'],
  );
  expect(stringifyContext(undefined)).toEqual([]);
});

test('a LogContext below the sink level skips debug calls', () => {
  const sink = new TestLogSink();
  const lc = new LogContext('info', undefined, sink);
  expect(lc.debug).toBeUndefined();
});
