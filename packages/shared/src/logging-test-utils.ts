import type {Context, LogLevel, LogSink} from '@rocicorp/logger';

export class TestLogSink implements LogSink {
  messages: [LogLevel, Context | undefined, unknown[]][] = [];

  log(level: LogLevel, context: Context | undefined, ...args: unknown[]): void {
    this.messages.push([level, context, args]);
  }

  /** Messages at `level`, with the context dropped. */
  at(level: LogLevel): unknown[][] {
    return this.messages.filter(([l]) => l === level).map(([, , args]) => args);
  }
}
