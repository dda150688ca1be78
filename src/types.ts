import type { DeferredNow } from './utils/deferredNow';

export type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** pino's numeric values for the levels a record can carry. */
export const LEVEL_VALUES: Readonly<Record<Level, number>> = Object.freeze({
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
});

export const LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogRecord {
  readonly level: Level;
  readonly modulePath?: string;
  readonly file?: string;
  readonly line?: number;
  readonly message: string;
}

/** Where a format function writes its line. Throws on I/O failure. */
export interface LineSink {
  write(chunk: string): void;
}

/**
 * Renders one record as one line into the sink. Never writes the line
 * terminator; that is left to the writer.
 */
export type FormatFunction = (sink: LineSink, now: DeferredNow, record: LogRecord) => void;

export interface LogWriter {
  write(now: DeferredNow, record: LogRecord): void;
  flush(): void;
  format(format: FormatFunction): void;
  /** Most verbose level this writer accepts. */
  maxLogLevel(): Level;
}

export type Clock = () => Date;

/** Anything with a string `write`, e.g. `process.stderr`. */
export interface TextStream {
  write(chunk: string): unknown;
}
