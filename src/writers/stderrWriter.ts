import { defaultFormat } from '../formats';
import type { FormatFunction, Level, LogRecord, LogWriter, TextStream } from '../types';
import type { DeferredNow } from '../utils/deferredNow';

/** Writes each formatted line, newline-terminated, to standard error. */
export class StderrWriter implements LogWriter {
  private formatFn: FormatFunction = defaultFormat;

  constructor(private readonly stream: TextStream = process.stderr) {}

  write(now: DeferredNow, record: LogRecord): void {
    let line = '';
    this.formatFn({ write: (chunk) => { line += chunk; } }, now, record);
    this.stream.write(`${line}\n`);
  }

  flush(): void {
    // process.stderr writes synchronously for files and terminals
  }

  format(format: FormatFunction): void {
    this.formatFn = format;
  }

  maxLogLevel(): Level {
    return 'trace';
  }
}
