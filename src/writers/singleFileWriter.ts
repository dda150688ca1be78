import * as fs from 'fs';

import { defaultFormat } from '../formats';
import type { FormatFunction, Level, LineSink, LogRecord, LogWriter } from '../types';
import type { DeferredNow } from '../utils/deferredNow';
import { SharedMutex } from '../utils/mutex';

function writeAll(fd: number, chunk: string): void {
  const buffer = Buffer.from(chunk, 'utf8');
  let offset = 0;
  while (offset < buffer.length) {
    offset += fs.writeSync(fd, buffer, offset, buffer.length - offset);
  }
}

/**
 * A `LogWriter` over a file descriptor the caller already opened. The writer
 * never opens or closes it.
 *
 * Each `write` holds the lock for the formatted line and its newline, so
 * lines from concurrent callers never interleave. Pass the same `SharedMutex`
 * to writers in other worker threads that share the descriptor.
 */
export class SingleFileWriter implements LogWriter {
  private formatFn: FormatFunction = defaultFormat;
  private readonly sink: LineSink;

  constructor(
    private readonly fd: number,
    readonly lock: SharedMutex = new SharedMutex(),
  ) {
    this.sink = { write: (chunk) => writeAll(this.fd, chunk) };
  }

  write(now: DeferredNow, record: LogRecord): void {
    this.lock.runExclusive(() => {
      this.formatFn(this.sink, now, record);
      // format functions leave the line open
      writeAll(this.fd, '\n');
    });
  }

  /**
   * Writes go straight to the descriptor, so nothing is buffered here. Taking
   * the lock waits out a write in progress. No fsync: it fails on pipes,
   * terminals and character devices.
   */
  flush(): void {
    this.lock.runExclusive(() => undefined);
  }

  format(format: FormatFunction): void {
    this.formatFn = format;
  }

  maxLogLevel(): Level {
    return 'trace';
  }
}
