import type { DestinationStream } from 'pino';
import { z } from 'zod';

import { LEVEL_VALUES, type Level, type LogRecord } from '../types';
import { DeferredNow } from '../utils/deferredNow';
import { activeBackend, type Backend } from './registry';

/**
 * Key the root logger's mixin writes level, module and caller under. The
 * mixin is merged last, so a logged object cannot replace it.
 */
export const RECORD_KEY = 'golog';

// A field of the wrong shape counts as absent; it never rejects the line.
const field = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

const recordFieldsSchema = z.object({
  level: field(z.number()),
  module: field(z.string()),
  caller: field(
    z.object({
      file: z.string(),
      line: z.number().int().nonnegative(),
    }),
  ),
});

const pinoLineSchema = z.object({
  level: field(z.number()),
  msg: field(z.string()),
  module: field(z.string()),
  [RECORD_KEY]: field(recordFieldsSchema),
});

/** pino's `fatal` and any custom level above `error` map to `error`. */
export function levelFromValue(value: number): Level {
  if (value >= LEVEL_VALUES.error) return 'error';
  if (value >= LEVEL_VALUES.warn) return 'warn';
  if (value >= LEVEL_VALUES.info) return 'info';
  if (value >= LEVEL_VALUES.debug) return 'debug';
  return 'trace';
}

/**
 * Lines from the root logger carry their fields under `RECORD_KEY`; other
 * pino lines fall back to the top-level `level` and `module`.
 */
export function recordFromLine(line: string): LogRecord {
  const raw: unknown = JSON.parse(line);
  const parsed = pinoLineSchema.parse(raw);
  const fields = parsed[RECORD_KEY];
  const level = fields ? fields.level : parsed.level;
  return {
    level: levelFromValue(level ?? LEVEL_VALUES.info),
    modulePath: fields ? fields.module : parsed.module,
    file: fields?.caller?.file,
    line: fields?.caller?.line,
    message: parsed.msg ?? '',
  };
}

/**
 * pino destination that turns each serialized line back into a `LogRecord`
 * and hands it to the installed writer. Lines arriving before a backend is
 * installed are dropped.
 */
export class FormatDestination implements DestinationStream {
  constructor(private readonly backend: () => Backend | null = activeBackend) {}

  write(line: string): void {
    const backend = this.backend();
    if (!backend) return;

    try {
      backend.writer.write(new DeferredNow(backend.clock), recordFromLine(line));
    } catch (error) {
      backend.onError(error);
    }
  }

  /** Called by `logger.flush()`. */
  flush(cb?: (err?: Error) => void): void {
    try {
      this.backend()?.writer.flush();
    } catch (error) {
      if (!cb) throw error;
      cb(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    cb?.();
  }
}
