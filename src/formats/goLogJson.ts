import type { FormatFunction } from '../types';
import { formatTimestamp } from '../utils/timestamp';
import { UNNAMED } from './text';

/**
 * Logs in the same JSON shape as IPFS go-log:
 *
 * ```json
 * {"level":"info","ts":"2019-11-11T21:06:45.401+01:00","logger":"app","caller":"src/main.ts:10","msg":"hello"}
 * ```
 *
 * Keys always appear in this order. String values are JSON-escaped, so a
 * message containing quotes still yields a parseable line.
 */
export const goLogJsonFormat: FormatFunction = (sink, now, record) => {
  const entry = {
    level: record.level,
    ts: formatTimestamp(now.now(), { offset: true }),
    logger: record.modulePath ?? UNNAMED,
    caller: `${record.file ?? UNNAMED}:${record.line ?? 0}`,
    msg: record.message,
  };
  sink.write(JSON.stringify(entry));
};
