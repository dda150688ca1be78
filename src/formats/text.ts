import type { FormatFunction, Level } from '../types';
import { blue, bold, dim, green, red, yellow } from '../utils/ansi';
import { formatTimestamp } from '../utils/timestamp';

/** Placeholder for a missing module path or source file. */
export const UNNAMED = '<unnamed>';

const levelLabel = (level: Level): string => level.toUpperCase();

const levelBadge = (level: Level): string => {
  const label = levelLabel(level);
  switch (level) {
    case 'trace':
      return dim(label);
    case 'debug':
      return blue(label);
    case 'info':
      return green(label);
    case 'warn':
      return yellow(label);
    case 'error':
      return bold(red(label));
  }
};

/**
 * Colored text line:
 *
 *   2019-11-11T21:04:25.685 INFO app > normal information
 */
export const colorLoggerFormat: FormatFunction = (sink, now, record) => {
  sink.write(
    `${formatTimestamp(now.now())} ${levelBadge(record.level)} ${record.modulePath ?? UNNAMED} > ${record.message}`,
  );
};

/** Same line as `colorLoggerFormat`, without escape sequences. */
export const nocolorLoggerFormat: FormatFunction = (sink, now, record) => {
  sink.write(
    `${formatTimestamp(now.now())} ${levelLabel(record.level)} ${record.modulePath ?? UNNAMED} > ${record.message}`,
  );
};

/** `INFO [app] hello`, what a file writer uses until a format is chosen. */
export const defaultFormat: FormatFunction = (sink, _now, record) => {
  sink.write(`${levelLabel(record.level)} [${record.modulePath ?? UNNAMED}] ${record.message}`);
};
