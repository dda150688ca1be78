import { z } from 'zod';

import { LEVEL_VALUES, type Level } from '../types';
import { LoggerConfigError } from './errors';

const levelFilterSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'off']);

export type LevelFilterName = z.infer<typeof levelFilterSchema>;

export interface ModuleDirective {
  readonly module: string;
  readonly level: LevelFilterName;
}

export interface LevelFilter {
  readonly defaultLevel: LevelFilterName;
  /** Sorted longest module name first. */
  readonly directives: readonly ModuleDirective[];
}

export const LEVEL_ENV_VAR = 'LOG_LEVEL';

export const OFF: LevelFilter = Object.freeze({ defaultLevel: 'off', directives: [] });

export type ConfigErrorHandler = (error: LoggerConfigError) => void;

export function reportConfigError(error: LoggerConfigError): void {
  process.stderr.write(`${error.message}\n`);
}

function parseLevel(raw: string, entry: string, onInvalid: ConfigErrorHandler): LevelFilterName | null {
  const parsed = levelFilterSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    onInvalid(
      new LoggerConfigError(
        `[config] Invalid ${LEVEL_ENV_VAR} entry "${entry}": expected one of ${levelFilterSchema.options.join(', ')}. Entry ignored.`,
        LEVEL_ENV_VAR,
      ),
    );
    return null;
  }
  return parsed.data;
}

/**
 * Parses `info`, `warn,db=debug`, `http` (module at trace) and combinations.
 * An empty or missing value turns logging off. When several bare levels are
 * given the last one wins. An entry with an unknown level goes to `onInvalid`
 * and is skipped; the remaining entries still apply.
 */
export function parseLevelFilter(
  value: string | undefined,
  onInvalid: ConfigErrorHandler = reportConfigError,
): LevelFilter {
  if (!value || value.trim().length === 0) {
    return OFF;
  }

  let defaultLevel: LevelFilterName = 'off';
  const byModule = new Map<string, LevelFilterName>();

  for (const rawEntry of value.split(',')) {
    const entry = rawEntry.trim();
    if (!entry) continue;

    const equalsIndex = entry.indexOf('=');
    if (equalsIndex === -1) {
      const level = levelFilterSchema.safeParse(entry.toLowerCase());
      if (level.success) {
        defaultLevel = level.data;
      } else {
        byModule.set(entry, 'trace');
      }
      continue;
    }

    const module = entry.slice(0, equalsIndex).trim();
    const level = parseLevel(entry.slice(equalsIndex + 1), entry, onInvalid);
    if (level === null) continue;
    if (!module) {
      defaultLevel = level;
    } else {
      byModule.set(module, level);
    }
  }

  const directives = [...byModule.entries()]
    .map(([module, level]) => ({ module, level }))
    .sort((a, b) => b.module.length - a.module.length);

  return Object.freeze({ defaultLevel, directives });
}

function matches(directive: string, module: string): boolean {
  return module === directive || module.startsWith(`${directive}/`);
}

export function levelFor(filter: LevelFilter, module: string | undefined): LevelFilterName {
  if (module !== undefined) {
    const directive = filter.directives.find((d) => matches(d.module, module));
    if (directive) return directive.level;
  }
  return filter.defaultLevel;
}

/** Lowest pino level value that passes, or Infinity for `off`. */
export function thresholdOf(level: LevelFilterName): number {
  return level === 'off' ? Number.POSITIVE_INFINITY : LEVEL_VALUES[level];
}

export function isEnabled(filter: LevelFilter, level: Level | number, module?: string): boolean {
  const value = typeof level === 'number' ? level : LEVEL_VALUES[level];
  return value >= thresholdOf(levelFor(filter, module));
}
