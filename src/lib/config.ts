/**
 * Logger configuration read from the environment.
 *
 * `LOG_LEVEL` controls which records pass (see `parseLevelFilter`);
 * `GOLOG_LOG_FMT=json` together with the terminal state of standard error
 * picks the output format. Both are read once, when the logger is
 * initialized. Bad `LOG_LEVEL` entries are reported and skipped, never thrown.
 */

import { selectFormatName, type FormatName } from '../formats';
import {
  LEVEL_ENV_VAR,
  parseLevelFilter,
  reportConfigError,
  type ConfigErrorHandler,
  type LevelFilter,
} from './levelFilter';

export interface LoggerConfig {
  readonly filter: LevelFilter;
  readonly format: FormatName;
}

export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  isTerminal: boolean = process.stderr.isTTY === true,
  onConfigError: ConfigErrorHandler = reportConfigError,
): LoggerConfig {
  return Object.freeze({
    filter: parseLevelFilter(env[LEVEL_ENV_VAR], onConfigError),
    format: selectFormatName(env, isTerminal),
  });
}
