import type { FormatFunction } from '../types';
import { goLogJsonFormat } from './goLogJson';
import { colorLoggerFormat, nocolorLoggerFormat } from './text';

export { goLogJsonFormat } from './goLogJson';
export { colorLoggerFormat, defaultFormat, nocolorLoggerFormat, UNNAMED } from './text';

export type FormatName = 'json' | 'color' | 'plain';

export const FORMAT_ENV_VAR = 'GOLOG_LOG_FMT';

const FORMATS: Readonly<Record<FormatName, FormatFunction>> = {
  json: goLogJsonFormat,
  color: colorLoggerFormat,
  plain: nocolorLoggerFormat,
};

/**
 * `GOLOG_LOG_FMT=json` wins; otherwise colored text when standard error is a
 * terminal, plain text when it is not.
 */
export function selectFormatName(
  env: NodeJS.ProcessEnv = process.env,
  isTerminal: boolean = process.stderr.isTTY === true,
): FormatName {
  if (env[FORMAT_ENV_VAR] === 'json') {
    return 'json';
  }
  return isTerminal ? 'color' : 'plain';
}

export function formatFor(name: FormatName): FormatFunction {
  return FORMATS[name];
}

export function selectFormat(
  env: NodeJS.ProcessEnv = process.env,
  isTerminal: boolean = process.stderr.isTTY === true,
): FormatFunction {
  return formatFor(selectFormatName(env, isTerminal));
}
