export { flush, init, initWithFile, maybeInit, maybeInitWithFile } from './lib/init';
export type { InitOptions, StderrInitOptions } from './lib/init';
export { getLogger, logger } from './lib/logger';
export { LoggerConfigError, LoggerInitError } from './lib/errors';
export { parseLevelFilter } from './lib/levelFilter';
export type { ConfigErrorHandler, LevelFilter, LevelFilterName, ModuleDirective } from './lib/levelFilter';
export {
  colorLoggerFormat,
  defaultFormat,
  goLogJsonFormat,
  nocolorLoggerFormat,
  selectFormat,
  selectFormatName,
} from './formats';
export type { FormatName } from './formats';
export { SingleFileWriter, StderrWriter } from './writers';
export { DeferredNow } from './utils/deferredNow';
export { SharedMutex } from './utils/mutex';
export type { Level, LineSink, LogRecord, LogWriter, FormatFunction, TextStream } from './types';
