import { formatFor } from '../formats';
import type { Clock, LogWriter, TextStream } from '../types';
import { SingleFileWriter } from '../writers/singleFileWriter';
import { StderrWriter } from '../writers/stderrWriter';
import { resolveConfig } from './config';
import { LoggerInitError } from './errors';
import type { ConfigErrorHandler } from './levelFilter';
import { activeBackend, installBackend, type Backend } from './registry';

export interface InitOptions {
  /** Environment to read `LOG_LEVEL` and `GOLOG_LOG_FMT` from. */
  env?: NodeJS.ProcessEnv;
  /** Overrides the terminal check on standard error. */
  isTerminal?: boolean;
  clock?: Clock;
  /** Receives write failures instead of the default stderr report. */
  onError?: (error: unknown) => void;
  /** Receives skipped `LOG_LEVEL` entries instead of the default stderr report. */
  onConfigError?: ConfigErrorHandler;
}

export interface StderrInitOptions extends InitOptions {
  /** Where "standard error" lines go; defaults to `process.stderr`. */
  stream?: TextStream;
}

function reportWriteError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[logger] failed to write log record: ${message}\n`);
}

function buildBackend(writer: LogWriter, options: InitOptions): Backend {
  const config = resolveConfig(options.env, options.isTerminal, options.onConfigError);
  writer.format(formatFor(config.format));
  return {
    writer,
    filter: config.filter,
    captureCaller: config.format === 'json',
    clock: options.clock,
    onError: options.onError ?? reportWriteError,
  };
}

function installStrict(backend: Backend): void {
  if (!installBackend(backend)) {
    throw new LoggerInitError();
  }
}

/**
 * Initializes the logger on standard error.
 *
 * @throws {LoggerInitError} when a logger was already initialized.
 */
export function init(options: StderrInitOptions = {}): void {
  installStrict(buildBackend(new StderrWriter(options.stream), options));
}

/**
 * Initializes the logger on a file descriptor the caller opened. The
 * descriptor is never closed by the logger.
 *
 * @throws {LoggerInitError} when a logger was already initialized.
 */
export function initWithFile(fd: number, options: InitOptions = {}): void {
  installStrict(buildBackend(new SingleFileWriter(fd), options));
}

/** Like `init()`, but does nothing if a logger is already initialized. */
export function maybeInit(options: StderrInitOptions = {}): void {
  installBackend(buildBackend(new StderrWriter(options.stream), options));
}

/** Like `initWithFile()`, but does nothing if a logger is already initialized. */
export function maybeInitWithFile(fd: number, options: InitOptions = {}): void {
  installBackend(buildBackend(new SingleFileWriter(fd), options));
}

export function flush(): void {
  activeBackend()?.writer.flush();
}
