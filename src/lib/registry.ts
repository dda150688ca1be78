import type { Clock, LogWriter } from '../types';
import type { LevelFilter } from './levelFilter';

/** Everything the process-wide logger needs once it is initialized. */
export interface Backend {
  readonly writer: LogWriter;
  readonly filter: LevelFilter;
  /** Record source file and line of each call; only the JSON format prints them. */
  readonly captureCaller: boolean;
  readonly clock?: Clock;
  /** Receives write failures. Never retried. */
  readonly onError: (error: unknown) => void;
}

let installed: Backend | null = null;

/**
 * Installs `backend` unless one is already installed. Returns whether this
 * call installed it. There is no way to uninstall.
 */
export function installBackend(backend: Backend): boolean {
  if (installed) {
    return false;
  }
  installed = backend;
  return true;
}

export function activeBackend(): Backend | null {
  return installed;
}
