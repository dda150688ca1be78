/**
 * Process-wide pino logger.
 *
 * Modules take a scoped logger at import time, before anything is
 * initialized:
 * ```ts
 * import { logger } from '../lib/logger';
 * const log = logger.child({ module: 'db' });
 * log.info({ table }, 'migrated');
 * ```
 * Calls are dropped until `init()` (or one of its variants) installs a
 * backend. From then on the backend's level filter decides per module.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';

import pino, { type Logger } from 'pino';

import { LEVEL_VALUES } from '../types';
import { captureCaller } from '../utils/caller';
import { FormatDestination, RECORD_KEY } from './destination';
import { isEnabled } from './levelFilter';
import { activeBackend } from './registry';

const THIS_FILE = fileURLToPath(import.meta.url);
const PINO_DIR = `${path.sep}node_modules${path.sep}pino${path.sep}`;

const isInternalFrame = (file: string): boolean => file === THIS_FILE || file.includes(PINO_DIR);

function moduleOf(instance: Logger): string | undefined {
  const { module } = instance.bindings();
  return typeof module === 'string' ? module : undefined;
}

export const destination = new FormatDestination();

export const logger: Logger = pino(
  {
    // filtering happens in logMethod against the installed backend
    level: 'trace',
    base: null,
    hooks: {
      logMethod(args, method, level) {
        const backend = activeBackend();
        if (!backend) return;
        if (level < LEVEL_VALUES[backend.writer.maxLogLevel()]) return;
        if (!isEnabled(backend.filter, level, moduleOf(this))) return;
        method.apply(this, args);
      },
    },
    // the record fields go under a key a logged object cannot replace
    mixin(_mergeObject, level, instance) {
      const caller = activeBackend()?.captureCaller ? captureCaller(isInternalFrame) : null;
      return {
        [RECORD_KEY]: { level, module: moduleOf(instance), caller: caller ?? undefined },
      };
    },
    mixinMergeStrategy: (mergeObject, mixinObject) => ({ ...mergeObject, ...mixinObject }),
  },
  destination,
);

export function getLogger(module?: string): Logger {
  return module === undefined ? logger : logger.child({ module });
}
