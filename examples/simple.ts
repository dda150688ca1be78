/**
 * Logs one line per level on standard error.
 *
 * Nothing is printed unless LOG_LEVEL is set:
 *
 *   $ LOG_LEVEL=info npm run example
 *   2019-11-11T20:26:09.448 INFO simple > logging on info level
 *   2019-11-11T20:26:09.448 WARN simple > logging on warn level
 *   2019-11-11T20:26:09.448 ERROR simple > logging on error level
 *
 * With GOLOG_LOG_FMT=json each line also carries the call site:
 *
 *   {"level":"info","ts":"2019-11-11T20:59:31.168+01:00","logger":"simple","caller":"examples/simple.ts:24","msg":"logging on info level"}
 */

import { getLogger, init } from '../src';

init();

const log = getLogger('simple');

log.trace('logging on trace level');
log.debug('logging on debug level');
log.info('logging on info level');
log.warn('logging on warn level');
log.error('logging on error level');
