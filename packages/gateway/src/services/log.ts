/**
 * Logging Utility for gateway modules
 *
 * Gateway modules create their loggers at import time, before the server
 * has registered its LogService. The returned logger looks the service up
 * on every call so the configured level and format apply once startup
 * is done.
 *
 * Usage:
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('Plans');
 *   log.info('Plan submitted', { planId: '...' });
 */

import { getLog as getCoreLog, type ILogService } from '@taskrelay/core';

export function getLog(module: string): ILogService {
  return {
    debug: (message, data) => getCoreLog(module).debug(message, data),
    info: (message, data) => getCoreLog(module).info(message, data),
    warn: (message, data) => getCoreLog(module).warn(message, data),
    error: (message, data) => getCoreLog(module).error(message, data),
    child: (sub) => getLog(`${module}:${sub}`),
  };
}
