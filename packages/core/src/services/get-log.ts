/**
 * Scoped loggers for core modules.
 *
 * getLog('Scheduler') hands out a child of the registered log service. Before
 * a host registers one (scripts, tests, the CLI's early startup) it falls
 * back to the console with a `[module]` prefix.
 */

import { hasServiceRegistry, getServiceRegistry } from './registry.js';
import { Services } from './tokens.js';
import type { ILogService, LogLevel } from './log-service.js';

const CONSOLE_METHOD: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

const consoleLoggers = new Map<string, ILogService>();

function consoleLogger(module: string): ILogService {
  const tag = `[${module}]`;
  const write = (level: LogLevel) => (message: string, data?: unknown): void => {
    const method = CONSOLE_METHOD[level];
    if (data === undefined) console[method](tag, message);
    else console[method](tag, message, data);
  };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (sub) => getLog(`${module}:${sub}`),
  };
}

export function getLog(module: string): ILogService {
  const registered = hasServiceRegistry() ? getServiceRegistry().tryGet(Services.Log) : null;
  if (registered) return registered.child(module);

  let logger = consoleLoggers.get(module);
  if (!logger) {
    logger = consoleLogger(module);
    consoleLoggers.set(module, logger);
  }
  return logger;
}
