/**
 * LogService Implementation
 *
 * Two output modes:
 * - Development: `[module] message` plus the data argument, readable in a terminal
 * - Production: one JSON object per line, data fields merged in
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   const engineLog = log.child('PlanEngine');
 *   engineLog.info('Plan started', { planId });
 *   // Dev:  [PlanEngine] Plan started { planId: 'p1' }
 *   // Prod: {"level":"info","ts":"...","module":"PlanEngine","msg":"Plan started","planId":"p1"}
 */

import type { ILogService, LogLevel } from '@taskrelay/core';

export interface LogServiceOptions {
  level?: LogLevel;
  /** Defaults to true when NODE_ENV is production */
  json?: boolean;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const SINK: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

function toFields(data: unknown): Record<string, unknown> {
  if (data === undefined) return {};
  if (isPlainRecord(data)) return data;
  return { data: data instanceof Error ? { name: data.name, message: data.message } : data };
}

export class LogService implements ILogService {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly module?: string;

  constructor(options: LogServiceOptions & { module?: string } = {}) {
    this.level = options.level ?? 'info';
    this.json = options.json ?? process.env.NODE_ENV === 'production';
    this.module = options.module;
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  /** Errors are written at every level. */
  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.level,
      json: this.json,
      module: this.module === undefined ? module : `${this.module}:${module}`,
    });
  }

  private write(level: LogLevel, message: string, data: unknown): void {
    if (SEVERITY[level] < SEVERITY[this.level]) return;
    const sink = SINK[level];

    if (this.json) {
      const module = this.module === undefined ? {} : { module: this.module };
      sink(JSON.stringify({ level, ts: new Date().toISOString(), ...module, msg: message, ...toFields(data) }));
      return;
    }

    const line = this.module === undefined ? message : `[${this.module}] ${message}`;
    if (data === undefined) sink(line);
    else sink(line, data);
  }
}

export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}
