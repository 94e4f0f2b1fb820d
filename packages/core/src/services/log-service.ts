/**
 * Logging contract shared by every package. The gateway provides the
 * implementation; core code reaches it through getLog().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Logger whose records carry `module` (nested as `parent:module`) */
  child(module: string): ILogService;
}
