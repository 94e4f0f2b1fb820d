/**
 * Services
 */

export type { ILogService, LogLevel } from './log-service.js';
export { getLog } from './get-log.js';
export {
  ServiceToken,
  type RegisterOptions,
  ServiceRegistry,
  initServiceRegistry,
  getServiceRegistry,
  hasServiceRegistry,
  resetServiceRegistry,
} from './registry.js';
export { Services } from './tokens.js';
