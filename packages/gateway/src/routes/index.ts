/**
 * Route exports
 */

export { healthRoutes } from './health.js';
export { capabilitiesRoutes } from './capabilities.js';
export { plansRoutes } from './plans.js';
export {
  apiResponse,
  apiError,
  notFoundError,
  sanitizeId,
  ERROR_CODES,
  type ErrorCode,
} from './helpers.js';
