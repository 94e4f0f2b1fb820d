/**
 * Middleware exports
 */

export { requestId, REQUEST_ID_HEADER } from './request-id.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
export {
  planStepSchema,
  planSubmissionSchema,
  toPlanInput,
  validateBody,
  formatIssues,
  type PlanSubmission,
} from './validation.js';
