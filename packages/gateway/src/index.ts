/**
 * @taskrelay/gateway
 *
 * HTTP API and WebSocket observer channel for the TaskRelay plan engine
 *
 * @packageDocumentation
 */

// App
export { createApp, type AppConfig } from './app.js';

// Server
export { bootstrapServices, startServer, type RunningGateway } from './server.js';

// Config
export {
  loadGatewayConfig,
  HTTP_PORT,
  HTTP_HOST,
  WS_PATH,
  SIMULATED_AGENT_DELAY_MS,
  PLAN_MAX_STEPS,
} from './config/defaults.js';

// Types
export type {
  ApiResponse,
  ApiError,
  ResponseMeta,
  GatewayConfig,
  HealthCheck,
  HealthStatus,
} from './types/index.js';

// Middleware
export {
  requestId,
  errorHandler,
  notFoundHandler,
  planSubmissionSchema,
  planStepSchema,
  toPlanInput,
  validateBody,
  formatIssues,
  type PlanSubmission,
} from './middleware/index.js';

// Routes
export { healthRoutes, capabilitiesRoutes, plansRoutes, ERROR_CODES, type ErrorCode } from './routes/index.js';

// WebSocket
export { WSGateway, SessionManager, PlanEventBridge } from './ws/index.js';
export type { WSGatewayConfig, ServerEvents, ClientEvents, WSMessage } from './ws/index.js';

// Logging
export { LogService, createLogService, type LogServiceOptions } from './services/log-service-impl.js';
