/**
 * Core types for TaskRelay
 * @packageDocumentation
 */

// Result pattern
export {
  type Result,
  ok,
  err,
  unwrap,
  mapResult,
  isOk,
  isErr,
} from './result.js';

// Errors
export {
  AppError,
  type PlanValidationKind,
  type PlanValidationDetails,
  PlanValidationError,
  AgentError,
  TransientAgentError,
  PermanentAgentError,
  TimeoutError,
  ReferenceResolutionError,
  DuplicateWriteError,
  ObserverDeliveryError,
  NotFoundError,
  ConflictError,
  isAppError,
  getErrorMessage,
} from './errors.js';
