/**
 * Error hierarchy shared by the engine, the gateway and the CLI.
 * Each error carries a stable `code` and the HTTP status it maps to.
 */

import type { StepReference } from '../plan/types.js';

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

// ============================================================================
// Plan validation
// ============================================================================

export type PlanValidationKind =
  | 'DuplicateStepId'
  | 'MalformedReference'
  | 'UnknownDependency'
  | 'CycleDetected'
  | 'UnresolvableReference';

export interface PlanValidationDetails {
  /** Step the problem was found on */
  stepId?: string;
  /** Dependency id that does not exist (UnknownDependency) */
  dependencyId?: string;
  /** Closed id path, first id repeated at the end (CycleDetected) */
  cycle?: readonly string[];
  /** Offending reference (UnresolvableReference) */
  reference?: StepReference;
  /** Parameter location of a bad placeholder, e.g. "query" or "recipients.0" */
  parameter?: string;
}

/**
 * Structural problem with a proposed plan. The plan never executes.
 */
export class PlanValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 422;
  readonly kind: PlanValidationKind;
  readonly details: PlanValidationDetails;

  constructor(kind: PlanValidationKind, message: string, details: PlanValidationDetails = {}) {
    super(message);
    this.kind = kind;
    this.details = details;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      details: this.details,
    };
  }
}

// ============================================================================
// Agent failures
// ============================================================================

/**
 * Base for failures reported by capability agents.
 * `transient` decides whether the scheduler retries.
 */
export abstract class AgentError extends AppError {
  abstract readonly transient: boolean;

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      transient: this.transient,
    };
  }
}

/**
 * Failure worth retrying (rate limit, flaky network, upstream 5xx)
 */
export class TransientAgentError extends AgentError {
  readonly code = 'AGENT_TRANSIENT' as const;
  readonly statusCode = 503;
  readonly transient = true;
}

/**
 * Failure that will not go away on retry (bad input, rejected request)
 */
export class PermanentAgentError extends AgentError {
  readonly code = 'AGENT_PERMANENT' as const;
  readonly statusCode = 502;
  readonly transient = false;
}

/**
 * A step attempt outlived its time limit
 */
export class TimeoutError extends AppError {
  readonly code = 'TIMEOUT' as const;
  readonly statusCode = 408;
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, options);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      timeoutMs: this.timeoutMs,
    };
  }
}

/**
 * A reference's path does not exist in the referenced step's result.
 */
export class ReferenceResolutionError extends AppError {
  readonly code = 'REFERENCE_UNRESOLVED' as const;
  readonly statusCode = 422;
  readonly reference: StepReference;

  constructor(reference: StepReference, message: string) {
    super(message);
    this.reference = reference;
  }
}

// ============================================================================
// Internal consistency
// ============================================================================

/**
 * A step result was written twice. Indicates a scheduler bug.
 */
export class DuplicateWriteError extends AppError {
  readonly code = 'DUPLICATE_WRITE' as const;
  readonly statusCode = 500;
  readonly stepId: string;

  constructor(stepId: string) {
    super(`Result for step '${stepId}' was already recorded`);
    this.stepId = stepId;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      stepId: this.stepId,
    };
  }
}

/**
 * Pushing an event to one observer failed. Never affects execution.
 */
export class ObserverDeliveryError extends AppError {
  readonly code = 'OBSERVER_DELIVERY' as const;
  readonly statusCode = 500;
  readonly planId: string;

  constructor(planId: string, options?: { cause?: unknown }) {
    super(`Failed to deliver event for plan ${planId}`, options);
    this.planId = planId;
  }
}

// ============================================================================
// Control surface
// ============================================================================

/** Unknown plan (or other addressed resource) */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string, options?: { cause?: unknown }) {
    super(`${resource} not found: ${id}`, options);
    this.resource = resource;
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resource: this.resource,
      id: this.id,
    };
  }
}

/**
 * Request clashes with current state: a reused plan id, cancelling a
 * finished plan, starting after shutdown
 */
export class ConflictError extends AppError {
  readonly code = 'CONFLICT' as const;
  readonly statusCode = 409;
  readonly resource?: string;

  constructor(message: string, options?: { resource?: string; cause?: unknown }) {
    super(message, options);
    this.resource = options?.resource;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resource: this.resource,
    };
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Extract error message from an unknown catch value.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}
