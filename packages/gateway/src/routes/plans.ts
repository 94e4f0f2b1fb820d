/**
 * Plans Routes
 *
 * Submit plans to the execution engine, inspect them and cancel them.
 * Live status events are served over the WebSocket channel.
 */

import { Hono } from 'hono';
import {
  ConflictError,
  getServiceRegistry,
  isTerminalPlanStatus,
  Services,
  type PlanEngine,
} from '@taskrelay/core';
import { planSubmissionSchema, toPlanInput, validateBody } from '../middleware/validation.js';
import { getLog } from '../services/log.js';
import { apiResponse, apiError, ERROR_CODES, notFoundError } from './helpers.js';

const log = getLog('Plans');
export const plansRoutes = new Hono();

/**
 * GET /plans - List known plans (running and retained finished ones)
 */
plansRoutes.get('/', (c) => {
  const engine = getServiceRegistry().get(Services.Engine);
  const plans = engine.list();

  return apiResponse(c, {
    plans,
    total: plans.length,
    running: engine.runningCount,
  });
});

/**
 * POST /plans - Validate and start a plan
 */
plansRoutes.post('/', async (c) => {
  const body = validateBody(planSubmissionSchema, await c.req.json());
  const { planId, input } = toPlanInput(body);
  const engine = getServiceRegistry().get(Services.Engine);

  let started: ReturnType<PlanEngine['start']>;
  try {
    started = engine.start(input, planId !== undefined ? { planId } : {});
  } catch (error) {
    if (error instanceof ConflictError) {
      return apiError(c, { code: ERROR_CODES.ALREADY_EXISTS, message: error.message }, 409);
    }
    throw error;
  }

  if (!started.ok) {
    const { kind, message, details } = started.error;
    return apiError(
      c,
      { code: ERROR_CODES.PLAN_INVALID, message, details: { kind, ...details } },
      422
    );
  }

  const snapshot = engine.status(started.value.planId);
  log.info('Plan submitted', { planId: started.value.planId, steps: input.steps.length });

  return apiResponse(c, snapshot, 201);
});

/**
 * GET /plans/:id - Current snapshot of a plan
 */
plansRoutes.get('/:id', (c) => {
  const id = c.req.param('id');
  const snapshot = getServiceRegistry().get(Services.Engine).status(id);

  if (!snapshot) {
    return notFoundError(c, 'Plan', id);
  }
  return apiResponse(c, snapshot);
});

/**
 * POST /plans/:id/cancel - Request cancellation
 */
plansRoutes.post('/:id/cancel', (c) => {
  const id = c.req.param('id');
  const engine = getServiceRegistry().get(Services.Engine);
  const before = engine.status(id);

  if (!before) {
    return notFoundError(c, 'Plan', id);
  }
  if (isTerminalPlanStatus(before.status)) {
    return apiError(
      c,
      { code: ERROR_CODES.NOT_RUNNING, message: `Plan is already ${before.status}` },
      409
    );
  }

  // A second cancel while the first is winding down is accepted as a no-op
  const requested = engine.cancel(id);
  if (requested) log.info('Plan cancellation requested', { planId: id });

  return apiResponse(c, { cancelled: true, plan: engine.status(id) });
});
