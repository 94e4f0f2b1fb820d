/**
 * Health check routes
 */

import { Hono } from 'hono';
import { VERSION, getServiceRegistry, hasServiceRegistry, Services } from '@taskrelay/core';
import type { HealthCheck, HealthStatus } from '../types/index.js';
import { apiResponse } from './helpers.js';

const startTime = Date.now();

export const healthRoutes = new Hono();

function collectChecks(): { checks: HealthCheck[]; runningPlans: number } {
  const registry = hasServiceRegistry() ? getServiceRegistry() : null;
  const engine = registry?.tryGet(Services.Engine) ?? null;

  if (!engine) {
    return {
      checks: [{ name: 'engine', status: 'fail', message: 'Plan engine not registered' }],
      runningPlans: 0,
    };
  }

  const capabilities = engine.agents.list().length;
  return {
    checks: [
      { name: 'engine', status: 'pass', message: 'Plan engine ready' },
      {
        name: 'agents',
        status: capabilities > 0 ? 'pass' : 'warn',
        message: capabilities > 0
          ? `${capabilities} capabilities registered`
          : 'No capability agents registered',
      },
    ],
    runningPlans: engine.runningCount,
  };
}

/**
 * Basic health check
 */
healthRoutes.get('/', (c) => {
  const { checks, runningPlans } = collectChecks();
  const status: HealthStatus = {
    status: checks.every((check) => check.status === 'pass') ? 'healthy' : 'degraded',
    version: VERSION,
    uptime: (Date.now() - startTime) / 1000,
    runningPlans,
    checks,
  };
  return apiResponse(c, status);
});

/**
 * Liveness probe
 */
healthRoutes.get('/live', (c) => {
  return apiResponse(c, { status: 'ok' });
});
