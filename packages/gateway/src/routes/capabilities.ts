/**
 * Capability routes
 *
 * Lists the capability tags the engine can dispatch to.
 */

import { Hono } from 'hono';
import { getServiceRegistry, Services } from '@taskrelay/core';
import { apiResponse } from './helpers.js';

export const capabilitiesRoutes = new Hono();

capabilitiesRoutes.get('/', (c) => {
  const engine = getServiceRegistry().get(Services.Engine);
  const capabilities = engine.agents.list().map((entry) => ({
    capability: entry.capability,
    description: entry.description ?? null,
    timeoutMs: entry.timeoutMs ?? engine.config.stepTimeoutMs,
    retryOnTimeout: entry.retryOnTimeout,
  }));

  return apiResponse(c, {
    capabilities,
    count: capabilities.length,
  });
});
