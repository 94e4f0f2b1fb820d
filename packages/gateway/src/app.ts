/**
 * Hono application setup
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import { VERSION } from '@taskrelay/core';
import type { GatewayConfig } from './types/index.js';
import { requestId, REQUEST_ID_HEADER, errorHandler, notFoundHandler } from './middleware/index.js';
import { healthRoutes, capabilitiesRoutes, plansRoutes, apiError, ERROR_CODES } from './routes/index.js';
import { HTTP_BODY_LIMIT_BYTES, SECONDS_PER_DAY } from './config/defaults.js';
import { getLog } from './services/log.js';

const log = getLog('HTTP');

export type AppConfig = Pick<GatewayConfig, 'corsOrigins' | 'bodyLimitBytes'>;

const DEFAULT_CONFIG: AppConfig = {
  // Default to localhost only. Set CORS_ORIGINS to add more.
  corsOrigins: ['http://localhost:8080', 'http://127.0.0.1:8080'],
  bodyLimitBytes: HTTP_BODY_LIMIT_BYTES,
};

/**
 * Create the Hono application. Route handlers resolve the engine from the
 * service registry, so register it before serving requests.
 */
export function createApp(config: Partial<AppConfig> = {}): Hono {
  const fullConfig: AppConfig = { ...DEFAULT_CONFIG, ...config };

  const app = new Hono();

  app.use('*', secureHeaders());

  // CORS - Never default to wildcard
  app.use(
    '*',
    cors({
      origin: fullConfig.corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', REQUEST_ID_HEADER],
      exposeHeaders: [REQUEST_ID_HEADER],
      maxAge: SECONDS_PER_DAY,
    })
  );

  app.use(
    '/api/*',
    bodyLimit({
      maxSize: fullConfig.bodyLimitBytes,
      onError: (c) =>
        apiError(
          c,
          {
            code: ERROR_CODES.PAYLOAD_TOO_LARGE,
            message: `Request body exceeds ${fullConfig.bodyLimitBytes} bytes`,
          },
          413
        ),
    })
  );

  app.use('*', requestId);

  // Access log (skip in test environment)
  if (process.env.NODE_ENV !== 'test') {
    app.use('*', logger((message) => log.info(message)));
  }

  // Mount routes
  app.route('/health', healthRoutes);
  app.route('/api/v1/health', healthRoutes);
  app.route('/api/v1/capabilities', capabilitiesRoutes);
  app.route('/api/v1/plans', plansRoutes);

  // API info
  app.get('/api/v1', (c) => {
    return c.json({
      name: 'TaskRelay Gateway',
      version: VERSION,
      endpoints: {
        health: '/api/v1/health',
        capabilities: '/api/v1/capabilities',
        plans: '/api/v1/plans',
      },
    });
  });

  // Error handling
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}

/**
 * Export types for Hono context
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}
