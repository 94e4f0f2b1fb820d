/**
 * Gateway Default Configuration
 *
 * Named constants for all tunable infrastructure values.
 * Import these instead of using inline magic numbers.
 *
 * Override via environment variables where noted (see loadGatewayConfig).
 */

import type { EngineConfigInput, FailurePolicy, LogLevel } from '@taskrelay/core';
import type { GatewayConfig } from '../types/index.js';

// ============================================================================
// HTTP
// ============================================================================

/** Default HTTP port (env: PORT) */
export const HTTP_PORT = 8080;

/** Default bind address (env: HOST) */
export const HTTP_HOST = '127.0.0.1';

/** Maximum request body size (bytes) */
export const HTTP_BODY_LIMIT_BYTES = 1024 * 1024; // 1 MB

/** Seconds in one day, used for CORS preflight caching */
export const SECONDS_PER_DAY = 86_400;

// ============================================================================
// WebSocket
// ============================================================================

/** Upgrade path for the observer channel (env: WS_PATH) */
export const WS_PATH = '/ws';

/** Heartbeat ping interval (ms) */
export const WS_HEARTBEAT_INTERVAL_MS = 30_000;

/** Maximum WebSocket payload size (bytes) */
export const WS_MAX_PAYLOAD_BYTES = 64 * 1024; // 64 KB

/** Maximum concurrent WebSocket connections */
export const WS_MAX_CONNECTIONS = 50;

/** Plan subscriptions a single session may hold */
export const WS_MAX_SUBSCRIPTIONS_PER_SESSION = 20;

/** Maximum messages per second per session (token bucket refill rate) */
export const WS_RATE_LIMIT_MESSAGES_PER_SEC = 30;

/** Maximum burst messages (token bucket capacity) */
export const WS_RATE_LIMIT_BURST = 50;

/** WebSocket readyState value for an open connection */
export const WS_READY_STATE_OPEN = 1;

/** Close code sent when the connection limit is reached */
export const WS_CLOSE_TOO_MANY_CONNECTIONS = 1013;

/** Close code sent when the origin is not allowed */
export const WS_CLOSE_POLICY_VIOLATION = 1008;

/** Close code sent on shutdown */
export const WS_CLOSE_GOING_AWAY = 1001;

// ============================================================================
// Plans
// ============================================================================

/** Steps accepted in one submitted plan */
export const PLAN_MAX_STEPS = 200;

/** Artificial latency of the simulated agents (env: SIMULATED_AGENT_DELAY_MS) */
export const SIMULATED_AGENT_DELAY_MS = 250;

// ============================================================================
// Environment
// ============================================================================

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const FAILURE_POLICIES: readonly FailurePolicy[] = ['continue', 'fail-fast'];

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function readEnum<T extends string>(env: Env, name: string, allowed: readonly T[]): T | undefined {
  const raw = env[name]?.trim();
  return allowed.find((value) => value === raw);
}

function readList(env: Env, name: string): string[] {
  return (env[name] ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Build the gateway configuration from environment variables.
 * Unset or unparsable values fall back to the defaults above.
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const engine: EngineConfigInput = {};
  const maxConcurrentSteps = readInt(env, 'MAX_CONCURRENT_STEPS');
  if (maxConcurrentSteps !== undefined) engine.maxConcurrentSteps = maxConcurrentSteps;
  const stepTimeoutMs = readInt(env, 'STEP_TIMEOUT_MS');
  if (stepTimeoutMs !== undefined) engine.stepTimeoutMs = stepTimeoutMs;
  const maxRetries = readInt(env, 'MAX_RETRIES');
  if (maxRetries !== undefined) engine.maxRetries = maxRetries;
  const cancelGraceMs = readInt(env, 'CANCEL_GRACE_MS');
  if (cancelGraceMs !== undefined) engine.cancelGraceMs = cancelGraceMs;
  const failurePolicy = readEnum(env, 'FAILURE_POLICY', FAILURE_POLICIES);
  if (failurePolicy !== undefined) engine.failurePolicy = failurePolicy;

  const port = readInt(env, 'PORT') ?? HTTP_PORT;

  return {
    port,
    host: env.HOST?.trim() || HTTP_HOST,
    corsOrigins: [
      `http://localhost:${port}`,
      `http://127.0.0.1:${port}`,
      ...readList(env, 'CORS_ORIGINS'),
    ],
    wsPath: env.WS_PATH?.trim() || WS_PATH,
    bodyLimitBytes: HTTP_BODY_LIMIT_BYTES,
    simulatedAgentDelayMs: readInt(env, 'SIMULATED_AGENT_DELAY_MS') ?? SIMULATED_AGENT_DELAY_MS,
    engine,
    log: {
      level: readEnum(env, 'LOG_LEVEL', LOG_LEVELS) ?? 'info',
      json: env.LOG_JSON === 'true' || env.NODE_ENV === 'production',
    },
  };
}
