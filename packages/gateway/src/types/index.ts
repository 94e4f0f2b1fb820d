/**
 * Gateway types
 */

import type { EngineConfigInput, LogLevel } from '@taskrelay/core';

/**
 * API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  requestId: string;
  timestamp: string;
}

/**
 * Gateway configuration
 */
export interface GatewayConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  /** Upgrade path of the WebSocket observer channel */
  wsPath: string;
  bodyLimitBytes: number;
  /** Latency of the simulated capability agents (ms) */
  simulatedAgentDelayMs: number;
  /** Overrides applied on top of the engine defaults */
  engine: EngineConfigInput;
  log: {
    level: LogLevel;
    json: boolean;
  };
}

/**
 * Health check result
 */
export interface HealthCheck {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  version: string;
  uptime: number;
  runningPlans: number;
  checks: HealthCheck[];
}
