/**
 * Service Tokens - Typed keys for ServiceRegistry
 *
 * Usage:
 *   import { Services } from '@taskrelay/core';
 *   const log = registry.get(Services.Log);         // typed as ILogService
 *   const engine = registry.get(Services.Engine);   // typed as PlanEngine
 */

import { ServiceToken } from './registry.js';
import type { ILogService } from './log-service.js';
import type { PlanEventBus } from '../events/plan-event-bus.js';
import type { AgentRegistry } from '../agents/registry.js';
import type { PlanEngine } from '../engine/plan-engine.js';

/**
 * All service tokens.
 */
export const Services = {
  /** Structured logging */
  Log: new ServiceToken<ILogService>('log'),

  /** Plan status event bus */
  Events: new ServiceToken<PlanEventBus>('events'),

  /** Capability agent registry */
  Agents: new ServiceToken<AgentRegistry>('agents'),

  /** Plan execution engine (start / cancel / status) */
  Engine: new ServiceToken<PlanEngine>('engine'),
} as const;
