/**
 * Simulated capability agents
 *
 * Stand-ins used when no real integration is registered for a capability.
 * They wait, then report what they would have done.
 */

import type { AgentContext, CapabilityAgent } from './types.js';
import type { AgentRegistry } from './registry.js';
import { PermanentAgentError } from '../types/errors.js';

/** Capability tags the planner knows about */
export const DEFAULT_CAPABILITIES = [
  'search',
  'calendar',
  'messaging',
  'communication',
  'knowledge',
] as const;

export interface SimulatedAgentOptions {
  /** How long each call takes (default 0) */
  delayMs?: number;
}

export interface SimulatedResult {
  capability: string;
  summary: string;
  parameters: Record<string, unknown>;
}

function describeAction(parameters: Record<string, unknown>): string {
  const action = parameters.action;
  return typeof action === 'string' ? action : JSON.stringify(parameters);
}

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new PermanentAgentError('Simulated call aborted', { cause: signal.reason }));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new PermanentAgentError('Simulated call aborted', { cause: signal.reason }));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export function createSimulatedAgent(
  capability: string,
  options: SimulatedAgentOptions = {},
): CapabilityAgent {
  const delayMs = options.delayMs ?? 0;
  return {
    async execute(parameters: Record<string, unknown>, context: AgentContext): Promise<SimulatedResult> {
      await wait(delayMs, context.signal);
      return {
        capability,
        summary: `Action Completed: ${describeAction(parameters)}`,
        parameters,
      };
    },
  };
}

/**
 * Register a simulated agent for every default capability that has no
 * implementation yet. Returns the tags that were filled in.
 */
export function registerSimulatedAgents(
  registry: AgentRegistry,
  options: SimulatedAgentOptions = {},
): string[] {
  const added: string[] = [];
  for (const capability of DEFAULT_CAPABILITIES) {
    if (registry.has(capability)) continue;
    registry.register(capability, createSimulatedAgent(capability, options), {
      description: `Simulated ${capability} agent`,
    });
    added.push(capability);
  }
  return added;
}
