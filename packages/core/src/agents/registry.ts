/**
 * Agent Registry
 *
 * Maps capability tags to implementations. Filled once at process start by
 * the host application; the scheduler only reads it.
 */

import type {
  AgentFunction,
  CapabilityAgent,
  CapabilityOptions,
  RegisteredCapability,
} from './types.js';
import { ConflictError } from '../types/errors.js';

function toAgent(agent: CapabilityAgent | AgentFunction): CapabilityAgent {
  return typeof agent === 'function' ? { execute: agent } : agent;
}

export class AgentRegistry {
  private readonly capabilities = new Map<string, RegisteredCapability>();

  /**
   * Register an implementation for a capability tag.
   * Throws ConflictError if the tag is taken.
   */
  register(
    capability: string,
    agent: CapabilityAgent | AgentFunction,
    options: CapabilityOptions = {},
  ): void {
    if (this.capabilities.has(capability)) {
      throw new ConflictError(`Capability already registered: ${capability}`, { resource: 'capability' });
    }
    this.capabilities.set(capability, {
      capability,
      agent: toAgent(agent),
      retryOnTimeout: options.retryOnTimeout ?? true,
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      ...(options.description !== undefined ? { description: options.description } : {}),
    });
  }

  unregister(capability: string): boolean {
    return this.capabilities.delete(capability);
  }

  get(capability: string): RegisteredCapability | undefined {
    return this.capabilities.get(capability);
  }

  has(capability: string): boolean {
    return this.capabilities.has(capability);
  }

  list(): RegisteredCapability[] {
    return [...this.capabilities.values()];
  }
}
