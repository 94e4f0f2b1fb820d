/**
 * Agent Dispatch Interface
 *
 * Every capability (search, calendar, messaging, ...) is reached through
 * this one contract. The engine never inspects what an agent returns.
 */

export interface AgentContext {
  readonly planId: string;
  readonly stepId: string;
  readonly capability: string;
  /** 1 for the first attempt, 2 for the first retry, ... */
  readonly attempt: number;
  /** Epoch ms after which the engine stops waiting */
  readonly deadline: number;
  readonly timeoutMs: number;
  /** Aborted on timeout or plan cancellation; honoring it is best-effort */
  readonly signal: AbortSignal;
}

/**
 * Capability implementation. Throw TransientAgentError to ask for a retry,
 * PermanentAgentError to fail the step outright. Must be safe to call
 * concurrently for different steps.
 */
export interface CapabilityAgent {
  execute(parameters: Record<string, unknown>, context: AgentContext): Promise<unknown>;
}

export type AgentFunction = CapabilityAgent['execute'];

export interface CapabilityOptions {
  /** Default deadline for steps of this capability */
  timeoutMs?: number;
  /** When false a timeout fails the step instead of being retried (default true) */
  retryOnTimeout?: boolean;
  description?: string;
}

export interface RegisteredCapability {
  readonly capability: string;
  readonly agent: CapabilityAgent;
  readonly timeoutMs?: number;
  readonly retryOnTimeout: boolean;
  readonly description?: string;
}
