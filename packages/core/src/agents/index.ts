export * from './types.js';
export { AgentRegistry } from './registry.js';
export {
  DEFAULT_CAPABILITIES,
  type SimulatedAgentOptions,
  type SimulatedResult,
  createSimulatedAgent,
  registerSimulatedAgents,
} from './simulated.js';
