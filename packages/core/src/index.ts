/**
 * @taskrelay/core
 *
 * Plan execution engine: validation, scheduling, agent dispatch and
 * status events. Uses only Node.js built-in modules.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Plans (types, references, validation)
export * from './plan/index.js';

// Agents
export * from './agents/index.js';

// Events
export * from './events/index.js';

// Engine
export * from './engine/index.js';

// Services (ServiceRegistry, logging, tokens)
export * from './services/index.js';

// Version
export const VERSION = '0.1.0';
