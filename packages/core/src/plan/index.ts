export * from './types.js';
export {
  type MalformedReference,
  type ResultLookup,
  parseReferenceExpression,
  formatReference,
  compileParameters,
  collectReferences,
  resolveTemplate,
  resolveParameters,
} from './references.js';
export { findCycle, topologicalOrder, validatePlan } from './validator.js';
