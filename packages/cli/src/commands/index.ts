export { startServer, resolveServerConfig, type ServerOptions } from './server.js';
export { validatePlanFile } from './validate.js';
export { runPlanFile, formatEvent, toEngineConfig, type RunOptions } from './run.js';
export { loadPlanFile } from './plan-file.js';
