#!/usr/bin/env node
/**
 * TaskRelay CLI
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { config as loadEnv } from 'dotenv';
import { startServer } from './commands/server.js';
import { validatePlanFile } from './commands/validate.js';
import { runPlanFile } from './commands/run.js';

// Load environment variables from .env (fallback)
loadEnv();

function integer(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

const program = new Command();

program
  .name('taskrelay')
  .description('Run dependency-ordered agent plans')
  .version('0.1.0');

// Validate command - schema and graph checks only
program
  .command('validate <file>')
  .description('Check a plan file without running it')
  .option('--json', 'Print the result as JSON')
  .action(validatePlanFile);

// Run command - local engine with simulated agents
program
  .command('run <file>')
  .description('Execute a plan file locally with simulated agents')
  .option('-c, --concurrency <n>', 'Steps that may run at once', integer(1))
  .option('-t, --timeout <ms>', 'Default step timeout', integer(1))
  .option('-r, --retries <n>', 'Retries for transient failures', integer(0))
  .option('-d, --delay <ms>', 'Simulated agent latency', integer(0))
  .option('--fail-fast', 'Cancel remaining steps after the first failure')
  .option('--json', 'Print only the final snapshot as JSON')
  .addOption(
    new Option('--log-level <level>', 'Engine log level')
      .choices(['debug', 'info', 'warn', 'error'])
      .default('warn'),
  )
  .action(runPlanFile);

// Server command - HTTP API and WebSocket gateway
program
  .command('server')
  .description('Start the HTTP API server')
  .option('-p, --port <port>', 'Port to listen on', integer(1))
  .option('--host <host>', 'Host to bind to')
  .action(startServer);

// Parse arguments
program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
