/**
 * HTTP Server entry point
 */

// Load .env file FIRST, before the config is read
import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Try monorepo root, then the package, then the working directory
const envPaths = [
  resolve(__dirname, '..', '..', '..', '.env'),
  resolve(__dirname, '..', '.env'),
  resolve(process.cwd(), '.env'),
];

const envPath = envPaths.find((path) => existsSync(path));
if (envPath) {
  config({ path: envPath });
}

import { getErrorMessage } from '@taskrelay/core';
import { loadGatewayConfig } from './config/defaults.js';
import { startServer } from './server.js';
import { getLog } from './services/log.js';

const log = getLog('Main');

async function main(): Promise<void> {
  const gateway = await startServer(loadGatewayConfig());
  if (envPath) log.info(`Loaded .env from: ${envPath}`);

  let isShuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await gateway.close();
    } catch (error) {
      log.warn('Shutdown error', { error: getErrorMessage(error) });
    }
    log.info('Cleanup complete, exiting.');

    // Force exit after 5s if something hangs
    setTimeout(() => process.exit(0), 5000).unref();
  }

  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled Promise Rejection', { reason: String(reason) });
  });
}

main().catch((error: unknown) => {
  log.error('Fatal: server startup failed', { error: getErrorMessage(error) });
  process.exit(1);
});
