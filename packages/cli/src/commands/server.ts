/**
 * Server command - starts the HTTP API and WebSocket gateway
 *
 * Settings come from the environment (see loadGatewayConfig); flags
 * override the listen address.
 */

import {
  loadGatewayConfig,
  startServer as startGateway,
  type GatewayConfig,
  type RunningGateway,
} from '@taskrelay/gateway';
import { getErrorMessage } from '@taskrelay/core';

export interface ServerOptions {
  port?: number;
  host?: string;
}

export function resolveServerConfig(
  options: ServerOptions,
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  const config = loadGatewayConfig(env);
  return {
    ...config,
    ...(options.port !== undefined ? { port: options.port } : {}),
    ...(options.host !== undefined ? { host: options.host } : {}),
  };
}

export async function startServer(options: ServerOptions): Promise<void> {
  const config = resolveServerConfig(options);

  console.log('\n🚀 Starting TaskRelay Server...\n');
  console.log(`   Port:        ${config.port}`);
  console.log(`   Host:        ${config.host}`);
  console.log(`   Concurrency: ${config.engine.maxConcurrentSteps ?? 'default'}`);
  console.log('');

  let gateway: RunningGateway;
  try {
    gateway = await startGateway(config);
  } catch (error) {
    console.error('❌ Server failed to start:', getErrorMessage(error));
    process.exitCode = 1;
    return;
  }

  const base = `http://${config.host}:${gateway.port}`;
  console.log(`✅ Server running at ${base}`);
  console.log('');
  console.log('📚 API Endpoints:');
  console.log(`   Health:       ${base}/health`);
  console.log(`   Capabilities: ${base}/api/v1/capabilities`);
  console.log(`   Plans:        ${base}/api/v1/plans`);
  console.log(`   WebSocket:    ws://${config.host}:${gateway.port}${config.wsPath}`);
  console.log('');
  console.log('Press Ctrl+C to stop');

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    console.log('\n\n🛑 Shutting down...');
    gateway.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Shutdown failed:', getErrorMessage(error));
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
