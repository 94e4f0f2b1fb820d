/**
 * Gateway bootstrap
 *
 * Wires the service registry (log, agents, events, engine), then serves
 * the Hono app and attaches the WebSocket observer channel to the same
 * HTTP server.
 */

import { serve } from '@hono/node-server';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import {
  AgentRegistry,
  PlanEngine,
  PlanEventBus,
  Services,
  initServiceRegistry,
  registerSimulatedAgents,
  resetServiceRegistry,
  resolveEngineConfig,
  type ServiceRegistry,
} from '@taskrelay/core';
import { createApp } from './app.js';
import type { GatewayConfig } from './types/index.js';
import { WSGateway } from './ws/index.js';
import { createLogService } from './services/log-service-impl.js';
import { getLog } from './services/log.js';

const log = getLog('Server');

export interface RunningGateway {
  readonly port: number;
  readonly engine: PlanEngine;
  readonly ws: WSGateway;
  /** Cancel running plans, close sockets and stop listening */
  close(): Promise<void>;
}

/**
 * Create the global service registry and register everything the routes
 * and the WebSocket bridge resolve. Simulated agents fill every default
 * capability that has no real integration.
 */
export function bootstrapServices(config: GatewayConfig): ServiceRegistry {
  const registry = initServiceRegistry();

  registry.register(Services.Log, createLogService(config.log));

  const engineConfig = resolveEngineConfig(config.engine);
  const agents = new AgentRegistry();
  const events = new PlanEventBus(engineConfig.subscriberBufferSize);
  const engine = new PlanEngine({ agents, events, config: engineConfig });

  registry.register(Services.Agents, agents);
  registry.register(Services.Events, events);
  registry.register(Services.Engine, engine, { dispose: (e) => e.shutdown() });

  const simulated = registerSimulatedAgents(agents, { delayMs: config.simulatedAgentDelayMs });
  log.info('Services registered', {
    capabilities: agents.list().map((entry) => entry.capability),
    simulated,
    maxConcurrentSteps: engineConfig.maxConcurrentSteps,
    failurePolicy: engineConfig.failurePolicy,
  });

  return registry;
}

/**
 * Start the HTTP server and WebSocket gateway. Resolves once listening.
 */
export function startServer(config: GatewayConfig): Promise<RunningGateway> {
  const registry = bootstrapServices(config);
  const engine = registry.get(Services.Engine);
  const app = createApp({ corsOrigins: config.corsOrigins, bodyLimitBytes: config.bodyLimitBytes });
  const ws = new WSGateway(engine, { path: config.wsPath, allowedOrigins: config.corsOrigins });

  return new Promise((resolve) => {
    const server = serve(
      { fetch: app.fetch, port: config.port, hostname: config.host },
      (info: AddressInfo) => {
        log.info(`Server running at http://${info.address}:${info.port}`);
        log.info(`WebSocket Gateway at ws://${info.address}:${info.port}${config.wsPath}`);
        resolve({
          port: info.port,
          engine,
          ws,
          close: () => stopServer(httpServer, ws, engine),
        });
      }
    );
    // serve() is typed for http, https and http2; the plain options above create an http.Server
    const httpServer = server as Server;
    ws.attachToServer(httpServer);
  });
}

async function stopServer(server: Server, ws: WSGateway, engine: PlanEngine): Promise<void> {
  await engine.shutdown();
  await ws.stop();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await resetServiceRegistry();
}
