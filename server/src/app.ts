import http from 'node:http';
import express from 'express';
import cors from 'cors';
import type { WebSocketServer } from 'ws';
import { config } from './config.js';
import { BroadcastRouter, type BroadcastRouterOptions } from './lib/broadcastRouter.js';
import { ClientRegistry } from './lib/clientRegistry.js';
import { EventBus } from './lib/eventBus.js';
import { createClientRouter } from './routes/clientRoutes.js';
import { createHealthRouter } from './routes/health.js';
import { registerWebSocketServer, type GatewayOptions, type Hub } from './ws/server.js';

export interface HubServerOptions extends GatewayOptions, BroadcastRouterOptions {
  corsOrigins?: string[];
}

export interface HubServer {
  app: express.Express;
  server: http.Server;
  wss: WebSocketServer;
  hub: Hub;
}

export function createHubServer(options: HubServerOptions = {}): HubServer {
  const bus = new EventBus();
  const registry = new ClientRegistry(bus);
  const router = new BroadcastRouter(registry, bus, options);
  const hub: Hub = { registry, bus, router };

  const app = express();

  app.use(
    cors({
      origin: options.corsOrigins ?? config.corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '64kb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: 'LedFx Client Hub',
      version: '0.1.0',
      websocket: options.path ?? config.wsPath,
    });
  });

  app.use('/health', createHealthRouter(registry));
  app.use('/api/clients', createClientRouter(registry));

  const server = http.createServer(app);
  const wss = registerWebSocketServer(server, hub, options);

  server.on('close', () => wss.close());

  return { app, server, wss, hub };
}
