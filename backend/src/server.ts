/** Express + WebSocket server for the inference desk. */

import 'dotenv/config';
import fs from 'node:fs';
import http from 'node:http';
import { fileURLToPath, pathToFileURL } from 'node:url';
import path from 'node:path';
import express, { type NextFunction, type Request, type Response } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import type { WSEvent } from './models/events.js';
import { InferenceClientManager, type ClientFactory } from './services/inferenceClientManager.js';
import { GenerationStore } from './services/generationStore.js';
import { TextToImageRunner } from './services/textToImageRunner.js';
import { PackageStore, createBasePackages } from './services/extensions/packageStore.js';
import type { BasePackage } from './models/package.js';
import { createInferenceRouter } from './routes/inference.js';
import { createExtensionRouter } from './routes/extensions.js';
import { loadConfig, type AppConfig } from './utils/config.js';
import { Logger, errorMessage } from './utils/logger.js';

// -- WebSocket Connection Manager --

export class ConnectionManager {
  private connections = new Set<WebSocket>();

  connect(ws: WebSocket): void {
    this.connections.add(ws);
  }

  disconnect(ws: WebSocket): void {
    this.connections.delete(ws);
  }

  get size(): number {
    return this.connections.size;
  }

  /** Send an event to every open UI socket. */
  broadcast(event: WSEvent): void {
    const data = JSON.stringify(event);
    for (const ws of this.connections) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(data);
      }
    }
  }
}

// -- Services --

export interface AppServices {
  config: AppConfig;
  logger: Logger;
  connections: ConnectionManager;
  clients: InferenceClientManager;
  generations: GenerationStore;
  runner: TextToImageRunner;
  packages: PackageStore;
}

export interface ServiceOverrides {
  createClient?: ClientFactory;
  basePackages?: BasePackage[];
}

export function createServices(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): AppServices {
  const connections = new ConnectionManager();
  const send = (event: WSEvent) => connections.broadcast(event);
  const clients = new InferenceClientManager({
    defaultAddress: config.comfyBaseUrl,
    outputImagesDir: config.comfyOutputDir,
    send,
    logger,
    createClient: overrides.createClient,
  });
  return {
    config,
    logger,
    connections,
    clients,
    generations: new GenerationStore(),
    runner: new TextToImageRunner({ clients, send, gridDir: config.gridDir, logger }),
    packages: new PackageStore(config.packagesFile, overrides.basePackages ?? createBasePackages(logger), logger),
  };
}

// -- Express App --

export function createApp(services: AppServices, staticDir?: string): express.Express {
  const { config, connections, clients, generations, runner, packages, logger } = services;
  const send = (event: WSEvent) => connections.broadcast(event);
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // CORS: only needed in dev mode (frontend on separate origin)
  if (!staticDir) {
    app.use((_req, res, next) => {
      res.header('Access-Control-Allow-Origin', 'http://localhost:5173');
      res.header('Access-Control-Allow-Methods', '*');
      res.header('Access-Control-Allow-Headers', '*');
      next();
    });
  }

  app.get('/api/health', (_req, res) => {
    res.json({
      status: clients.isConnected ? 'ready' : 'degraded',
      inference: clients.isConnected ? 'connected' : 'disconnected',
      address: clients.address ?? config.comfyBaseUrl,
    });
  });

  app.use('/api/inference', createInferenceRouter({
    clients,
    generations,
    runner,
    send,
    imageRoots: () => [config.comfyOutputDir, config.gridDir].filter((d): d is string => d !== null),
    logger,
  }));
  app.use('/api/packages', createExtensionRouter({ packages, send, logger }));

  if (staticDir) {
    app.use(express.static(staticDir));
    // SPA fallback: non-API routes return index.html
    app.get('{*path}', (_req, res) => {
      res.sendFile(path.join(staticDir, 'index.html'));
    });
  }

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    logger.error('Unhandled route error', { error: errorMessage(err) });
    res.status(500).json({ detail: errorMessage(err) });
  });

  return app;
}

// -- Server Startup --

export interface StartedServer {
  server: http.Server;
  services: AppServices;
}

/** Start the HTTP server and the /ws/events socket. */
export function startServer(
  config: AppConfig,
  options: { staticDir?: string; logger?: Logger; overrides?: ServiceOverrides } = {},
): Promise<StartedServer> {
  const logger = options.logger ?? Logger.create({ level: config.logLevel, logDir: config.logDir });
  const services = createServices(config, logger, options.overrides);
  const app = createApp(services, options.staticDir);
  const server = http.createServer(app);
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '', `http://${request.headers.host ?? 'localhost'}`);
    if (url.pathname !== '/ws/events') {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      services.connections.connect(ws);
      ws.on('close', () => services.connections.disconnect(ws));
      ws.on('message', () => {
        // Client keepalive; ignore content
      });
    });
  });

  server.on('close', () => {
    services.generations.clear();
    services.clients.disconnect();
    wss.close();
  });

  return new Promise((resolve) => {
    server.listen(config.port, () => {
      const addr = server.address();
      const port = addr && typeof addr === 'object' ? addr.port : config.port;
      logger.info('Backend listening', { port });
      if (config.autoConnect) {
        services.clients.connect().catch((err: unknown) => {
          logger.warn('Auto-connect failed', { address: config.comfyBaseUrl, error: errorMessage(err) });
        });
      }
      resolve({ server, services });
    });
  });
}

// -- Direct execution --

const isDirectRun = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  const builtFrontend = fileURLToPath(new URL('../../frontend/dist', import.meta.url));
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
  startServer(config, { staticDir: fs.existsSync(builtFrontend) ? builtFrontend : undefined }).catch((err: unknown) => {
    console.error('Failed to start server:', errorMessage(err));
    process.exit(1);
  });
}
