/** In-process stand-in for the inference backend's HTTP + WebSocket API. */

import http from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';

export interface RecordedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  body: unknown;
}

export interface FakeResponse {
  status?: number;
  body: unknown;
}

type Route = (req: RecordedRequest) => FakeResponse;

export class FakeComfyServer {
  readonly requests: RecordedRequest[] = [];
  readonly clientIds: string[] = [];
  private readonly routes = new Map<string, Route>();
  private readonly server: http.Server;
  private readonly wss: WebSocketServer;
  private readonly sockets = new Set<WebSocket>();
  private connectionWaiters: Array<() => void> = [];
  baseUrl = '';

  constructor() {
    this.server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const url = new URL(req.url ?? '/', 'http://127.0.0.1');
        const raw = Buffer.concat(chunks).toString('utf-8');
        let body: unknown = null;
        if (raw) {
          try {
            body = JSON.parse(raw);
          } catch {
            body = raw;
          }
        }
        const recorded: RecordedRequest = { method: req.method ?? 'GET', path: url.pathname, query: url.searchParams, body };
        this.requests.push(recorded);

        const route = this.routes.get(`${recorded.method} ${recorded.path}`);
        const response = route ? route(recorded) : { status: 404, body: { error: 'not found' } };
        const payload = typeof response.body === 'string' ? response.body : JSON.stringify(response.body);
        res.writeHead(response.status ?? 200, { 'Content-Type': 'application/json' });
        res.end(payload);
      });
    });

    this.wss = new WebSocketServer({ noServer: true });
    this.server.on('upgrade', (req, socket, head) => {
      const url = new URL(req.url ?? '/', 'http://127.0.0.1');
      if (url.pathname !== '/ws') {
        socket.destroy();
        return;
      }
      this.wss.handleUpgrade(req, socket, head, (ws) => {
        this.clientIds.push(url.searchParams.get('clientId') ?? '');
        this.sockets.add(ws);
        ws.on('close', () => this.sockets.delete(ws));
        const waiters = this.connectionWaiters;
        this.connectionWaiters = [];
        for (const resolve of waiters) resolve();
      });
    });
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.server.listen(0, '127.0.0.1', () => resolve());
    });
    const addr = this.server.address();
    if (addr && typeof addr === 'object') {
      this.baseUrl = `http://127.0.0.1:${addr.port}`;
    }
  }

  async stop(): Promise<void> {
    for (const ws of this.sockets) ws.terminate();
    this.wss.close();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  on(method: string, path: string, route: Route | FakeResponse): void {
    this.routes.set(`${method} ${path}`, typeof route === 'function' ? route : () => route);
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  waitForConnection(): Promise<void> {
    if (this.sockets.size > 0) return Promise.resolve();
    return new Promise<void>((resolve) => this.connectionWaiters.push(resolve));
  }

  sendJson(message: unknown): void {
    const text = JSON.stringify(message);
    for (const ws of this.sockets) ws.send(text);
  }

  sendBinary(data: Buffer): void {
    for (const ws of this.sockets) ws.send(data, { binary: true });
  }

  /** Close every client socket from the server side. */
  dropConnections(): void {
    for (const ws of this.sockets) ws.close();
  }
}

export function previewFrame(format: number, bytes: Buffer, eventType = 1): Buffer {
  const header = Buffer.alloc(8);
  header.writeUInt32BE(eventType, 0);
  header.writeUInt32BE(format, 4);
  return Buffer.concat([header, bytes]);
}
