// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Control Server
// WebSocket transport for the control protocol
// Keepalive pings drop dead clients; status is pushed at a fixed interval
// ═══════════════════════════════════════════════════════════════════════════════

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { IncomingMessage } from 'http';
import { Logger } from '../core/logging/Logger';
import { generateId } from '../core/ids';
import { ServoSystemConfig } from '../config/system';
import { ClientConnection, ControlProtocol } from './ControlProtocol';

export type ControlServerOptions = ServoSystemConfig['server'];

interface SocketClient {
  socket: WebSocket;
  connection: ClientConnection;
  pongTimer?: ReturnType<typeof setTimeout>;
}

export class ControlServer {
  private wss: WebSocketServer | null = null;
  private clients: Map<string, SocketClient> = new Map();
  private pingTimer?: ReturnType<typeof setInterval>;
  private broadcastTimer?: ReturnType<typeof setInterval>;

  constructor(
    private readonly protocol: ControlProtocol,
    private readonly options: ControlServerOptions,
    private readonly logger: Logger,
  ) {}

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.wss) return;

    const { host, port } = this.options;
    const wss = new WebSocketServer({ host, port });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        wss.off('listening', onListening);
        reject(error);
      };
      const onListening = (): void => {
        wss.off('error', onError);
        resolve();
      };
      wss.once('error', onError);
      wss.once('listening', onListening);
    });

    wss.on('connection', (socket, request) => this.accept(socket, request));
    wss.on('error', (error) => this.logger.error(`Server error: ${error.message}`));
    this.wss = wss;

    this.pingTimer = setInterval(() => this.pingAll(), this.options.pingIntervalMs);
    this.broadcastTimer = setInterval(() => this.pushStatus(), this.options.broadcastIntervalMs);

    this.logger.info(`Control server listening on ws://${host}:${this.getPort() ?? port}`);
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;

    if (this.pingTimer) clearInterval(this.pingTimer);
    if (this.broadcastTimer) clearInterval(this.broadcastTimer);
    this.pingTimer = undefined;
    this.broadcastTimer = undefined;

    for (const [id, client] of this.clients) {
      if (client.pongTimer) clearTimeout(client.pongTimer);
      client.socket.terminate();
      this.protocol.disconnect(id);
    }
    this.clients.clear();

    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    this.wss = null;
    this.logger.info('Control server stopped');
  }

  getPort(): number | undefined {
    const address = this.wss?.address();
    return typeof address === 'object' && address !== null ? address.port : undefined;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Connections
  // ─────────────────────────────────────────────────────────────────────────

  private accept(socket: WebSocket, request: IncomingMessage): void {
    const id = generateId('client');
    const connection: ClientConnection = {
      id,
      send: (data) => {
        if (socket.readyState === WebSocket.OPEN) socket.send(data);
      },
    };
    const client: SocketClient = { socket, connection };
    this.clients.set(id, client);

    socket.on('pong', () => {
      if (client.pongTimer) clearTimeout(client.pongTimer);
      client.pongTimer = undefined;
    });

    socket.on('message', (data: RawData) => {
      this.protocol.handleMessage(connection, decode(data)).catch((error: unknown) => {
        this.logger.error(`Unhandled message error from ${id}: ${String(error)}`);
      });
    });

    socket.on('close', () => this.drop(id));
    socket.on('error', (error) => this.logger.warn(`Client ${id} error: ${error.message}`));

    this.protocol.connect(connection, request.socket.remoteAddress);
  }

  private drop(id: string): void {
    const client = this.clients.get(id);
    if (!client) return;

    if (client.pongTimer) clearTimeout(client.pongTimer);
    this.clients.delete(id);
    this.protocol.disconnect(id);
  }

  private pingAll(): void {
    for (const [id, client] of this.clients) {
      if (client.pongTimer) continue;

      client.pongTimer = setTimeout(() => {
        this.logger.warn(`Client ${id} missed keepalive, closing`);
        client.socket.terminate();
        this.drop(id);
      }, this.options.pongTimeoutMs);

      client.socket.ping();
    }
  }

  private pushStatus(): void {
    if (this.protocol.clientCount() === 0) return;
    this.protocol.broadcast({ type: 'status_update', ...this.protocol.buildStatus() });
  }
}

function decode(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}
