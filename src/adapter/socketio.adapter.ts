/**
 * socket.io Transport Adapter
 *
 * Clients connect with handshake auth `{ gameId, identity }`. Each socket
 * joins its game's room; outbound messages go out on the `message` event and
 * inbound payloads arrive on it too. A second connection for the same
 * identity in the same game replaces the first.
 */

import { Server as HTTPServer } from 'http';
import { Server, Socket } from 'socket.io';
import { OutboundMessage } from '../game/types';
import { sanitizeGameId, sanitizeIdentity } from '../utils/sanitize';
import { transportLogger } from '../utils/logger';
import { ClientRef, ITransportAdapter, TransportConfig, TransportEventHandlers } from './types';

interface ServerToClientEvents {
  message: (message: OutboundMessage) => void;
}

interface ClientToServerEvents {
  message: (payload: unknown) => void;
}

type InterServerEvents = Record<string, never>;

type SocketData = ClientRef;

type ClientSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

function roomFor(gameId: string): string {
  return `game:${gameId}`;
}

function clientKey(gameId: string, identity: string): string {
  return `${gameId}\u0000${identity}`;
}

/**
 * Real implementation of ITransportAdapter on a socket.io server sharing the HTTP server
 */
export class SocketIOTransportAdapter implements ITransportAdapter {
  private io: Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData> | null = null;
  private handlers: TransportEventHandlers = {};
  private sockets: Map<string, ClientSocket> = new Map();
  private initialized: boolean = false;

  constructor(
    private readonly httpServer: HTTPServer,
    private readonly config: TransportConfig
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      transportLogger.warn('Transport already initialized');
      return;
    }

    this.io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(this.httpServer, {
      cors: { origin: this.config.corsOrigin },
      ...(this.config.path ? { path: this.config.path } : {}),
    });

    this.io.use((socket, next) => {
      const auth: Record<string, unknown> = socket.handshake.auth;
      const gameId = sanitizeGameId(auth.gameId);
      const identity = sanitizeIdentity(auth.identity);
      if (!gameId.valid) {
        next(new Error(gameId.error ?? 'Invalid game id'));
        return;
      }
      if (!identity.valid) {
        next(new Error(identity.error ?? 'Invalid identity'));
        return;
      }
      socket.data = { gameId: gameId.sanitized, identity: identity.sanitized };
      next();
    });

    this.io.on('connection', (socket) => this.handleConnection(socket));

    this.initialized = true;
    transportLogger.info({ corsOrigin: this.config.corsOrigin }, 'socket.io transport ready');
  }

  private handleConnection(socket: ClientSocket): void {
    const client: ClientRef = { gameId: socket.data.gameId, identity: socket.data.identity };
    const key = clientKey(client.gameId, client.identity);

    const previous = this.sockets.get(key);
    this.sockets.set(key, socket);
    if (previous) {
      transportLogger.info({ ...client, socketId: socket.id }, 'Replacing existing connection');
      previous.disconnect(true);
    }

    void socket.join(roomFor(client.gameId));
    transportLogger.debug({ ...client, socketId: socket.id }, 'Client connected');

    socket.on('message', (payload) => {
      this.handlers.onClientMessage?.(client, payload);
    });

    socket.on('disconnect', (reason) => {
      // A replaced socket no longer speaks for its identity.
      if (this.sockets.get(key) !== socket) return;
      this.sockets.delete(key);
      transportLogger.debug({ ...client, reason }, 'Client disconnected');
      this.handlers.onClientDisconnect?.(client);
    });

    this.handlers.onClientConnect?.(client);
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  broadcast(gameId: string, message: OutboundMessage): void {
    this.io?.to(roomFor(gameId)).emit('message', message);
  }

  unicast(gameId: string, identity: string, message: OutboundMessage): void {
    const socket = this.sockets.get(clientKey(gameId, identity));
    if (!socket) {
      transportLogger.debug({ gameId, identity, type: message.type }, 'Dropping message for absent client');
      return;
    }
    socket.emit('message', message);
  }

  disconnectClient(gameId: string, identity: string): void {
    this.sockets.get(clientKey(gameId, identity))?.disconnect(true);
  }

  getConnectionCount(): number {
    return this.sockets.size;
  }

  setEventHandlers(handlers: TransportEventHandlers): void {
    this.handlers = handlers;
  }

  async close(): Promise<void> {
    const io = this.io;
    if (!io) return;

    this.io = null;
    this.initialized = false;
    // Stop reacting before sockets drop so shutdown does not record disconnects.
    this.handlers = {};
    this.sockets.clear();
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
    transportLogger.info('socket.io transport closed');
  }
}

export function createSocketIOAdapter(httpServer: HTTPServer, config: TransportConfig): SocketIOTransportAdapter {
  return new SocketIOTransportAdapter(httpServer, config);
}
