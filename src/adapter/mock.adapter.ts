/**
 * Mock Transport Adapter for Testing
 */

import { OutboundMessage } from '../game/types';
import { ClientRef, ITransportAdapter, TransportEventHandlers } from './types';

export interface RecordedMessage {
  gameId: string;
  // Null for broadcasts
  identity: string | null;
  message: OutboundMessage;
  timestamp: number;
}

function clientKey(gameId: string, identity: string): string {
  return `${gameId}\u0000${identity}`;
}

/**
 * Mock implementation of ITransportAdapter for unit and integration testing
 */
export class MockTransportAdapter implements ITransportAdapter {
  private clients: Map<string, ClientRef> = new Map();
  private handlers: TransportEventHandlers = {};
  private messages: RecordedMessage[] = [];
  private initialized: boolean = false;

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  broadcast(gameId: string, message: OutboundMessage): void {
    this.messages.push({ gameId, identity: null, message, timestamp: Date.now() });
  }

  unicast(gameId: string, identity: string, message: OutboundMessage): void {
    this.messages.push({ gameId, identity, message, timestamp: Date.now() });
  }

  disconnectClient(gameId: string, identity: string): void {
    this.simulateDisconnect(gameId, identity);
  }

  getConnectionCount(): number {
    return this.clients.size;
  }

  setEventHandlers(handlers: TransportEventHandlers): void {
    this.handlers = handlers;
  }

  async close(): Promise<void> {
    this.clients.clear();
    this.messages = [];
    this.initialized = false;
  }

  // === Test Helper Methods ===

  /**
   * Simulate a client connecting to a game
   */
  simulateConnect(gameId: string, identity: string): ClientRef {
    const client: ClientRef = { gameId, identity };
    this.clients.set(clientKey(gameId, identity), client);
    this.handlers.onClientConnect?.(client);
    return client;
  }

  /**
   * Simulate a client dropping its connection
   */
  simulateDisconnect(gameId: string, identity: string): void {
    const key = clientKey(gameId, identity);
    const client = this.clients.get(key);
    if (client) {
      this.clients.delete(key);
      this.handlers.onClientDisconnect?.(client);
    }
  }

  /**
   * Simulate a client sending a payload. Ignored for clients not connected.
   */
  simulateMessage(gameId: string, identity: string, payload: unknown): void {
    const client = this.clients.get(clientKey(gameId, identity));
    if (client) {
      this.handlers.onClientMessage?.(client, payload);
    }
  }

  /**
   * Get all recorded messages (for assertions)
   */
  getRecordedMessages(): RecordedMessage[] {
    return [...this.messages];
  }

  /**
   * Messages sent to one identity only
   */
  getPrivateMessages(identity: string): OutboundMessage[] {
    return this.messages.filter((m) => m.identity === identity).map((m) => m.message);
  }

  /**
   * Messages sent to everyone in a game
   */
  getPublicMessages(gameId?: string): OutboundMessage[] {
    return this.messages
      .filter((m) => m.identity === null && (gameId === undefined || m.gameId === gameId))
      .map((m) => m.message);
  }

  /**
   * Everything one identity would have received: its private messages plus broadcasts to its game
   */
  getMessagesSeenBy(gameId: string, identity: string): OutboundMessage[] {
    return this.messages
      .filter((m) => m.gameId === gameId && (m.identity === null || m.identity === identity))
      .map((m) => m.message);
  }

  /**
   * Clear recorded messages (useful between test assertions)
   */
  clearMessages(): void {
    this.messages = [];
  }
}

/**
 * Create a mock adapter for testing
 */
export function createMockAdapter(): MockTransportAdapter {
  return new MockTransportAdapter();
}
