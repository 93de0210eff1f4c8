/**
 * Transport Adapter Interface
 * Abstracts the realtime client connection layer for testing and implementation flexibility
 */

import { OutboundMessage } from '../game/types';

/**
 * A connected client, addressed by the game it joined and its authenticated identity
 */
export interface ClientRef {
  gameId: string;
  identity: string;
}

/**
 * Transport configuration for initialization
 */
export interface TransportConfig {
  corsOrigin: string;
  path?: string;
}

/**
 * Event handlers interface
 */
export interface TransportEventHandlers {
  onClientConnect?: (client: ClientRef) => void;
  onClientDisconnect?: (client: ClientRef) => void;
  onClientMessage?: (client: ClientRef, payload: unknown) => void;
}

/**
 * Abstract interface for client transport operations
 * Allows mocking for tests and swapping implementations
 */
export interface ITransportAdapter {
  // Initialization
  initialize(): Promise<void>;
  isInitialized(): boolean;

  // Messaging
  broadcast(gameId: string, message: OutboundMessage): void;
  unicast(gameId: string, identity: string, message: OutboundMessage): void;

  // Connections
  disconnectClient(gameId: string, identity: string): void;
  getConnectionCount(): number;

  // Event handlers
  setEventHandlers(handlers: TransportEventHandlers): void;

  // Cleanup
  close(): Promise<void>;
}
