/**
 * Telemetry feed type definitions
 */

import type { BridgeMessage } from '@events/types';
import type { Logger } from '@logging';
import type { Bridge } from '@system/bridge/types';

/**
 * ws readyState of an open socket
 */
export const SOCKET_OPEN = 1;

/**
 * Connected feed client (the part of a ws WebSocket the feed uses)
 */
export interface FeedSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
}

/**
 * Where a feed error was raised
 */
export type FeedErrorSource = 'client' | 'server';

/**
 * Listening WebSocket server
 */
export interface FeedServer {
  /** Bound TCP port */
  readonly port: number;
  clients(): Iterable<FeedSocket>;
  onConnection(listener: (socket: FeedSocket) => void): void;
  /** Socket and server errors after listening started */
  onError(listener: (err: Error, source: FeedErrorSource) => void): void;
  close(): Promise<void>;
}

/**
 * Opens the listening socket
 */
export type FeedListen = (port: number, host: string) => Promise<FeedServer>;

export interface TelemetryServerConfig {
  port: number;
  host: string;
}

export interface TelemetryServerDependencies {
  logger: Logger;
  /** Defaults to a ws WebSocketServer */
  listen?: FeedListen;
}

/**
 * Broadcasts bridge messages as JSON to every connected client
 */
export interface TelemetryServer {
  /** Start listening; resolves with the bound port */
  start(): Promise<number>;
  /** Send to every open client; returns how many were sent to */
  broadcast(message: BridgeMessage): number;
  /** Forward the bridge's status, telemetry and device events; returns a detach function */
  attach(bridge: Pick<Bridge, 'onStatus' | 'onTelemetry' | 'onDevice' | 'onScan'>): () => void;
  clientCount(): number;
  close(): Promise<void>;
}
