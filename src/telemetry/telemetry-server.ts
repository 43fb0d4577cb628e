/**
 * Telemetry feed
 *
 * Optional WebSocket server broadcasting status, telemetry and device
 * messages. New clients get the latest telemetry of every session first.
 */

import { errorMessage } from '@hardware/radio/helpers';

import { serializeMessage, snapshotKey } from './helpers';
import { listenWebSocket } from './ws-server';
import { SOCKET_OPEN } from './types';

import type { BridgeMessage, Telemetry } from '@events/types';
import type { Bridge } from '@system/bridge/types';
import type {
  FeedErrorSource,
  FeedServer,
  FeedSocket,
  TelemetryServer,
  TelemetryServerConfig,
  TelemetryServerDependencies
} from './types';

/**
 * Create the telemetry feed
 */
export function createTelemetryServer(
  config: TelemetryServerConfig,
  deps: TelemetryServerDependencies
): TelemetryServer {
  const logger = deps.logger;
  const listen = deps.listen || listenWebSocket;
  const snapshots = new Map<string, Telemetry>();

  let server: FeedServer | null = null;

  function send(socket: FeedSocket, data: string): boolean {
    if (socket.readyState !== SOCKET_OPEN) return false;
    try {
      socket.send(data, function (err?: Error) {
        if (err) logger.debug('Feed send failed: ' + err.message);
      });
      return true;
    } catch (err) {
      logger.debug('Feed send failed: ' + errorMessage(err));
      return false;
    }
  }

  function onConnection(socket: FeedSocket): void {
    logger.info('Telemetry client connected (' + clientCount() + ' open)');
    for (const telemetry of snapshots.values()) {
      send(socket, serializeMessage(telemetry));
    }
  }

  async function start(): Promise<number> {
    if (server !== null) return server.port;

    const opened = await listen(config.port, config.host);
    opened.onConnection(onConnection);
    opened.onError(function (err: Error, source: FeedErrorSource) {
      logger.warning('Feed ' + source + ' error: ' + err.message);
    });
    server = opened;
    logger.info('Telemetry feed on ws://' + config.host + ':' + opened.port);
    return opened.port;
  }

  function broadcast(message: BridgeMessage): number {
    if (message.type === 'telemetry') {
      snapshots.set(snapshotKey(message), message);
    }
    if (server === null) return 0;

    const data = serializeMessage(message);
    let sent = 0;
    for (const socket of server.clients()) {
      if (send(socket, data)) sent++;
    }
    return sent;
  }

  function attach(bridge: Pick<Bridge, 'onStatus' | 'onTelemetry' | 'onDevice' | 'onScan'>): () => void {
    const detachers = [
      bridge.onStatus(broadcast),
      bridge.onTelemetry(broadcast),
      bridge.onDevice(broadcast),
      bridge.onScan(broadcast)
    ];
    return function () {
      detachers.forEach(function (detach) { detach(); });
    };
  }

  function clientCount(): number {
    if (server === null) return 0;
    let open = 0;
    for (const socket of server.clients()) {
      if (socket.readyState === SOCKET_OPEN) open++;
    }
    return open;
  }

  async function close(): Promise<void> {
    const closing = server;
    server = null;
    snapshots.clear();
    if (closing === null) return;

    await closing.close();
    logger.info('Telemetry feed closed');
  }

  return {
    start: start,
    broadcast: broadcast,
    attach: attach,
    clientCount: clientCount,
    close: close
  };
}
