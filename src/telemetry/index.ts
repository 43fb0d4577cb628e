/**
 * Telemetry feed module
 */

export { createTelemetryServer } from './telemetry-server';
export { listenWebSocket } from './ws-server';
export { serializeMessage } from './helpers';
export { SOCKET_OPEN } from './types';

export type {
  FeedErrorSource,
  FeedServer,
  FeedSocket,
  FeedListen,
  TelemetryServer,
  TelemetryServerConfig,
  TelemetryServerDependencies
} from './types';
