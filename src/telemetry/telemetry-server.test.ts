/**
 * Tests for the telemetry feed
 */

import { createTelemetryServer } from './telemetry-server';
import { SOCKET_OPEN } from './types';

import type { StatusEvent, Telemetry } from '@events/types';
import type { Logger } from '@logging';
import type { Bridge } from '@system/bridge/types';
import type { FeedErrorSource, FeedServer, FeedSocket } from './types';

const TELEMETRY: Telemetry = {
  type: 'telemetry',
  slot: 0,
  device: 'SL-SF-24',
  address: 'AA:BB:CC:00:00:01',
  model: 'SF-24',
  status: 'ready',
  lastFrameHex: '01 01 00 00 00 00 00 00',
  framesSent: 12,
  framesSkipped: 30,
  framesDropped: 0,
  batteryPct: 64,
  lastStatus: 'battery 64%',
  timestamp: 1700000000000
};

const STATUS: StatusEvent = {
  type: 'status',
  slot: 0,
  address: 'AA:BB:CC:00:00:01',
  device: 'SL-SF-24',
  status: 'disconnected',
  previous: 'ready',
  reason: 'link lost: timeout',
  timestamp: 1700000000500
};

function fakeSocket(readyState: number = SOCKET_OPEN) {
  const received: string[] = [];
  const socket: FeedSocket = {
    readyState: readyState,
    send: function (data) {
      received.push(data);
    }
  };
  return { socket: socket, received: received };
}

function fakeServer(port = 8787) {
  const sockets: FeedSocket[] = [];
  let connectionListener: ((socket: FeedSocket) => void) | null = null;
  let errorListener: ((err: Error, source: FeedErrorSource) => void) | null = null;
  const close = vi.fn(() => Promise.resolve());
  const server: FeedServer = {
    port: port,
    clients: function () { return sockets; },
    onConnection: function (listener) { connectionListener = listener; },
    onError: function (listener) { errorListener = listener; },
    close: close
  };
  return {
    server: server,
    close: close,
    connect: function (socket: FeedSocket) {
      sockets.push(socket);
      if (connectionListener) connectionListener(socket);
    },
    fail: function (err: Error, source: FeedErrorSource) {
      if (errorListener) errorListener(err, source);
    }
  };
}

describe('createTelemetryServer', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = {
      log: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warning: vi.fn(),
      critical: vi.fn(),
      scope: function () { return logger; }
    };
  });

  function setup() {
    const wire = fakeServer();
    const listen = vi.fn(() => Promise.resolve(wire.server));
    const feed = createTelemetryServer({ port: 0, host: '127.0.0.1' }, { logger: logger, listen: listen });
    return { wire: wire, listen: listen, feed: feed };
  }

  it('should listen once and report the bound port', async () => {
    const { listen, feed } = setup();

    const port = await feed.start();
    const again = await feed.start();

    expect(port).toBe(8787);
    expect(again).toBe(8787);
    expect(listen).toHaveBeenCalledTimes(1);
    expect(listen).toHaveBeenCalledWith(0, '127.0.0.1');
    expect(logger.info).toHaveBeenCalledWith('Telemetry feed on ws://127.0.0.1:8787');
  });

  it('should send messages as JSON to open clients only', async () => {
    const { wire, feed } = setup();
    await feed.start();
    const open = fakeSocket();
    const closing = fakeSocket(2);
    wire.connect(open.socket);
    wire.connect(closing.socket);

    const sent = feed.broadcast(STATUS);

    expect(sent).toBe(1);
    expect(open.received).toEqual([JSON.stringify(STATUS)]);
    expect(closing.received).toEqual([]);
    expect(feed.clientCount()).toBe(1);
  });

  it('should replay the latest telemetry of each session to new clients', async () => {
    const { wire, feed } = setup();
    await feed.start();
    feed.broadcast({ ...TELEMETRY, framesSent: 11 });
    feed.broadcast(TELEMETRY);
    feed.broadcast(STATUS);

    const late = fakeSocket();
    wire.connect(late.socket);

    expect(late.received).toEqual([JSON.stringify(TELEMETRY)]);
  });

  it('should log client and server errors as warnings', async () => {
    const { wire, feed } = setup();
    await feed.start();

    wire.fail(new Error('read ECONNRESET'), 'client');
    wire.fail(new Error('write EPIPE'), 'server');

    expect(logger.warning).toHaveBeenCalledWith('Feed client error: read ECONNRESET');
    expect(logger.warning).toHaveBeenCalledWith('Feed server error: write EPIPE');
  });

  it('should not send before start', () => {
    const { feed } = setup();

    expect(feed.broadcast(STATUS)).toBe(0);
    expect(feed.clientCount()).toBe(0);
  });

  it('should keep broadcasting when one client throws', async () => {
    const { wire, feed } = setup();
    await feed.start();
    const broken: FeedSocket = {
      readyState: SOCKET_OPEN,
      send: function () {
        throw new Error('socket hang up');
      }
    };
    const healthy = fakeSocket();
    wire.connect(broken);
    wire.connect(healthy.socket);

    const sent = feed.broadcast(STATUS);

    expect(sent).toBe(1);
    expect(healthy.received).toHaveLength(1);
    expect(logger.debug).toHaveBeenCalledWith('Feed send failed: socket hang up');
  });

  it('should forward bridge events until detached', async () => {
    const { wire, feed } = setup();
    await feed.start();
    const client = fakeSocket();
    wire.connect(client.socket);

    const statusListeners: Array<(event: StatusEvent) => void> = [];
    const unsubscribe = vi.fn();
    const bridge: Pick<Bridge, 'onStatus' | 'onTelemetry' | 'onDevice' | 'onScan'> = {
      onStatus: function (listener) {
        statusListeners.push(listener);
        return unsubscribe;
      },
      onTelemetry: function () { return unsubscribe; },
      onDevice: function () { return unsubscribe; },
      onScan: function () { return unsubscribe; }
    };

    const detach = feed.attach(bridge);
    statusListeners[0](STATUS);
    detach();

    expect(client.received).toEqual([JSON.stringify(STATUS)]);
    expect(unsubscribe).toHaveBeenCalledTimes(4);
  });

  it('should close the server and forget snapshots', async () => {
    const { wire, feed } = setup();
    await feed.start();
    feed.broadcast(TELEMETRY);

    await feed.close();
    await feed.close();

    expect(wire.close).toHaveBeenCalledTimes(1);
    expect(feed.broadcast(STATUS)).toBe(0);
    expect(logger.info).toHaveBeenCalledWith('Telemetry feed closed');
  });
});
