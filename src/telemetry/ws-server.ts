/**
 * ws-backed FeedServer
 */

import { WebSocketServer } from 'ws';

import type { FeedErrorSource, FeedServer, FeedSocket } from './types';

type ErrorListener = (err: Error, source: FeedErrorSource) => void;

/**
 * Listen for WebSocket clients
 *
 * Every accepted socket and the server itself get an 'error' listener, so
 * a misbehaving client never surfaces as an uncaught exception.
 *
 * @param port - TCP port, 0 picks a free one
 * @param host - Interface to bind
 */
export function listenWebSocket(port: number, host: string): Promise<FeedServer> {
  return new Promise(function (resolve, reject) {
    const wss = new WebSocketServer({ port: port, host: host });
    const errorListeners = new Set<ErrorListener>();

    function report(err: Error, source: FeedErrorSource): void {
      errorListeners.forEach(function (listener) {
        listener(err, source);
      });
    }

    function onStartError(err: Error): void {
      reject(err);
    }

    wss.once('error', onStartError);
    wss.once('listening', function () {
      wss.removeListener('error', onStartError);
      wss.on('error', function (err: Error) {
        report(err, 'server');
      });
      wss.on('connection', function (socket) {
        socket.on('error', function (err: Error) {
          report(err, 'client');
        });
      });

      const address = wss.address();
      const boundPort = address !== null && typeof address === 'object' ? address.port : port;

      resolve({
        port: boundPort,
        clients: function (): Iterable<FeedSocket> {
          return wss.clients;
        },
        onConnection: function (listener: (socket: FeedSocket) => void) {
          wss.on('connection', function (socket) {
            listener(socket);
          });
        },
        onError: function (listener: ErrorListener) {
          errorListeners.add(listener);
        },
        close: function () {
          return new Promise<void>(function (done, fail) {
            for (const client of wss.clients) {
              client.terminate();
            }
            wss.close(function (err) {
              if (err) fail(err);
              else done();
            });
          });
        }
      });
    });
  });
}
