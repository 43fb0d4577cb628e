/**
 * Node.js implementation of the TimerAPI
 *
 * Handles are small integers so callers and fakes can treat them as plain
 * numbers; the underlying Node timer objects stay private.
 */

import type { TimerAPI, TimerHandle } from '$types';

/**
 * Create a TimerAPI backed by setTimeout/setInterval
 * @param unref - Do not keep the process alive for these timers
 */
export function createNodeTimer(unref: boolean): TimerAPI {
  const active = new Map<TimerHandle, NodeJS.Timeout>();
  let nextHandle = 1;

  function set(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle {
    const handle = nextHandle++;
    let timer: NodeJS.Timeout;

    if (repeat) {
      timer = setInterval(callback, intervalMs);
    } else {
      timer = setTimeout(function () {
        active.delete(handle);
        callback();
      }, intervalMs);
    }

    if (unref) {
      timer.unref();
    }
    active.set(handle, timer);
    return handle;
  }

  function clear(handle: TimerHandle): void {
    const timer = active.get(handle);
    if (timer === undefined) return;

    // clearTimeout also cancels intervals in Node
    clearTimeout(timer);
    active.delete(handle);
  }

  return {
    set: set,
    clear: clear
  };
}
