/**
 * Per-session frame rate limiter
 *
 * Changed frames go out immediately; unchanged frames are repeated at the
 * keep-alive interval so the car keeps acting on the last command.
 */

import { shouldSendFrame } from './helpers';

import type { RateLimiter, RateLimiterState } from './types';

/**
 * Create a rate limiter
 * @param keepaliveMs - Minimum spacing of identical frames
 */
export function createRateLimiter(keepaliveMs: number): RateLimiter {
  const state: RateLimiterState = {
    lastFrame: null,
    lastSentMs: 0
  };

  function shouldSend(frame: Uint8Array, nowMs: number): boolean {
    if (!shouldSendFrame(state, frame, nowMs, keepaliveMs)) {
      return false;
    }

    // Copy: callers may reuse their buffer
    state.lastFrame = Uint8Array.from(frame);
    state.lastSentMs = nowMs;
    return true;
  }

  function reset(): void {
    state.lastFrame = null;
    state.lastSentMs = 0;
  }

  function getState(): Readonly<RateLimiterState> {
    return state;
  }

  return {
    shouldSend: shouldSend,
    reset: reset,
    getState: getState
  };
}
