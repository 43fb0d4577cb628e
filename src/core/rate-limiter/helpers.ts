/**
 * Rate limiter decision logic
 */

import { framesEqual } from '@core/codec';

import type { RateLimiterState } from './types';

/**
 * Decide whether a frame goes out on this tick
 *
 * A frame is sent when it differs from the last one sent, or when the
 * keep-alive interval has elapsed since the last send. The first frame is
 * always sent.
 *
 * @param state - Last dispatch
 * @param frame - Candidate frame
 * @param nowMs - Current time (ms)
 * @param keepaliveMs - Minimum spacing of identical frames
 */
export function shouldSendFrame(
  state: Readonly<RateLimiterState>,
  frame: Uint8Array,
  nowMs: number,
  keepaliveMs: number
): boolean {
  if (state.lastFrame === null) {
    return true;
  }

  if (!framesEqual(state.lastFrame, frame)) {
    return true;
  }

  return nowMs - state.lastSentMs >= keepaliveMs;
}
