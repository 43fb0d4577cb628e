/**
 * Session state
 * Mutable per-session bookkeeping owned by one control loop
 */

import { DEFAULT_TOGGLES } from '@core/codec';

import type { SessionState } from './types';

export * from './types';

/**
 * Create initial session state
 *
 * Toggles start from the codec defaults (normal mode, lights and donut off).
 * previousButtons is null so buttons held while the session starts do not
 * count as presses.
 *
 * @param nowMs - Monotonic start time
 */
export function createSessionState(nowMs: number): SessionState {
  return {
    toggles: DEFAULT_TOGGLES,
    previousButtons: null,

    lastTelemetryMs: nowMs,

    framesSent: 0,
    framesSkipped: 0,
    framesDropped: 0,
    lastFrameHex: '',

    inputMissing: false,

    recovering: false,
    reconnectAttempt: 0,
    nextReconnectMs: 0,
    awaitingRetry: false
  };
}
