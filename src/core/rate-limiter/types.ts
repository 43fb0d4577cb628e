/**
 * Rate limiter state and interface
 */

/**
 * What the limiter remembers about the last dispatched frame
 */
export interface RateLimiterState {
  /** Copy of the last frame allowed through, null before the first one */
  lastFrame: Uint8Array | null;
  /** When it was allowed through (ms) */
  lastSentMs: number;
}

/**
 * Stateful dispatch gate for one session
 */
export interface RateLimiter {
  /** Decide for this tick; records the frame when it returns true */
  shouldSend(frame: Uint8Array, nowMs: number): boolean;
  /** Forget the last frame so the next one goes out unconditionally */
  reset(): void;
  /** Read-only view of the state (for telemetry and tests) */
  getState(): Readonly<RateLimiterState>;
}
