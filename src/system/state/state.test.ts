/**
 * Unit tests for session state
 */

import { createSessionState } from './state';

describe('createSessionState', () => {
  it('should start with default toggles and no previous buttons', () => {
    const state = createSessionState(5000);

    expect(state.toggles).toEqual({ mode: 1, lights: false, donut: false });
    expect(state.previousButtons).toBeNull();
  });

  it('should start the telemetry clock at creation', () => {
    const state = createSessionState(5000);

    expect(state.lastTelemetryMs).toBe(5000);
  });

  it('should start with zeroed counters and no recovery', () => {
    const state = createSessionState(0);

    expect(state.framesSent).toBe(0);
    expect(state.framesSkipped).toBe(0);
    expect(state.framesDropped).toBe(0);
    expect(state.lastFrameHex).toBe('');
    expect(state.recovering).toBe(false);
    expect(state.reconnectAttempt).toBe(0);
    expect(state.awaitingRetry).toBe(false);
  });
});
