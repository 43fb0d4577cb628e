/**
 * Session state type definitions
 */

import type { ButtonFlags, CarToggles } from '$types';

export interface SessionState {
    // ═══════════════════════════════════════════════════════════════
    // TOGGLES
    // ═══════════════════════════════════════════════════════════════
    toggles: CarToggles;
    previousButtons: ButtonFlags | null;

    // ═══════════════════════════════════════════════════════════════
    // TIMING
    // ═══════════════════════════════════════════════════════════════
    lastTelemetryMs: number;

    // ═══════════════════════════════════════════════════════════════
    // FRAME COUNTERS
    // ═══════════════════════════════════════════════════════════════
    framesSent: number;
    framesSkipped: number;
    framesDropped: number;
    lastFrameHex: string;

    // ═══════════════════════════════════════════════════════════════
    // INPUT
    // ═══════════════════════════════════════════════════════════════
    inputMissing: boolean;

    // ═══════════════════════════════════════════════════════════════
    // RECOVERY
    // ═══════════════════════════════════════════════════════════════
    recovering: boolean;
    reconnectAttempt: number;
    nextReconnectMs: number;
    awaitingRetry: boolean;
}
