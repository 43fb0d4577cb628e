/**
 * Control loop implementation
 *
 * One loop per session. Each tick either drives the car (sample, toggle
 * edges, encode, rate limit, write) or works on getting the link back.
 */

import { modelLabel } from '@core/catalog';
import { describeStatus, encode, frameToHex } from '@core/codec';
import { createRateLimiter } from '@core/rate-limiter';
import { errorMessage } from '@hardware/radio/helpers';
import { fmtBattery } from '@logging';
import { createSessionState } from '@system/state/state';
import {
  ControllerUnavailableError,
  LinkWriteError,
  NotConnectedError
} from '$types/errors';
import { nowMs } from '@utils/time';

import {
  applyToggleEdges,
  computeBackoffDelay,
  describeToggleChange,
  detectPressEdges
} from './helpers';

import type { ControllerState } from '$types';
import type { Telemetry } from '@events/types';
import type { ControlLoop, ControlLoopDependencies, TickOutcome } from './types';

const NEUTRAL_INPUT: ControllerState = Object.freeze({
  steering: 0,
  throttle: 0,
  buttons: Object.freeze({ turbo: false, lights: false, donut: false, mode: false, battery: false })
});

/**
 * Create the control loop for one session
 */
export function createControlLoop(deps: ControlLoopDependencies): ControlLoop {
  const slot = deps.slot;
  const sampler = deps.sampler;
  const link = deps.link;
  const logger = deps.logger;
  const config = deps.config;
  const clock = deps.clock;

  const state = createSessionState(clock());
  const limiter = createRateLimiter(config.keepaliveMs);

  let running = false;
  let timerHandle: number | null = null;
  let inFlight: Promise<TickOutcome> | null = null;

  // ═══════════════════════════════════════════════════════════════
  // DRIVING
  // ═══════════════════════════════════════════════════════════════

  function requestBattery(): void {
    link.readBattery().then(
      function (pct) {
        logger.info('Battery: ' + fmtBattery(pct));
      },
      function (err: unknown) {
        logger.warning('Battery read failed: ' + errorMessage(err));
      }
    );
  }

  function sampleInput(): ControllerState | null {
    try {
      const input = sampler.sample(slot);
      if (state.inputMissing) {
        state.inputMissing = false;
        logger.info('Controller in slot ' + slot + ' is back');
      }
      return input;
    } catch (err) {
      if (!(err instanceof ControllerUnavailableError)) throw err;
      if (!state.inputMissing) {
        state.inputMissing = true;
        logger.warning(err.message + '; waiting for it');
      }
      return null;
    }
  }

  async function drive(now: number): Promise<TickOutcome> {
    const input = sampleInput();
    if (input === null) return 'no-input';

    const edges = detectPressEdges(state.previousButtons, input.buttons);
    state.previousButtons = input.buttons;

    const toggles = applyToggleEdges(state.toggles, edges);
    if (toggles !== state.toggles) {
      logger.info(describeToggleChange(state.toggles, toggles));
      state.toggles = toggles;
    }
    if (edges.battery) {
      requestBattery();
    }

    const frame = encode(input, state.toggles);
    if (!limiter.shouldSend(frame, now)) {
      state.framesSkipped++;
      return 'skipped';
    }

    try {
      await link.write(frame);
    } catch (err) {
      if (err instanceof NotConnectedError || err instanceof LinkWriteError) {
        state.framesDropped++;
        limiter.reset();
        logger.warning('Frame dropped: ' + err.message);
        return 'dropped';
      }
      throw err;
    }

    state.framesSent++;
    state.lastFrameHex = frameToHex(frame);
    return 'sent';
  }

  // ═══════════════════════════════════════════════════════════════
  // RECOVERY
  // ═══════════════════════════════════════════════════════════════

  async function recover(now: number): Promise<TickOutcome> {
    if (!state.recovering) {
      state.recovering = true;
      state.reconnectAttempt = 0;
      state.nextReconnectMs = now;
      logger.warning('Link to ' + link.device.address + ' lost, reconnecting');
    }

    if (state.reconnectAttempt >= config.reconnectMaxAttempts) {
      state.recovering = false;
      state.awaitingRetry = true;
      logger.warning('Gave up after ' + state.reconnectAttempt + ' reconnect attempts; waiting for retry');
      return 'idle';
    }

    if (now < state.nextReconnectMs) return 'waiting';

    state.reconnectAttempt++;
    logger.info('Reconnect attempt ' + state.reconnectAttempt + '/' + config.reconnectMaxAttempts);

    try {
      await link.connect();
    } catch (err) {
      logger.warning('Reconnect attempt ' + state.reconnectAttempt + ' failed: ' + errorMessage(err));
    }

    if (link.getStatus() === 'ready') {
      logger.info('Reconnected to ' + link.device.address);
      state.recovering = false;
      state.reconnectAttempt = 0;
      state.previousButtons = null;
      limiter.reset();
    } else {
      state.nextReconnectMs = clock() + computeBackoffDelay(
        state.reconnectAttempt,
        config.reconnectBaseDelayMs,
        config.reconnectMaxDelayMs
      );
    }
    return 'reconnecting';
  }

  // ═══════════════════════════════════════════════════════════════
  // TICK
  // ═══════════════════════════════════════════════════════════════

  function step(now: number): Promise<TickOutcome> | TickOutcome {
    const status = link.getStatus();

    if (status === 'ready') return drive(now);
    if (status === 'connecting') return 'waiting';
    if (state.recovering) return recover(now);
    if (link.isCancelled() || state.awaitingRetry) return 'idle';
    if (status === 'disconnected') return recover(now);

    // failed on the initial connect: no automatic retry
    return 'idle';
  }

  function emitTelemetry(now: number): void {
    if (now - state.lastTelemetryMs < config.telemetryIntervalMs) return;
    state.lastTelemetryMs = now;
    if (!deps.onTelemetry) return;

    try {
      deps.onTelemetry(getTelemetry());
    } catch (err) {
      logger.warning('Telemetry listener failed: ' + errorMessage(err));
    }
  }

  async function tick(): Promise<TickOutcome> {
    const startMs = clock();

    let outcome: TickOutcome;
    try {
      outcome = await step(startMs);
    } catch (err) {
      logger.critical('Control loop crashed: ' + errorMessage(err));
      outcome = 'idle';
    }

    const elapsed = clock() - startMs;
    if (outcome !== 'reconnecting' && elapsed > config.tickPeriodMs) {
      logger.warning('Slow tick: ' + elapsed + ' ms (period ' + config.tickPeriodMs + ' ms)');
    }

    emitTelemetry(clock());
    return outcome;
  }

  function runScheduledTick(): void {
    if (!running || inFlight !== null) return;

    const current = tick();
    inFlight = current;
    current.then(
      function () {
        if (inFlight === current) inFlight = null;
      },
      function (err: unknown) {
        if (inFlight === current) inFlight = null;
        logger.critical('Tick failed: ' + errorMessage(err));
      }
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  function start(): void {
    if (running) return;
    running = true;
    logger.info('Driving ' + modelLabel(link.device.model) + ' from controller slot ' + slot +
      ' every ' + config.tickPeriodMs + ' ms');

    timerHandle = deps.timer.set(config.tickPeriodMs, true, runScheduledTick);
    runScheduledTick();
  }

  async function stop(): Promise<void> {
    if (timerHandle !== null) {
      deps.timer.clear(timerHandle);
      timerHandle = null;
    }
    running = false;

    // A reconnect may be in flight; disconnecting aborts it
    const wasReady = link.getStatus() === 'ready';
    if (!wasReady) {
      await link.disconnect();
    }

    if (inFlight !== null) {
      await inFlight.catch(function (err: unknown) {
        logger.debug('Last tick failed during stop: ' + errorMessage(err));
      });
    }

    if (wasReady) {
      if (link.getStatus() === 'ready') {
        const neutral = encode(NEUTRAL_INPUT, { mode: state.toggles.mode, lights: false, donut: false });
        try {
          await link.write(neutral);
        } catch (err) {
          logger.debug('Neutral frame not sent: ' + errorMessage(err));
        }
      }
      await link.disconnect();
    }
    sampler.release(slot);
    logger.info('Session on slot ' + slot + ' stopped (' + state.framesSent + ' frames sent)');
  }

  function retry(): void {
    const status = link.getStatus();
    if (status === 'ready' || status === 'connecting') return;

    logger.info('Retrying connection to ' + link.device.address);
    state.awaitingRetry = false;
    state.recovering = true;
    state.reconnectAttempt = 0;
    state.nextReconnectMs = 0;
  }

  function getTelemetry(): Telemetry {
    const report = link.getLastReport();
    return {
      type: 'telemetry',
      slot: slot,
      device: link.device.advertisedName,
      address: link.device.address,
      model: modelLabel(link.device.model),
      status: link.getStatus(),
      lastFrameHex: state.lastFrameHex,
      framesSent: state.framesSent,
      framesSkipped: state.framesSkipped,
      framesDropped: state.framesDropped,
      batteryPct: link.getBattery(),
      lastStatus: report === null ? null : describeStatus(report),
      timestamp: nowMs()
    };
  }

  return {
    start: start,
    stop: stop,
    tick: tick,
    retry: retry,
    isRunning: function () { return running; },
    getTelemetry: getTelemetry
  };
}
