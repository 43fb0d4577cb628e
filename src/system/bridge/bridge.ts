/**
 * Bridge
 *
 * Front-end API over the scanner, link managers and control loops. Each
 * session owns its link and loop; sessions share only the radio, the
 * controller driver and the frozen catalog.
 */

import { listModels } from '@core/catalog';
import { createInputSampler, toSamplerConfig } from '@hardware/gamepad/sampler';
import { addressKey, errorMessage, toLinkConfig } from '@hardware/radio/helpers';
import { createLinkManager } from '@hardware/radio/link';
import { createDeviceScanner } from '@hardware/radio/scanner';
import { createControlLoop, toControlLoopConfig } from '@system/control';
import { InvalidInputError, ScanUnavailableError } from '$types/errors';
import { monotonicMs } from '@utils/time';

import { createListeners, toDeviceEvent, toScanEvent, toSessionId, toStatusEvent } from './helpers';

import type { ControllerSlotId } from '$types';
import type { DeviceEvent, ScanEvent, StatusEvent, Telemetry } from '@events/types';
import type { DiscoveredDevice, LinkManager } from '@hardware/radio/types';
import type { ControlLoop } from '@system/control';
import type { Bridge, BridgeDependencies, Session, SessionId } from './types';

interface SessionEntry {
  session: Session;
  link: LinkManager;
  loop: ControlLoop;
  unsubscribe: () => void;
}

/**
 * Create the bridge
 */
export function createBridge(deps: BridgeDependencies): Bridge {
  const config = deps.config;
  const logger = deps.logger;
  const timer = deps.timer;
  const clock = deps.clock || monotonicMs;

  const sampler = createInputSampler(deps.gamepad, toSamplerConfig(config));
  const scanner = createDeviceScanner({
    radio: deps.radio,
    timer: timer,
    logger: logger.scope('scan'),
    readyTimeoutMs: config.RADIO_READY_TIMEOUT_MS
  });
  const linkConfig = toLinkConfig(config);
  const loopConfig = toControlLoopConfig(config);

  const sessions = new Map<SessionId, SessionEntry>();
  const statusListeners = createListeners<StatusEvent>(logger, 'Status');
  const telemetryListeners = createListeners<Telemetry>(logger, 'Telemetry');
  const deviceListeners = createListeners<DeviceEvent>(logger, 'Device');
  const scanListeners = createListeners<ScanEvent>(logger, 'Scan');

  let scanAbort: AbortController | null = null;

  // ═══════════════════════════════════════════════════════════════
  // SCANNING
  // ═══════════════════════════════════════════════════════════════

  async function startScan(
    onDevice?: (device: DiscoveredDevice) => void,
    durationMs?: number
  ): Promise<DiscoveredDevice[]> {
    cancelScan();
    const controller = new AbortController();
    scanAbort = controller;

    const found: DiscoveredDevice[] = [];
    try {
      for await (const device of scanner.scan(durationMs ?? config.SCAN_DURATION_MS, controller.signal)) {
        found.push(device);
        deviceListeners.emit(toDeviceEvent(device));
        if (onDevice) onDevice(device);
      }
    } catch (err) {
      if (err instanceof ScanUnavailableError) {
        logger.warning(err.message + '. ' + err.hint);
        scanListeners.emit(toScanEvent(err));
      }
      throw err;
    } finally {
      if (scanAbort === controller) scanAbort = null;
    }
    return found;
  }

  function cancelScan(): void {
    if (scanAbort === null) return;
    scanAbort.abort();
    scanAbort = null;
  }

  // ═══════════════════════════════════════════════════════════════
  // SESSIONS
  // ═══════════════════════════════════════════════════════════════

  function findBySlot(slot: ControllerSlotId): SessionEntry | null {
    for (const entry of sessions.values()) {
      if (entry.session.slot === slot) return entry;
    }
    return null;
  }

  function findByAddress(address: string): SessionEntry | null {
    const key = addressKey(address);
    for (const entry of sessions.values()) {
      if (addressKey(entry.session.device.address) === key) return entry;
    }
    return null;
  }

  async function connect(device: DiscoveredDevice, slot: ControllerSlotId, signal?: AbortSignal): Promise<Session> {
    const slotOwner = findBySlot(slot);
    if (slotOwner !== null) {
      throw new InvalidInputError('Slot ' + slot + ' already drives ' + slotOwner.session.device.address);
    }
    if (findByAddress(device.address) !== null) {
      throw new InvalidInputError(device.address + ' is already connected');
    }

    const id = toSessionId(slot, device.address);
    const sessionLogger = logger.scope('slot ' + slot);
    const link = createLinkManager(deps.radio, device, linkConfig, { timer: timer, logger: sessionLogger });
    const loop = createControlLoop({
      slot: slot,
      sampler: sampler,
      link: link,
      timer: timer,
      logger: sessionLogger,
      config: loopConfig,
      clock: clock,
      onTelemetry: telemetryListeners.emit
    });

    const unsubscribe = link.onStatus(function (change) {
      statusListeners.emit(toStatusEvent(slot, device, change));
    });

    const session: Session = {
      id: id,
      slot: slot,
      device: device,
      getStatus: link.getStatus,
      getTelemetry: loop.getTelemetry
    };
    sessions.set(id, { session: session, link: link, loop: loop, unsubscribe: unsubscribe });

    try {
      await link.connect(signal);
    } catch (err) {
      // Status is 'failed' and already reported; the loop waits for retry()
      sessionLogger.debug('First connect attempt: ' + errorMessage(err));
    }

    if (sessions.get(id) !== undefined) {
      loop.start();
    }
    return session;
  }

  async function disconnect(id: SessionId): Promise<boolean> {
    const entry = sessions.get(id);
    if (entry === undefined) return false;

    sessions.delete(id);
    try {
      await entry.loop.stop();
    } finally {
      entry.unsubscribe();
    }
    return true;
  }

  function retry(id: SessionId): boolean {
    const entry = sessions.get(id);
    if (entry === undefined) return false;
    entry.loop.retry();
    return true;
  }

  function getSession(id: SessionId): Session | null {
    const entry = sessions.get(id);
    return entry === undefined ? null : entry.session;
  }

  function listSessions(): Session[] {
    return Array.from(sessions.values(), function (entry) { return entry.session; });
  }

  // ═══════════════════════════════════════════════════════════════
  // SHUTDOWN
  // ═══════════════════════════════════════════════════════════════

  async function shutdown(): Promise<void> {
    cancelScan();

    const ids = Array.from(sessions.keys());
    let graceHandle = 0;
    const grace = new Promise<'timeout'>(function (resolve) {
      graceHandle = timer.set(config.SHUTDOWN_GRACE_MS, false, function () { resolve('timeout'); });
    });
    const stopped = Promise.allSettled(ids.map(disconnect));

    const result = await Promise.race([stopped, grace]);
    timer.clear(graceHandle);

    if (result === 'timeout') {
      logger.warning('Shutdown grace of ' + config.SHUTDOWN_GRACE_MS + ' ms elapsed with sessions still stopping');
    } else {
      result.forEach(function (outcome, index) {
        if (outcome.status === 'rejected') {
          logger.warning('Session ' + ids[index] + ' did not stop cleanly: ' + errorMessage(outcome.reason));
        }
      });
    }

    deps.gamepad.close();
    logger.info('Bridge stopped');
  }

  return {
    listModels: listModels,
    listControllers: sampler.listSlots,
    startScan: startScan,
    cancelScan: cancelScan,
    connect: connect,
    disconnect: disconnect,
    retry: retry,
    getSession: getSession,
    listSessions: listSessions,
    onStatus: statusListeners.add,
    onTelemetry: telemetryListeners.add,
    onDevice: deviceListeners.add,
    onScan: scanListeners.add,
    shutdown: shutdown
  };
}
