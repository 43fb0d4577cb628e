/**
 * Link manager
 *
 * Owns one car connection. Status starts in connecting and moves
 * connecting -> ready, connecting -> failed (timeout or missing command
 * characteristic) and ready -> disconnected (radio drop or failed write). Reconnecting is left to the
 * control loop; connect() is a single attempt.
 */

import { FRAME_SIZE, decodeStatus, frameToHex } from '@core/codec';
import {
  ConnectionFailedError,
  InvalidInputError,
  LinkWriteError,
  NotConnectedError
} from '$types/errors';

import { errorMessage, untilAborted } from './helpers';

import type { CommandFrame, RadioAPI, RadioCharacteristic, RadioLink } from '$types';
import type { StatusReport } from '@core/codec';
import type {
  DiscoveredDevice,
  LinkDependencies,
  LinkManager,
  LinkManagerConfig,
  LinkStatus,
  StatusChange
} from './types';

/**
 * Create the manager for one discovered car
 *
 * @param radio - BLE radio
 * @param device - Car to connect to
 * @param config - GATT layout and connect timeout
 * @param deps - Timer and logger
 */
export function createLinkManager(
  radio: RadioAPI,
  device: DiscoveredDevice,
  config: LinkManagerConfig,
  deps: LinkDependencies
): LinkManager {
  const logger = deps.logger;
  const timer = deps.timer;

  // A fresh link is on its way to its first attempt
  let status: LinkStatus = 'connecting';
  let cancelled = false;
  let link: RadioLink | null = null;
  let command: RadioCharacteristic | null = null;
  let batteryCharacteristic: RadioCharacteristic | null = null;
  let cleanups: Array<() => void> = [];
  let attempt: AbortController | null = null;

  let battery: number | null = null;
  let lastReport: StatusReport | null = null;
  let lastStatusHex = '';

  // Single outbound buffer; writes are awaited one at a time
  const outbound = new Uint8Array(FRAME_SIZE);

  const statusListeners = new Set<(change: StatusChange) => void>();
  const reportListeners = new Set<(report: StatusReport) => void>();

  // ═══════════════════════════════════════════════════════════════
  // STATE
  // ═══════════════════════════════════════════════════════════════

  function setStatus(next: LinkStatus, reason: string): void {
    if (next === status) return;

    const change: StatusChange = { status: next, previous: status, reason: reason };
    status = next;

    if (next === 'failed') {
      logger.warning(device.address + ' ' + next + ': ' + reason);
    } else {
      logger.info(device.address + ' ' + next + (reason ? ': ' + reason : ''));
    }

    statusListeners.forEach(function (listener) {
      try {
        listener(change);
      } catch (err) {
        logger.warning('Status listener failed: ' + errorMessage(err));
      }
    });
  }

  function emitReport(report: StatusReport): void {
    lastReport = report;
    if (report.kind === 'battery') {
      battery = report.batteryPct;
    }

    reportListeners.forEach(function (listener) {
      try {
        listener(report);
      } catch (err) {
        logger.warning('Report listener failed: ' + errorMessage(err));
      }
    });
  }

  /**
   * Drop subscriptions and cached characteristics
   * @returns The link that was held, if any
   */
  function detach(): RadioLink | null {
    for (const cleanup of cleanups) {
      try {
        cleanup();
      } catch (err) {
        logger.debug('Unsubscribe failed: ' + errorMessage(err));
      }
    }
    cleanups = [];

    const held = link;
    link = null;
    command = null;
    batteryCharacteristic = null;
    return held;
  }

  function releaseLink(held: RadioLink | null): Promise<void> {
    if (held === null) return Promise.resolve();
    return held.disconnect().catch(function (err: unknown) {
      logger.debug('Disconnect of ' + device.address + ' failed: ' + errorMessage(err));
    });
  }

  function handleDrop(reason: string): Promise<void> {
    if (status !== 'ready') return Promise.resolve();
    const held = detach();
    setStatus('disconnected', reason);
    return releaseLink(held);
  }

  // ═══════════════════════════════════════════════════════════════
  // NOTIFICATIONS
  // ═══════════════════════════════════════════════════════════════

  function handleStatusData(data: Uint8Array): void {
    const hex = frameToHex(data);
    if (hex === lastStatusHex) return;
    lastStatusHex = hex;
    emitReport(decodeStatus(data));
  }

  function handleBatteryData(data: Uint8Array): void {
    if (data.length === 0) return;
    const pct = data[0];
    if (pct === battery) return;
    emitReport(decodeStatus(data.subarray(0, 1)));
  }

  async function subscribe(
    held: RadioLink,
    signal: AbortSignal,
    serviceUuid: string,
    characteristicUuid: string,
    label: string,
    listener: (data: Uint8Array) => void
  ): Promise<RadioCharacteristic | null> {
    try {
      const characteristic = await untilAborted(held.characteristic(serviceUuid, characteristicUuid), signal);
      if (characteristic === null) {
        logger.debug(label + ' characteristic not present on ' + device.address);
        return null;
      }
      const unsubscribe = await untilAborted(characteristic.subscribe(listener), signal);
      if (link !== held) {
        unsubscribe();
        return null;
      }
      cleanups.push(unsubscribe);
      return characteristic;
    } catch (err) {
      if (signal.aborted) {
        logger.debug(label + ' notify skipped: ' + errorMessage(err));
      } else {
        logger.warning(label + ' notify failed: ' + errorMessage(err));
      }
      return null;
    }
  }

  async function enableNotifications(held: RadioLink, signal: AbortSignal): Promise<void> {
    await subscribe(
      held,
      signal,
      config.controlServiceUuid,
      config.statusCharacteristicUuid,
      'Status',
      handleStatusData
    );
    batteryCharacteristic = await subscribe(
      held,
      signal,
      config.batteryServiceUuid,
      config.batteryCharacteristicUuid,
      'Battery',
      handleBatteryData
    );
  }

  async function readInitialBattery(signal: AbortSignal): Promise<void> {
    if (batteryCharacteristic === null || signal.aborted) return;
    try {
      const data = await untilAborted(batteryCharacteristic.read(), signal);
      if (data.length > 0) {
        emitReport(decodeStatus(data.subarray(0, 1)));
      }
    } catch (err) {
      logger.warning('Initial battery read failed: ' + errorMessage(err));
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // OPERATIONS
  // ═══════════════════════════════════════════════════════════════

  async function connect(signal?: AbortSignal): Promise<void> {
    if (attempt !== null || status === 'ready') return;

    cancelled = false;
    await releaseLink(detach());
    lastStatusHex = '';
    setStatus('connecting', 'connecting to ' + device.advertisedName);

    const controller = new AbortController();
    attempt = controller;
    let timedOut = false;
    const timeout = timer.set(config.connectTimeoutMs, false, function () {
      timedOut = true;
      controller.abort();
    });
    function onAbort(): void {
      controller.abort();
    }
    if (signal) {
      if (signal.aborted) controller.abort();
      else signal.addEventListener('abort', onAbort);
    }

    let opened: RadioLink | null = null;
    try {
      opened = await radio.connect(device.handle, controller.signal);
      const characteristic = await untilAborted(
        opened.characteristic(config.controlServiceUuid, config.commandCharacteristicUuid),
        controller.signal
      );
      if (characteristic === null) {
        await releaseLink(opened);
        setStatus('failed', 'command characteristic not found');
        throw new ConnectionFailedError(device.address, 'command characteristic not found');
      }

      link = opened;
      command = characteristic;
      cleanups.push(opened.onDisconnect(function (reason: string) {
        void handleDrop('link lost: ' + reason);
      }));

      // Best effort, still inside the attempt's time budget
      await enableNotifications(opened, controller.signal);
      await readInitialBattery(controller.signal);
    } catch (err) {
      if (err instanceof ConnectionFailedError) throw err;
      await releaseLink(opened);

      if (timedOut) {
        const reason = 'timed out after ' + config.connectTimeoutMs + ' ms';
        setStatus('failed', reason);
        throw new ConnectionFailedError(device.address, reason, { cause: err });
      }
      if (controller.signal.aborted) {
        cancelled = true;
        setStatus('disconnected', 'connect cancelled');
        return;
      }
      const reason = errorMessage(err);
      setStatus('failed', reason);
      throw new ConnectionFailedError(device.address, reason, { cause: err });
    } finally {
      timer.clear(timeout);
      if (signal) signal.removeEventListener('abort', onAbort);
      if (attempt === controller) attempt = null;
    }

    const established = link;
    if (established === null) return;

    setStatus('ready', 'connected to ' + device.advertisedName);
  }

  async function write(frame: CommandFrame): Promise<void> {
    if (status !== 'ready' || command === null) {
      throw new NotConnectedError(status);
    }
    if (frame.length !== FRAME_SIZE) {
      throw new InvalidInputError('Command frame must be ' + FRAME_SIZE + ' bytes (got ' + frame.length + ')');
    }

    outbound.set(frame);
    try {
      await command.write(outbound, true);
    } catch (err) {
      const reason = errorMessage(err);
      await handleDrop('write failed: ' + reason);
      throw new LinkWriteError('Write to ' + device.address + ' failed: ' + reason, { cause: err });
    }
  }

  async function readBattery(): Promise<number | null> {
    if (status !== 'ready') {
      throw new NotConnectedError(status);
    }
    if (batteryCharacteristic === null) return null;

    const data = await batteryCharacteristic.read();
    if (data.length === 0) return null;

    emitReport(decodeStatus(data.subarray(0, 1)));
    return battery;
  }

  async function disconnect(): Promise<void> {
    cancelled = true;
    if (attempt !== null) {
      attempt.abort();
    }
    const held = detach();
    if (status !== 'disconnected') {
      setStatus('disconnected', 'disconnected by user');
    }
    await releaseLink(held);
  }

  return {
    device: device,
    connect: connect,
    write: write,
    readBattery: readBattery,
    disconnect: disconnect,
    getStatus: function () { return status; },
    getBattery: function () { return battery; },
    getLastReport: function () { return lastReport; },
    isCancelled: function () { return cancelled; },
    onStatus: function (listener: (change: StatusChange) => void) {
      statusListeners.add(listener);
      return function () { statusListeners.delete(listener); };
    },
    onReport: function (listener: (report: StatusReport) => void) {
      reportListeners.add(listener);
      return function () { reportListeners.delete(listener); };
    }
  };
}
