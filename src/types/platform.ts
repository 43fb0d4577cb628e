/**
 * Platform interfaces
 *
 * The bridge reaches the radio, the controller driver and timers only
 * through these interfaces. Real implementations live in src/hardware and
 * src/utils; tests hand in vi.fn() fakes.
 */

import type { ControllerSlotId } from './common';

// ═══════════════════════════════════════════════════════════════
// TIMERS
// ═══════════════════════════════════════════════════════════════

/**
 * Opaque timer handle
 */
export type TimerHandle = number;

/**
 * Timer API
 */
export interface TimerAPI {
  /** Schedule callback after intervalMs, repeating when repeat is true */
  set(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle;
  /** Cancel a scheduled callback (unknown handles are ignored) */
  clear(handle: TimerHandle): void;
}

// ═══════════════════════════════════════════════════════════════
// RADIO (BLE)
// ═══════════════════════════════════════════════════════════════

/**
 * Adapter power state as reported by the radio stack
 */
export type RadioState =
  | 'unknown'
  | 'resetting'
  | 'unsupported'
  | 'unauthorized'
  | 'poweredOff'
  | 'poweredOn';

/**
 * Opaque reference to a discovered peripheral, only meaningful to the radio that produced it
 */
export interface PeripheralHandle {
  readonly id: string;
}

/**
 * One advertisement seen during a scan window
 */
export interface Advertisement {
  readonly handle: PeripheralHandle;
  readonly address: string;
  /** Advertised local name, empty when the packet carried none */
  readonly name: string;
  readonly rssi: number;
  readonly connectable: boolean;
}

/**
 * Running scan started by RadioAPI.startScan()
 */
export interface ScanSession {
  stop(): Promise<void>;
}

/**
 * GATT characteristic of a connected peripheral
 */
export interface RadioCharacteristic {
  write(data: Uint8Array, withoutResponse: boolean): Promise<void>;
  read(): Promise<Uint8Array>;
  /** Enable notifications; resolves to an unsubscribe function */
  subscribe(listener: (data: Uint8Array) => void): Promise<() => void>;
}

/**
 * Established connection to a peripheral
 */
export interface RadioLink {
  /** Resolve a characteristic, or null when the service or characteristic is absent */
  characteristic(serviceUuid: string, characteristicUuid: string): Promise<RadioCharacteristic | null>;
  /** Listen for a drop of the link; returns an unsubscribe function */
  onDisconnect(listener: (reason: string) => void): () => void;
  disconnect(): Promise<void>;
}

/**
 * BLE radio
 */
export interface RadioAPI {
  getState(): RadioState;
  /** Resolve true once powered on, false when timeoutMs elapses first */
  waitForPoweredOn(timeoutMs: number): Promise<boolean>;
  startScan(listener: (advertisement: Advertisement) => void): Promise<ScanSession>;
  /** Connect to a peripheral; rejects when signal aborts */
  connect(handle: PeripheralHandle, signal: AbortSignal): Promise<RadioLink>;
}

// ═══════════════════════════════════════════════════════════════
// GAME CONTROLLERS
// ═══════════════════════════════════════════════════════════════

/**
 * Raw controller snapshot: axes normalized to roughly [-1, 1], buttons as pressed flags
 */
export interface RawPadSnapshot {
  readonly axes: readonly number[];
  readonly buttons: readonly boolean[];
}

/**
 * Controller present in a slot
 */
export interface ControllerSlotInfo {
  readonly slot: ControllerSlotId;
  readonly name: string;
  readonly path: string;
}

/**
 * Controller input driver
 */
export interface GamepadAPI {
  listSlots(): ControllerSlotInfo[];
  /** Latest snapshot of the slot, or null when no controller is attached */
  read(slot: ControllerSlotId): RawPadSnapshot | null;
  release(slot: ControllerSlotId): void;
  close(): void;
}
