/**
 * BLE radio type definitions
 */

import type {
  CarModel,
  CommandFrame,
  PeripheralHandle,
  RadioAPI,
  TimerAPI
} from '$types';
import type { StatusReport } from '@core/codec';
import type { Logger } from '@logging';

// ═══════════════════════════════════════════════════════════════
// DISCOVERY
// ═══════════════════════════════════════════════════════════════

/**
 * Connectable peripheral whose advertised name matched a catalog model
 */
export interface DiscoveredDevice {
  readonly model: CarModel;
  readonly advertisedName: string;
  readonly address: string;
  readonly rssi: number;
  readonly handle: PeripheralHandle;
}

/**
 * Scanner dependencies
 */
export interface ScannerDependencies {
  radio: RadioAPI;
  timer: TimerAPI;
  logger: Logger;
  /** How long to wait for the adapter to power on */
  readyTimeoutMs: number;
  /** Catalog to match against (defaults to the built-in one) */
  models?: readonly CarModel[];
}

/**
 * Finite discovery windows over the radio
 */
export interface DeviceScanner {
  /** Yield matching devices until the window closes or signal aborts */
  scan(durationMs: number, signal?: AbortSignal): AsyncGenerator<DiscoveredDevice, void, undefined>;
  /** Gather a whole window */
  collect(durationMs: number, signal?: AbortSignal): Promise<DiscoveredDevice[]>;
}

// ═══════════════════════════════════════════════════════════════
// LINK
// ═══════════════════════════════════════════════════════════════

/**
 * Connection status
 */
export type LinkStatus = 'connecting' | 'ready' | 'disconnected' | 'failed';

/**
 * Status transition delivered to onStatus listeners
 */
export interface StatusChange {
  readonly status: LinkStatus;
  readonly previous: LinkStatus;
  readonly reason: string;
}

/**
 * GATT layout and timing of a car link
 */
export interface LinkManagerConfig {
  connectTimeoutMs: number;
  controlServiceUuid: string;
  commandCharacteristicUuid: string;
  statusCharacteristicUuid: string;
  batteryServiceUuid: string;
  batteryCharacteristicUuid: string;
}

/**
 * Link manager dependencies
 */
export interface LinkDependencies {
  timer: TimerAPI;
  logger: Logger;
}

/**
 * Owner of one car connection
 */
export interface LinkManager {
  readonly device: DiscoveredDevice;
  /**
   * One connect attempt. Resolves once ready, or with status disconnected
   * when signal aborts; rejects with ConnectionFailedError (status failed)
   */
  connect(signal?: AbortSignal): Promise<void>;
  /** Write a command frame; only valid while ready */
  write(frame: CommandFrame): Promise<void>;
  /** Read the battery level; null when the car has no battery service */
  readBattery(): Promise<number | null>;
  /** User-initiated disconnect */
  disconnect(): Promise<void>;
  getStatus(): LinkStatus;
  getBattery(): number | null;
  getLastReport(): StatusReport | null;
  /** True after disconnect() until the next connect() */
  isCancelled(): boolean;
  onStatus(listener: (change: StatusChange) => void): () => void;
  onReport(listener: (report: StatusReport) => void): () => void;
}
