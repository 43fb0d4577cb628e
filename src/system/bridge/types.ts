/**
 * Bridge type definitions
 */

import type {
  BridgeConfig,
  CarModel,
  ControllerSlotId,
  ControllerSlotInfo,
  GamepadAPI,
  RadioAPI,
  TimerAPI
} from '$types';
import type { DeviceEvent, ScanEvent, StatusEvent, Telemetry } from '@events/types';
import type { DiscoveredDevice, LinkStatus } from '@hardware/radio/types';
import type { Logger } from '@logging';

/**
 * Session identifier ("<slot>/<address>")
 */
export type SessionId = string;

/**
 * Process-wide handles the bridge owns from creation to shutdown()
 */
export interface BridgeDependencies {
  radio: RadioAPI;
  gamepad: GamepadAPI;
  timer: TimerAPI;
  logger: Logger;
  config: Readonly<BridgeConfig>;
  /** Monotonic milliseconds (defaults to performance.now) */
  clock?: () => number;
}

/**
 * One car driven from one controller slot
 */
export interface Session {
  readonly id: SessionId;
  readonly slot: ControllerSlotId;
  readonly device: DiscoveredDevice;
  getStatus(): LinkStatus;
  getTelemetry(): Telemetry;
}

/**
 * Front-end API
 */
export interface Bridge {
  listModels(): readonly CarModel[];
  listControllers(): ControllerSlotInfo[];

  /**
   * Run one scan window, reporting devices as they are heard.
   * A scan already running is cancelled first.
   * @throws {ScanUnavailableError} When the radio is off or missing
   */
  startScan(onDevice?: (device: DiscoveredDevice) => void, durationMs?: number): Promise<DiscoveredDevice[]>;
  cancelScan(): void;

  /**
   * Connect a car and start driving it from slot.
   * Resolves with the session once the first attempt settles; a failed
   * attempt leaves the session in 'failed' until retry().
   * @throws {InvalidInputError} When the slot or the car is already in use
   */
  connect(device: DiscoveredDevice, slot: ControllerSlotId, signal?: AbortSignal): Promise<Session>;
  /** Stop a session; false when the id is unknown */
  disconnect(id: SessionId): Promise<boolean>;
  /** Restart reconnection of a session; false when the id is unknown */
  retry(id: SessionId): boolean;
  getSession(id: SessionId): Session | null;
  listSessions(): Session[];

  onStatus(listener: (event: StatusEvent) => void): () => void;
  onTelemetry(listener: (telemetry: Telemetry) => void): () => void;
  onDevice(listener: (event: DeviceEvent) => void): () => void;
  /** Scans the radio refused */
  onScan(listener: (event: ScanEvent) => void): () => void;

  /** Cancel the scan, stop every session and close the controllers */
  shutdown(): Promise<void>;
}
