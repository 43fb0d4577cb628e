/**
 * Event types for the telemetry feed
 *
 * Sessions report status transitions and periodic telemetry; scans report
 * discovered devices, or why the radio could not scan. The bridge forwards
 * them to its listeners and the WebSocket feed serializes them as JSON.
 */

import type { LinkStatus } from '@hardware/radio/types';

/**
 * Link status transition of one session
 */
export interface StatusEvent {
  type: 'status';
  slot: number;
  address: string;
  device: string;
  status: LinkStatus;
  previous: LinkStatus;
  reason: string;
  timestamp: number;
}

/**
 * Periodic snapshot of one session
 */
export interface Telemetry {
  type: 'telemetry';
  slot: number;
  device: string;
  address: string;
  model: string;
  status: LinkStatus;
  lastFrameHex: string;
  framesSent: number;
  framesSkipped: number;
  framesDropped: number;
  batteryPct: number | null;
  /** Last decoded status notification, e.g. "battery 40%" */
  lastStatus: string | null;
  timestamp: number;
}

/**
 * Device heard during a scan window
 */
export interface DeviceEvent {
  type: 'device';
  address: string;
  name: string;
  model: string;
  rssi: number;
  timestamp: number;
}

/**
 * Scan refused by the radio, with the manual pairing fallback
 */
export interface ScanEvent {
  type: 'scan';
  radioState: string;
  reason: string;
  hint: string;
  timestamp: number;
}

/**
 * Any message on the feed
 */
export type BridgeMessage = StatusEvent | Telemetry | DeviceEvent | ScanEvent;

/**
 * Message type tags
 */
export const EVENT_NAMES = {
  STATUS: 'status',
  TELEMETRY: 'telemetry',
  DEVICE: 'device',
  SCAN: 'scan'
} as const;
