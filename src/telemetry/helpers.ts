/**
 * Telemetry feed helpers
 */

import type { BridgeMessage, Telemetry } from '@events/types';

/**
 * Wire form of a feed message
 */
export function serializeMessage(message: BridgeMessage): string {
  return JSON.stringify(message);
}

/**
 * Key of the latest telemetry snapshot kept per session
 */
export function snapshotKey(telemetry: Telemetry): string {
  return telemetry.slot + '/' + telemetry.address.toLowerCase();
}
