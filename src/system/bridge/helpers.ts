/**
 * Bridge helpers
 */

import { modelLabel } from '@core/catalog';
import { addressKey, errorMessage } from '@hardware/radio/helpers';
import { nowMs } from '@utils/time';

import type { ControllerSlotId } from '$types';
import type { ScanUnavailableError } from '$types/errors';
import type { DeviceEvent, ScanEvent, StatusEvent } from '@events/types';
import type { DiscoveredDevice, StatusChange } from '@hardware/radio/types';
import type { Logger } from '@logging';
import type { SessionId } from './types';

/**
 * Listener registry that isolates listener failures
 */
export interface Listeners<T> {
  add(listener: (value: T) => void): () => void;
  emit(value: T): void;
  size(): number;
}

/**
 * Create a listener registry
 * @param logger - Where listener failures go
 * @param label - Used in the failure message ("<label> listener failed: ...")
 */
export function createListeners<T>(logger: Logger, label: string): Listeners<T> {
  const listeners = new Set<(value: T) => void>();

  function add(listener: (value: T) => void): () => void {
    listeners.add(listener);
    return function () {
      listeners.delete(listener);
    };
  }

  function emit(value: T): void {
    listeners.forEach(function (listener) {
      try {
        listener(value);
      } catch (err) {
        logger.warning(label + ' listener failed: ' + errorMessage(err));
      }
    });
  }

  return {
    add: add,
    emit: emit,
    size: function () { return listeners.size; }
  };
}

/**
 * Session id for a slot and a car
 */
export function toSessionId(slot: ControllerSlotId, address: string): SessionId {
  return slot + '/' + addressKey(address);
}

export function toStatusEvent(slot: ControllerSlotId, device: DiscoveredDevice, change: StatusChange): StatusEvent {
  return {
    type: 'status',
    slot: slot,
    address: device.address,
    device: device.advertisedName,
    status: change.status,
    previous: change.previous,
    reason: change.reason,
    timestamp: nowMs()
  };
}

export function toScanEvent(err: ScanUnavailableError): ScanEvent {
  return {
    type: 'scan',
    radioState: err.radioState,
    reason: err.message,
    hint: err.hint,
    timestamp: nowMs()
  };
}

export function toDeviceEvent(device: DiscoveredDevice): DeviceEvent {
  return {
    type: 'device',
    address: device.address,
    name: device.advertisedName,
    model: modelLabel(device.model),
    rssi: device.rssi,
    timestamp: nowMs()
  };
}
