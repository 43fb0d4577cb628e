/**
 * BLE radio module
 */

export { createDeviceScanner } from './scanner';
export { createLinkManager } from './link';
export { createNobleRadio } from './noble-radio';
export { toDiscoveredDevice, toLinkConfig, toShortUuid, toRadioState, errorMessage } from './helpers';

export type {
  DiscoveredDevice,
  DeviceScanner,
  ScannerDependencies,
  LinkStatus,
  StatusChange,
  LinkManager,
  LinkManagerConfig,
  LinkDependencies
} from './types';
