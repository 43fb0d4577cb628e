/**
 * Shared type barrel
 */

export type {
  ControllerSlotId,
  AxisFraction,
  DriveMode,
  ButtonName,
  ButtonFlags,
  ControllerState,
  CarToggles,
  CommandFrame,
  CarModel
} from './common';

export type {
  TimerHandle,
  TimerAPI,
  RadioState,
  PeripheralHandle,
  Advertisement,
  ScanSession,
  RadioCharacteristic,
  RadioLink,
  RadioAPI,
  RawPadSnapshot,
  ControllerSlotInfo,
  GamepadAPI
} from './platform';

export type {
  BridgeUserConfig,
  BridgeConfigOverrides,
  BridgeAppConstants,
  BridgeConfig
} from './config';

export {
  BridgeError,
  ControllerUnavailableError,
  ScanUnavailableError,
  ConnectionFailedError,
  NotConnectedError,
  LinkWriteError,
  InvalidInputError,
  ConfigValidationError
} from './errors';
