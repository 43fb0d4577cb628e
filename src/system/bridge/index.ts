/**
 * Bridge module
 */

export { createBridge } from './bridge';
export { createListeners, toSessionId, toStatusEvent, toDeviceEvent } from './helpers';

export type { Bridge, BridgeDependencies, Session, SessionId } from './types';
export type { Listeners } from './helpers';
