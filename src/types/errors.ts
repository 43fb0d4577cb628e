/**
 * Global error types for the bridge
 *
 * Transport and device failures are turned into link status values and log
 * lines by the control loop; these classes only cross module boundaries.
 */

/**
 * Base class for every error raised by the bridge
 */
export class BridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BridgeError';
  }
}

/**
 * No controller is attached to the requested slot (recoverable, retried next tick)
 */
export class ControllerUnavailableError extends BridgeError {
  readonly slot: number;

  constructor(slot: number) {
    super('No controller in slot ' + slot);
    this.name = 'ControllerUnavailableError';
    this.slot = slot;
  }
}

/**
 * The radio cannot scan (adapter off, missing or not authorized)
 */
export class ScanUnavailableError extends BridgeError {
  readonly radioState: string;
  /** Manual fallback shown to the user */
  readonly hint: string;

  constructor(radioState: string) {
    super('Bluetooth radio unavailable (state: ' + radioState + ')');
    this.name = 'ScanUnavailableError';
    this.radioState = radioState;
    this.hint = radioState === 'unauthorized'
      ? 'Grant this program Bluetooth access, or pair the car in the system Bluetooth settings'
      : 'Turn the Bluetooth adapter on, or pair the car in the system Bluetooth settings';
  }
}

/**
 * A connect attempt did not reach the ready state
 */
export class ConnectionFailedError extends BridgeError {
  readonly address: string;

  constructor(address: string, reason: string, options?: ErrorOptions) {
    super('Connection to ' + address + ' failed: ' + reason, options);
    this.name = 'ConnectionFailedError';
    this.address = address;
  }
}

/**
 * A write was attempted while the link is not ready
 */
export class NotConnectedError extends BridgeError {
  readonly status: string;

  constructor(status: string) {
    super('Link not ready (status: ' + status + ')');
    this.name = 'NotConnectedError';
    this.status = status;
  }
}

/**
 * The transport rejected a write; the link is treated as dropped
 */
export class LinkWriteError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LinkWriteError';
  }
}

/**
 * A value violated a function contract (e.g. axis outside [-1, 1])
 */
export class InvalidInputError extends BridgeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Configuration rejected at start-up
 */
export class ConfigValidationError extends BridgeError {
  readonly issues: ReadonlyArray<{ field: string; message: string }>;

  constructor(issues: ReadonlyArray<{ field: string; message: string }>) {
    super('Invalid configuration: ' + issues.map(function (issue) { return issue.message; }).join('; '));
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
