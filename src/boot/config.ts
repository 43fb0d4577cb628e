import type { BridgeUserConfig, BridgeAppConstants, BridgeConfig, BridgeConfigOverrides } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for driving feel,
//   pairing behaviour and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<BridgeUserConfig> = {
  // TICK_PERIOD_MS
  //   Role: Control loop cadence: one sample/encode/dispatch per tick.
  //   Critical: Integer 10–1000 ms.
  //   Recommended: 20–100 ms; 50 ms (20 Hz) matches what the car firmware expects.
  TICK_PERIOD_MS: 50,

  // KEEPALIVE_MS
  //   Role: Unchanged frames are re-sent at most this often so the car keeps
  //         its last command; changed frames always go out on the next tick.
  //   Critical: Integer 10–5000 ms.
  //   Recommended: 50–500 ms; 100 ms. Values below TICK_PERIOD_MS re-send every tick.
  KEEPALIVE_MS: 100,

  // TELEMETRY_INTERVAL_MS
  //   Role: How often each session reports telemetry to listeners.
  //   Critical: Integer 50–60000 ms.
  //   Recommended: 100–2000 ms.
  TELEMETRY_INTERVAL_MS: 250,

  // CONTROLLER_SLOT
  //   Role: Default controller slot (jsN) used when a car is driven without an explicit slot.
  //   Critical: Integer 0–31.
  //   Recommended: 0 for a single controller.
  CONTROLLER_SLOT: 0,

  // JOYSTICK_DEVICE_DIR
  //   Role: Directory holding the Linux joystick device nodes (js0, js1, ...).
  //   Critical: Non-empty path.
  //   Recommended: /dev/input.
  JOYSTICK_DEVICE_DIR: '/dev/input',

  // DEADZONE
  //   Role: Stick magnitudes below this snap to exactly 0 so a resting stick
  //         never drives the car.
  //   Critical: 0–0.5.
  //   Recommended: 0.02–0.2; 0.05 suits most pads.
  DEADZONE: 0.05,

  // STEERING_AXIS / THROTTLE_AXIS
  //   Role: Axis indices for steering (left stick X) and throttle (right stick Y).
  //   Critical: Integers 0–63, different from each other.
  //   Recommended: 0 and 4 on Xbox-layout pads under the Linux xpad driver.
  STEERING_AXIS: 0,
  THROTTLE_AXIS: 4,

  // INVERT_STEERING / INVERT_THROTTLE
  //   Role: Flip axis sign. Stick up reads negative, so throttle is inverted by default.
  //   Critical: Booleans.
  INVERT_STEERING: false,
  INVERT_THROTTLE: true,

  // TURBO_AXES
  //   Role: Analog trigger axes; turbo is held while any of them is pressed.
  //   Critical: Integers 0–63.
  //   Recommended: [2, 5] (LT, RT) on Xbox-layout pads.
  TURBO_AXES: [2, 5],

  // TRIGGER_PRESS_THRESHOLD
  //   Role: A trigger counts as pressed above this value (triggers rest at -1).
  //   Critical: -1 to 1.
  //   Recommended: -0.5.
  TRIGGER_PRESS_THRESHOLD: -0.5,

  // BUTTON_*
  //   Role: Button indices. Accelerate/brake override the throttle stick (brake wins);
  //         mode, donut and lights toggle on press; battery requests a battery reading.
  //   Critical: Integers 0–127, all distinct.
  //   Recommended: A=0, B=1, X=2, Y=3, BACK=6, START=7 on Xbox-layout pads.
  BUTTON_ACCELERATE: 0,
  BUTTON_BRAKE: 1,
  BUTTON_MODE: 2,
  BUTTON_DONUT: 3,
  BUTTON_LIGHTS: 6,
  BUTTON_BATTERY: 7,

  // RADIO_READY_TIMEOUT_MS
  //   Role: How long to wait for the Bluetooth adapter to report poweredOn.
  //   Critical: Integer 0–60000 ms.
  //   Recommended: 1000–10000 ms.
  RADIO_READY_TIMEOUT_MS: 5000,

  // SCAN_DURATION_MS
  //   Role: Length of one discovery window.
  //   Critical: Integer 500–60000 ms.
  //   Recommended: 2000–10000 ms; 3000 ms finds cars that are switched on.
  SCAN_DURATION_MS: 3000,

  // CONNECT_TIMEOUT_MS
  //   Role: Upper bound for one connect attempt, including service discovery.
  //   Critical: Integer 1000–120000 ms.
  //   Recommended: 10000–60000 ms; pairing these cars is slow, 45000 ms.
  CONNECT_TIMEOUT_MS: 45000,

  // RECONNECT_BASE_DELAY_MS / RECONNECT_MAX_DELAY_MS / RECONNECT_MAX_ATTEMPTS
  //   Role: Backoff after a dropped link. The first attempt is immediate, the
  //         following ones wait base, 2x base, 4x base ... capped at max.
  //         After RECONNECT_MAX_ATTEMPTS failures the session waits for a manual retry.
  //   Critical: base 50–60000 ms; max 50–300000 ms and >= base; attempts 0–100.
  //   Recommended: 500 ms, 8000 ms, 5 attempts.
  RECONNECT_BASE_DELAY_MS: 500,
  RECONNECT_MAX_DELAY_MS: 8000,
  RECONNECT_MAX_ATTEMPTS: 5,

  // TELEMETRY_PORT
  //   Role: TCP port of the WebSocket telemetry feed. 0 disables the feed.
  //   Critical: Integer 0–65535.
  TELEMETRY_PORT: 0,

  // TELEMETRY_HOST
  //   Role: Interface the telemetry feed listens on.
  //   Critical: Non-empty when TELEMETRY_PORT is set.
  //   Recommended: 127.0.0.1; 0.0.0.0 exposes the feed to the network.
  TELEMETRY_HOST: '127.0.0.1',

  // CONSOLE_ENABLED
  //   Role: Enable console logging.
  //   Critical: Boolean.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum level written to the console.
  //   Critical: One of the LOG_LEVELS values.
  //   Recommended: 1 (INFO).
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_BUFFER_SIZE
  //   Role: Messages held between console drains before new ones are dropped.
  //   Critical: Integer 1–10000.
  //   Recommended: 50–1000.
  CONSOLE_BUFFER_SIZE: 200,

  // CONSOLE_INTERVAL_MS
  //   Role: Console drain interval.
  //   Critical: Integer 10–5000 ms.
  //   Recommended: 20–500 ms.
  CONSOLE_INTERVAL_MS: 50,

  // CONSOLE_COLOR
  //   Role: Color console lines by level (ignored when the terminal has no color support).
  CONSOLE_COLOR: true,

  // FILE_LOG_ENABLED / FILE_LOG_LEVEL / FILE_LOG_PATH
  //   Role: Optional append-only log file.
  //   Critical: Level one of LOG_LEVELS; path non-empty when enabled.
  //   Recommended: Level 0 (DEBUG) when chasing pairing problems.
  FILE_LOG_ENABLED: false,
  FILE_LOG_LEVEL: 0,
  FILE_LOG_PATH: 'logs/bridge.log',

  // GLOBAL_LOG_LEVEL
  //   Role: Logger-wide minimum level, applied before per-sink levels.
  //   Critical: One of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 (DEBUG) prints every dispatched frame.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Suppress INFO lines after this many hours of uptime. 0 disables.
  //   Critical: 0–720.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0
};

// ─────────────────────────────────────────────────────────────
// APP CONSTANTS
//   Protocol and engine constants. Changing these breaks the
//   link with the car firmware.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<BridgeAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3
  },

  // GATT layout of the car
  //   fff1 takes command frames (write without response), fff2 notifies
  //   status, 2a19 is the standard battery level characteristic.
  CONTROL_SERVICE_UUID: '0000fff0-0000-1000-8000-00805f9b34fb',
  COMMAND_CHARACTERISTIC_UUID: '0000fff1-0000-1000-8000-00805f9b34fb',
  STATUS_CHARACTERISTIC_UUID: '0000fff2-0000-1000-8000-00805f9b34fb',
  BATTERY_SERVICE_UUID: '0000180f-0000-1000-8000-00805f9b34fb',
  BATTERY_CHARACTERISTIC_UUID: '00002a19-0000-1000-8000-00805f9b34fb',

  // JOYSTICK_AXIS_MAX
  //   Role: Full-scale value of a js_event axis reading.
  JOYSTICK_AXIS_MAX: 32767,

  // JOYSTICK_NAME_ROOT
  //   Role: sysfs directory exposing controller names (<root>/jsN/device/name).
  JOYSTICK_NAME_ROOT: '/sys/class/input',

  // SHUTDOWN_GRACE_MS
  //   Role: Time allowed for neutral frames and disconnects on exit.
  SHUTDOWN_GRACE_MS: 3000
};

/**
 * Merge constants, defaults and overrides into a complete configuration
 * @param overrides - Settings from the environment or CLI flags
 * @returns Frozen configuration
 */
export function resolveConfig(overrides: BridgeConfigOverrides = {}): Readonly<BridgeConfig> {
  const config: BridgeConfig = { ...APP_CONSTANTS, ...USER_CONFIG, ...overrides };
  return Object.freeze(config);
}

const CONFIG = resolveConfig();

export default CONFIG;
