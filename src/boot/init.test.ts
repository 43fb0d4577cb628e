/**
 * Tests for bridge initialization
 */

import { BRIDGE_VERSION, initialize } from './init';

import type { TimerAPI } from '$types';
import type { BootConsole } from './types';

function fakeTimer() {
  const callbacks = new Map<number, () => void>();
  let next = 1;
  const set = vi.fn(function (_ms: number, _repeat: boolean, callback: () => void) {
    const handle = next++;
    callbacks.set(handle, callback);
    return handle;
  });
  const timer: TimerAPI = {
    set: set,
    clear: function (handle) { callbacks.delete(handle); }
  };
  return {
    timer: timer,
    set: set,
    fire: function () {
      for (const callback of Array.from(callbacks.values())) callback();
    }
  };
}

describe('initialize', () => {
  let out: BootConsole & { log: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    out = {
      log: vi.fn(),
      warn: vi.fn(),
      error: vi.fn()
    };
  });

  it('should refuse an invalid configuration and print every error', async () => {
    const runtime = await initialize({ TICK_PERIOD_MS: 5, DEADZONE: 0.9 }, { console: out });

    expect(runtime).toBeNull();
    expect(out.error.mock.calls).toEqual([
      ['INIT FAIL: Invalid configuration'],
      ['  [TICK_PERIOD_MS]: TICK_PERIOD_MS must be between 10 and 1000 (got 5)'],
      ['  [DEADZONE]: DEADZONE must be between 0 and 0.5 (got 0.9)']
    ]);
  });

  it('should build the runtime with the overrides applied', async () => {
    const loop = fakeTimer();
    const sinks = fakeTimer();

    const runtime = await initialize(
      { TICK_PERIOD_MS: 40, CONSOLE_COLOR: false },
      { console: out, timer: loop.timer, sinkTimer: sinks.timer }
    );

    expect(runtime).not.toBeNull();
    expect(runtime?.config.TICK_PERIOD_MS).toBe(40);
    expect(runtime?.timer).toBe(loop.timer);
    expect(runtime?.isDebug).toBe(false);
    expect(sinks.set).toHaveBeenCalledWith(50, true, expect.any(Function));
    expect(loop.set).not.toHaveBeenCalled();
  });

  it('should log the start-up banner through the console sink', async () => {
    const sinks = fakeTimer();

    await initialize({ CONSOLE_COLOR: false }, { console: out, timer: fakeTimer().timer, sinkTimer: sinks.timer });
    sinks.fire();

    expect(out.log).toHaveBeenCalledWith('ℹ️ [INFO]     🚗 Gamepad car bridge v' + BRIDGE_VERSION);
    expect(out.log).toHaveBeenCalledWith('ℹ️ [INFO]     ⏱️ Tick 50 ms | keep-alive 100 ms | dead-zone 0.05 | reconnect 5x');
  });

  it('should log validation warnings once the logger is up', async () => {
    const sinks = fakeTimer();

    const runtime = await initialize(
      { CONSOLE_COLOR: false, DEADZONE: 0.3 },
      { console: out, timer: fakeTimer().timer, sinkTimer: sinks.timer }
    );
    sinks.fire();

    expect(runtime).not.toBeNull();
    expect(out.warn).toHaveBeenCalledWith('⚠️ [WARNING]  [DEADZONE]: DEADZONE is outside recommended range 0.02-0.2 (got 0.3)');
  });

  it('should report debug mode', async () => {
    const runtime = await initialize(
      { GLOBAL_LOG_LEVEL: 0, CONSOLE_ENABLED: false },
      { console: out, timer: fakeTimer().timer, sinkTimer: fakeTimer().timer }
    );

    expect(runtime?.isDebug).toBe(true);
  });
});
