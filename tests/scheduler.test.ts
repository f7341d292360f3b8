import { CycleScheduler } from '../src/scheduler';
import { silenceConsole } from './helpers/console';

silenceConsole();

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

describe('CycleScheduler.runOnce', () => {
  test('completes a cycle', async () => {
    const cycle = jest.fn(async () => undefined);
    expect(await new CycleScheduler(cycle, 1_000).runOnce()).toBe('completed');
    expect(cycle).toHaveBeenCalledTimes(1);
  });

  test('a throwing cycle is contained', async () => {
    const scheduler = new CycleScheduler(async () => { throw new Error('boom'); }, 1_000);
    expect(await scheduler.runOnce()).toBe('failed');
    expect(scheduler.isRunning).toBe(false);
  });

  test('a tick during a running cycle is skipped', async () => {
    const gate  = deferred();
    const cycle = jest.fn(() => gate.promise);
    const scheduler = new CycleScheduler(cycle, 1_000);

    const first = scheduler.runOnce();
    expect(scheduler.isRunning).toBe(true);
    expect(await scheduler.runOnce()).toBe('skipped');

    gate.resolve();
    expect(await first).toBe('completed');
    expect(cycle).toHaveBeenCalledTimes(1);
  });
});

describe('CycleScheduler.start', () => {
  test('runs until the signal aborts, between cycles', async () => {
    const controller = new AbortController();
    let runs = 0;
    const scheduler = new CycleScheduler(async () => {
      runs += 1;
      if (runs === 2) controller.abort();
    }, 5);

    await scheduler.start(controller.signal);
    expect(runs).toBe(2);
  });

  test('stop() cuts the wait short', async () => {
    let runs = 0;
    const scheduler = new CycleScheduler(async () => { runs += 1; }, 60_000);

    const done = scheduler.start();
    setTimeout(() => scheduler.stop(), 10);
    await done;
    expect(runs).toBe(1);
  });

  test('an already-aborted signal still lets nothing run', async () => {
    const controller = new AbortController();
    controller.abort();
    const cycle = jest.fn(async () => undefined);
    await new CycleScheduler(cycle, 5).start(controller.signal);
    expect(cycle).not.toHaveBeenCalled();
  });

  test('a failing cycle does not stop the loop', async () => {
    const controller = new AbortController();
    let runs = 0;
    const scheduler = new CycleScheduler(async () => {
      runs += 1;
      if (runs === 1) throw new Error('transient');
      controller.abort();
    }, 5);

    await scheduler.start(controller.signal);
    expect(runs).toBe(2);
  });
});
