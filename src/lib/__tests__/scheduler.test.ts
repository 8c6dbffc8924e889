import { describe, it, expect } from 'vitest';
import { silentLogger } from '../logger';
import { Scheduler, abortableSleep, type ScheduledTask, type SchedulerOptions, type Sleep } from '../scheduler';

const logger = silentLogger();

/**
 * Build a scheduler on a fake clock. Each sleep advances the clock by the
 * requested tick (or by `jumps[n]` when given) and the scheduler is stopped
 * after `ticks` sleeps. Tasks named in `failing` throw on every run.
 */
function harness(
  ticks: number,
  overrides: Partial<SchedulerOptions> = {},
  jumps: number[] = [],
  failing: string[] = []
) {
  let now = 0;
  let slept = 0;
  const calls: string[] = [];

  const task = (name: string, intervalMs: number): ScheduledTask => ({
    name,
    intervalMs,
    run: () => {
      calls.push(`${name}@${now}`);
      if (failing.includes(name)) throw new Error(`${name} exploded`);
    },
  });

  const runs = (name: string) => calls.filter((c) => c.startsWith(`${name}@`)).length;

  const sleep: Sleep = async (ms) => {
    now += jumps[slept] ?? ms;
    slept++;
    if (slept >= ticks) scheduler.stop();
  };

  const scheduler: Scheduler = new Scheduler({
    tickMs: 1000,
    tasks: [task('performance', 5000), task('players', 10_000), task('cleanup', 3_600_000)],
    clock: () => now,
    sleep,
    logger,
    ...overrides,
  });

  return { scheduler, calls, runs };
}

describe('Scheduler', () => {
  it('runs each task on its own interval', async () => {
    const { scheduler, runs } = harness(20);
    await scheduler.run();

    expect(runs('performance')).toBe(4);
    expect(runs('players')).toBe(2);
    expect(runs('cleanup')).toBe(1);
  });

  it('runs every task on the first tick, in order', async () => {
    const { scheduler, calls } = harness(1);
    await scheduler.run();

    expect(calls).toEqual(['performance@0', 'players@0', 'cleanup@0']);
  });

  it('does not catch up on missed intervals', async () => {
    const { scheduler, calls } = harness(2, {}, [25_000]);
    await scheduler.run();

    expect(calls.filter((c) => c.startsWith('performance'))).toEqual([
      'performance@0',
      'performance@25000',
    ]);
  });

  it('keeps running other tasks when one fails', async () => {
    const { scheduler, runs } = harness(20, {}, [], ['performance']);
    await scheduler.run();

    expect(runs('performance')).toBe(4);
    expect(runs('players')).toBe(2);
    expect(scheduler.state).toBe('stopped');
  });

  it('walks through its lifecycle states', async () => {
    const seen: string[] = [];
    let scheduler: Scheduler | null = null;
    const state = () => scheduler?.state ?? 'none';

    const h = harness(1, {
      setup: () => seen.push(`setup:${state()}`),
      backfill: () => seen.push(`backfill:${state()}`),
      teardown: () => seen.push(`teardown:${state()}`),
      tasks: [{ name: 'players', intervalMs: 10_000, run: () => seen.push(`players:${state()}`) }],
    });
    scheduler = h.scheduler;

    expect(scheduler.state).toBe('idle');
    await scheduler.run();

    expect(seen).toEqual([
      'setup:starting',
      'backfill:starting',
      'players:running',
      'teardown:shutting-down',
    ]);
    expect(scheduler.state).toBe('stopped');
  });

  it('rejects and never loops when setup fails', async () => {
    let tornDown = false;
    const { scheduler, calls } = harness(5, {
      setup: () => {
        throw new Error('unable to open database file');
      },
      teardown: () => {
        tornDown = true;
      },
    });

    await expect(scheduler.run()).rejects.toThrow('unable to open database file');
    expect(calls).toEqual([]);
    expect(tornDown).toBe(false);
    expect(scheduler.state).toBe('stopped');
  });

  it('keeps going when the backfill fails', async () => {
    const { scheduler, calls } = harness(1, {
      backfill: async () => {
        throw new Error('journalctl timed out after 60000ms');
      },
    });

    await scheduler.run();
    expect(calls).toHaveLength(3);
  });

  it('does not start a loop when the stop signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let tornDown = false;

    const { scheduler, calls } = harness(5, {
      signal: controller.signal,
      teardown: () => {
        tornDown = true;
      },
    });
    await scheduler.run();

    expect(calls).toEqual([]);
    expect(tornDown).toBe(true);
  });

  it('lets an in-flight task finish but schedules nothing after a stop', async () => {
    const controller = new AbortController();
    const calls: string[] = [];

    const scheduler = new Scheduler({
      tickMs: 1000,
      signal: controller.signal,
      logger,
      sleep: async () => undefined,
      tasks: [
        {
          name: 'performance',
          intervalMs: 5000,
          run: async () => {
            controller.abort();
            await Promise.resolve();
            calls.push('performance finished');
          },
        },
        { name: 'players', intervalMs: 10_000, run: () => calls.push('players') },
      ],
    });

    await scheduler.run();
    expect(calls).toEqual(['performance finished']);
    expect(scheduler.state).toBe('stopped');
  });

  it('refuses to run twice', async () => {
    const { scheduler } = harness(1);
    await scheduler.run();
    await expect(scheduler.run()).rejects.toThrow("Scheduler cannot run from state 'stopped'");
  });
});

describe('abortableSleep', () => {
  it('wakes up as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });

  it('returns at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(abortableSleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
