/**
 * Multi-cadence control loop.
 *
 * One loop wakes every `tickMs` and runs, one after another, every task whose
 * own interval has elapsed since it last ran. Intervals are measured from the
 * tick a task last ran on; missed intervals are not made up.
 *
 *   idle → starting → running → shutting-down → stopped
 *
 * Shutdown is cooperative: the abort signal is checked between tasks and the
 * sleep between ticks wakes early, but a task that is already running is
 * always allowed to finish.
 */

import { setTimeout as delay } from 'timers/promises';
import { errorMessage } from './errors';
import { childLogger, type Logger } from './logger';
import { systemClock, type Clock } from './time';

export type SchedulerState = 'idle' | 'starting' | 'running' | 'shutting-down' | 'stopped';

export interface ScheduledTask {
  name: string;
  intervalMs: number;
  run(): unknown;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  tickMs: number;
  tasks: ScheduledTask[];
  /** Open storage, migrate. A failure here is fatal. */
  setup?: () => unknown;
  /** One-off work before the first tick. Failures are logged only. */
  backfill?: () => unknown;
  /** Release storage. Runs once the loop has exited. */
  teardown?: () => unknown;
  signal?: AbortSignal;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const abortableSleep: Sleep = async (ms, signal) => {
  if (signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
};

export class Scheduler {
  private options: SchedulerOptions;
  private controller = new AbortController();
  private clock: Clock;
  private sleep: Sleep;
  private log: Logger;
  private lastRun = new Map<string, number>();
  private _state: SchedulerState = 'idle';

  constructor(options: SchedulerOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? abortableSleep;
    this.log = options.logger ?? childLogger('scheduler');

    const external = options.signal;
    if (external) {
      if (external.aborted) {
        this.controller.abort();
      } else {
        external.addEventListener('abort', () => this.stop(), { once: true });
      }
    }
  }

  get state(): SchedulerState {
    return this._state;
  }

  /** Ask the loop to exit after the task currently running, if any. */
  stop(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  /**
   * Start, loop until stopped, shut down. Rejects only when `setup` fails, in
   * which case the loop never starts.
   */
  async run(): Promise<void> {
    if (this._state !== 'idle') {
      throw new Error(`Scheduler cannot run from state '${this._state}'`);
    }

    this._state = 'starting';
    try {
      await this.options.setup?.();
    } catch (err) {
      this._state = 'stopped';
      throw err;
    }

    if (this.options.backfill) {
      try {
        await this.options.backfill();
      } catch (err) {
        this.log.error({ err: errorMessage(err) }, 'Startup backfill failed');
      }
    }

    this._state = 'running';
    this.log.info('Entering main loop...');
    await this.loop();

    this._state = 'shutting-down';
    try {
      await this.options.teardown?.();
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, 'Teardown failed');
    }
    this._state = 'stopped';
    this.log.info('Shutdown complete');
  }

  private async loop(): Promise<void> {
    const signal = this.controller.signal;

    while (!signal.aborted) {
      const now = this.clock();

      for (const task of this.options.tasks) {
        if (signal.aborted) break;
        if (!this.isDue(task, now)) continue;

        await this.runTask(task);
        this.lastRun.set(task.name, now);
      }

      await this.sleep(this.options.tickMs, signal);
    }
  }

  private isDue(task: ScheduledTask, now: number): boolean {
    const last = this.lastRun.get(task.name);
    return last === undefined || now - last >= task.intervalMs;
  }

  private async runTask(task: ScheduledTask): Promise<void> {
    try {
      await task.run();
    } catch (err) {
      this.log.error({ task: task.name, err: errorMessage(err) }, `Task ${task.name} failed`);
    }
  }
}
