import {SCHEDULER_NEXT_TICK_IN, SCHEDULER_PASS_FAILED} from './@log/index.js';
import {delay} from './@utils/index.js';
import type {Context} from './common.js';
import {createContext} from './common.js';
import {ConfigError} from './errors.js';
import type {ITelemetry} from './telemetry/index.js';

export type SchedulerTask = (context: Context) => Promise<unknown>;

export type SchedulerOptions = {
  /**
   * Milliseconds to wait after a pass completes before starting the next.
   */
  interval: number;
  telemetry: ITelemetry;
};

export class Scheduler {
  readonly interval: number;

  private telemetry: ITelemetry;

  constructor(
    private task: SchedulerTask,
    {interval, telemetry}: SchedulerOptions,
  ) {
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new ConfigError(
        `Invalid interval ${interval}, expecting a positive number of milliseconds.`,
      );
    }

    this.interval = interval;
    this.telemetry = telemetry;
  }

  /**
   * Runs the task immediately and then `interval` after each pass completes,
   * until `signal` aborts. Abortion is only observed between passes: each
   * pass runs with its own context, so requests already in flight are never
   * cancelled by a stop. The returned promise rejects with `signal.reason`.
   */
  async run(signal: AbortSignal): Promise<never> {
    while (true) {
      const context = createContext(new AbortController().signal);

      try {
        await this.task(context);
      } catch (error) {
        this.telemetry.error(context, SCHEDULER_PASS_FAILED(error));
      }

      signal.throwIfAborted();

      this.telemetry.info(context, SCHEDULER_NEXT_TICK_IN(this.interval));

      await delay(this.interval, signal);
    }
  }
}
