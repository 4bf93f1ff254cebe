import { createChildLogger } from '../utils/logger.js';
import type { CronSchedule } from './cron.js';

const log = createChildLogger('scheduler');

export type ScheduledJob = (signal: AbortSignal) => Promise<unknown>;

export interface ScanSchedulerOptions {
  /** How often the clock is checked against the schedule */
  tickMs?: number;
  now?: () => Date;
}

/**
 * Runs a job on a cron schedule, one run at a time.
 *
 * Single-flight: while a run is in progress, ticks are absorbed, never
 * queued. Once a run finishes the next run time is computed from the
 * completion time, so a run that overshoots one or more matching times simply
 * continues with the next match after it.
 */
export class ScanScheduler {
  private readonly tickMs: number;
  private readonly now: () => Date;
  private interval: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private controller = new AbortController();
  private nextRun: Date | null = null;
  private runs = 0;

  constructor(
    private readonly schedule: CronSchedule,
    private readonly job: ScheduledJob,
    options: ScanSchedulerOptions = {},
  ) {
    this.tickMs = options.tickMs ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /** Starts ticking and returns the first run time, or null if there is none. */
  start(): Date | null {
    if (this.interval) return this.nextRun;
    this.controller = new AbortController();
    this.nextRun = this.schedule.next(this.now());
    if (!this.nextRun) {
      log.warn({ schedule: this.schedule.expression }, 'Schedule has no upcoming run time');
      return null;
    }
    log.info({ schedule: this.schedule.expression, nextRunAt: this.nextRun.toISOString() }, 'Scheduler started');
    this.interval = setInterval(() => {
      this.tick().catch((err) => log.error({ err }, 'Scheduler tick failed'));
    }, this.tickMs);
    return this.nextRun;
  }

  /**
   * Stops ticking, aborts the in-flight run (its subprocesses are terminated)
   * and waits for it to settle.
   */
  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.nextRun = null;
    this.controller.abort();
    if (this.inFlight) {
      log.info('Waiting for the in-flight run to finish');
      await this.inFlight;
    }
    log.info({ runs: this.runs }, 'Scheduler stopped');
  }

  /** Check the clock once. Exposed for tests. */
  async tick(): Promise<void> {
    if (this.inFlight) {
      log.trace('Run still in progress, tick absorbed');
      return;
    }
    if (!this.nextRun || this.now() < this.nextRun) return;

    this.inFlight = this.execute();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  get nextRunAt(): Date | null {
    return this.nextRun;
  }

  get completedRuns(): number {
    return this.runs;
  }

  private async execute(): Promise<void> {
    const scheduledFor = this.nextRun;
    const startedAt = Date.now();
    log.info({ scheduledFor: scheduledFor?.toISOString() }, 'Starting scheduled run');
    try {
      await this.job(this.controller.signal);
    } catch (err) {
      log.error({ err }, 'Scheduled run failed');
    }
    this.runs++;

    if (this.controller.signal.aborted) return;

    this.nextRun = this.schedule.next(this.now());
    if (this.nextRun) {
      log.info(
        { durationMs: Date.now() - startedAt, nextRunAt: this.nextRun.toISOString() },
        'Run complete, next run scheduled',
      );
    } else {
      log.warn({ schedule: this.schedule.expression }, 'Schedule has no further run time; scheduler idle');
      if (this.interval) {
        clearInterval(this.interval);
        this.interval = null;
      }
    }
  }
}
