import pLimit, { LimitFunction } from 'p-limit';
import { errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { CheckResult, MonitorTask } from '../monitoring/types.js';

const logger = createChildLogger('scheduler');

/**
 * Source of due tasks
 */
export interface DueTaskSource {
  dueTasks(now: Date): MonitorTask[];
}

export interface SchedulerOptions {
  tasks: DueTaskSource;
  /** Executes one task; expected to report failures in its result */
  runTask: (taskId: string, signal: AbortSignal) => Promise<CheckResult>;
  /** Housekeeping before due tasks are selected (pending commits, reminders) */
  beforeTick?: (now: Date) => Promise<void>;
  concurrency: number;
  tickSeconds: number;
  clock?: () => Date;
}

export interface TickReport {
  started: string[];
  /** Due, but a run for the task was already in flight */
  skipped: string[];
  results: CheckResult[];
}

interface InFlight {
  controller: AbortController;
  done: Promise<CheckResult>;
}

/**
 * Drives task runs on a fixed tick with at most one run per task in flight
 * and a global concurrency cap
 */
export class Scheduler {
  private readonly inFlight = new Map<string, InFlight>();
  private readonly limit: LimitFunction;
  private readonly clock: () => Date;
  private timer: NodeJS.Timeout | null = null;

  constructor(private options: SchedulerOptions) {
    this.limit = pLimit(Math.max(1, options.concurrency));
    this.clock = options.clock ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Run every due task once. Resolves when the runs started by this tick
   * have finished.
   */
  async tick(now: Date = this.clock()): Promise<TickReport> {
    if (this.options.beforeTick) {
      try {
        await this.options.beforeTick(now);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Pre-tick housekeeping failed');
      }
    }

    const report: TickReport = { started: [], skipped: [], results: [] };
    const runs: Promise<CheckResult>[] = [];

    for (const task of this.options.tasks.dueTasks(now)) {
      if (this.inFlight.has(task.id)) {
        report.skipped.push(task.id);
        continue;
      }
      report.started.push(task.id);
      runs.push(this.launch(task.id));
    }

    if (report.skipped.length > 0) {
      logger.debug({ skipped: report.skipped }, 'Skipped tasks already in flight');
    }

    report.results = await Promise.all(runs);
    return report;
  }

  /**
   * Run one task now, waiting for any in-flight run of it to finish first
   */
  async runNow(taskId: string): Promise<CheckResult> {
    let current = this.inFlight.get(taskId);
    while (current) {
      await current.done;
      current = this.inFlight.get(taskId);
    }
    return this.launch(taskId);
  }

  /**
   * Abort the in-flight run of a task, if any, and wait for it to settle
   */
  async cancel(taskId: string): Promise<void> {
    const current = this.inFlight.get(taskId);
    if (!current) {
      return;
    }
    current.controller.abort();
    await current.done;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    logger.info(
      { tickSeconds: this.options.tickSeconds, concurrency: this.options.concurrency },
      'Scheduler started'
    );
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Tick failed');
      });
    }, this.options.tickSeconds * 1000);
    this.tick().catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Tick failed');
    });
  }

  /**
   * Stop ticking, abort in-flight runs and wait for them
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const pending = [...this.inFlight.values()];
    for (const run of pending) {
      run.controller.abort();
    }
    await Promise.all(pending.map((run) => run.done));
    logger.info({ aborted: pending.length }, 'Scheduler stopped');
  }

  private launch(taskId: string): Promise<CheckResult> {
    const controller = new AbortController();
    const done = this.limit(() => this.execute(taskId, controller.signal)).finally(() => {
      this.inFlight.delete(taskId);
    });
    this.inFlight.set(taskId, { controller, done });
    return done;
  }

  private async execute(taskId: string, signal: AbortSignal): Promise<CheckResult> {
    if (signal.aborted) {
      return cancelledResult(taskId, this.clock());
    }
    try {
      return await this.options.runTask(taskId, signal);
    } catch (error) {
      logger.error({ taskId, error: errorMessage(error) }, 'Task run threw');
      return {
        taskId,
        outcome: 'failed',
        events: [],
        deliveryFailures: 0,
        newItems: 0,
        committed: true,
        error: errorMessage(error),
        checkedAt: this.clock(),
      };
    }
  }
}

function cancelledResult(taskId: string, checkedAt: Date): CheckResult {
  return {
    taskId,
    outcome: 'cancelled',
    events: [],
    deliveryFailures: 0,
    newItems: 0,
    committed: true,
    checkedAt,
  };
}
