import { Config, PersistenceError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { SnapshotStore, createSnapshotStore } from '../persistence/snapshot-store.js';
import { Scheduler, TickReport } from '../scheduler/scheduler.js';
import { ChangeDetector } from './change-detector.js';
import { createClassifier } from './classifier.js';
import { DedupStore } from './dedup-store.js';
import { Fetcher, FetcherOptions, HttpRawFetcher } from './fetcher.js';
import { Notifier, createNotifier } from './notifier.js';
import { NoticeBook, ReminderRun, ReminderService } from './reminders.js';
import { PuppeteerRenderer } from './renderer.js';
import { TaskPipeline } from './task-pipeline.js';
import { TaskRegistry } from './task-registry.js';
import {
  AddTaskOptions,
  CheckResult,
  Classifier,
  Notice,
  RawFetcher,
  RenderedFetcher,
  TaskStatus,
  TaskView,
} from './types.js';

const logger = createChildLogger('monitor-service');

export interface MonitorServiceDeps {
  store: SnapshotStore;
  notifier: Notifier;
  rawFetcher?: RawFetcher;
  renderer?: RenderedFetcher;
  classifier?: Classifier;
  sleep?: FetcherOptions['sleep'];
  clock?: () => Date;
  generateId?: () => string;
}

export interface LoadOptions {
  /** Read the snapshot without taking the writer lock; every mutation is refused */
  readOnly?: boolean;
}

export interface MonitorStatus {
  tasks: number;
  byStatus: Record<TaskStatus, number>;
  dedupEntries: number;
  notices: number;
  inFlight: number;
  running: boolean;
  /** True while a failed snapshot write is waiting to be retried */
  pendingCommit: boolean;
}

/**
 * Caller-facing operations over the monitor: task management, manual
 * checks and the background scheduler. State lives in memory and every
 * change is committed to the snapshot store.
 *
 * A writable service holds the snapshot's writer lock from `load()` to
 * `stop()`, so a CLI write while the daemon runs fails with
 * StoreLockedError instead of being overwritten by the daemon's next commit.
 */
export class MonitorService {
  readonly registry: TaskRegistry;
  readonly dedup: DedupStore;
  readonly notices = new NoticeBook();
  readonly scheduler: Scheduler;

  private readonly store: SnapshotStore;
  private readonly pipeline: TaskPipeline;
  private readonly reminders: ReminderService;
  private readonly renderer: RenderedFetcher | undefined;
  private readonly clock: () => Date;
  private dirty = false;
  private loaded = false;
  private readOnly = false;

  constructor(config: Config, deps: MonitorServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.store = deps.store;
    this.renderer = deps.renderer;

    this.registry = new TaskRegistry({
      minIntervalSeconds: config.monitor.minIntervalSeconds,
      destinationSchemes: deps.notifier.schemes,
      degradedThreshold: config.monitor.degradedThreshold,
      clock: this.clock,
      ...(deps.generateId ? { generateId: deps.generateId } : {}),
    });
    this.dedup = new DedupStore(this.clock);

    const fetcher = new Fetcher(deps.rawFetcher ?? new HttpRawFetcher(config.fetch.userAgent), config.fetch, {
      ...(deps.renderer ? { renderer: deps.renderer } : {}),
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
    });

    this.pipeline = new TaskPipeline(
      {
        registry: this.registry,
        detector: new ChangeDetector(config.normalize),
        dedup: this.dedup,
        fetcher,
        notifier: deps.notifier,
        notices: this.notices,
        ...(deps.classifier ? { classifier: deps.classifier } : {}),
        commit: () => this.commitSafely(),
        clock: this.clock,
      },
      {
        dedupScope: config.monitor.dedupScope,
        suppressIrrelevant: config.classifier.suppressIrrelevant,
        degradedThreshold: config.monitor.degradedThreshold,
      }
    );

    this.reminders = new ReminderService(config.reminders, this.notices, this.registry, deps.notifier);

    this.scheduler = new Scheduler({
      tasks: this.registry,
      runTask: (taskId, signal) => this.pipeline.run(taskId, signal),
      beforeTick: (now) => this.housekeeping(now),
      concurrency: config.monitor.concurrency,
      tickSeconds: config.monitor.tickSeconds,
      clock: this.clock,
    });
  }

  /**
   * Load the persisted snapshot. Must complete before `start()`.
   * Rejects with StoreLockedError when another writer holds the snapshot.
   */
  async load(options: LoadOptions = {}): Promise<void> {
    this.readOnly = options.readOnly ?? false;
    if (!this.readOnly) {
      await this.store.acquire();
    }
    const snapshot = await this.store.load();
    this.registry.load(snapshot.tasks);
    this.dedup.load(snapshot.dedup);
    this.notices.load(snapshot.notices);
    this.loaded = true;
  }

  /**
   * Register a task. ConfigError leaves the registry untouched;
   * PersistenceError means the task exists but is not yet durable.
   */
  async add(resource: string, interval: number, destination: string, options: AddTaskOptions = {}): Promise<string> {
    this.requireWritable();
    const task = this.registry.add(resource, interval, destination, options);
    logger.info({ taskId: task.id, resource: task.resource, interval, mode: task.mode }, 'Task added');
    await this.commit();
    return task.id;
  }

  /**
   * Cancel any in-flight run, then drop the task and its notices
   */
  async remove(taskId: string): Promise<void> {
    this.requireWritable();
    this.registry.require(taskId);
    await this.scheduler.cancel(taskId);
    this.registry.remove(taskId);
    this.notices.removeForTask(taskId);
    logger.info({ taskId }, 'Task removed');
    await this.commit();
  }

  async enable(taskId: string): Promise<void> {
    this.requireWritable();
    if (this.registry.setEnabled(taskId, true)) {
      logger.info({ taskId }, 'Task enabled');
      await this.commit();
    }
  }

  async disable(taskId: string): Promise<void> {
    this.requireWritable();
    if (this.registry.setEnabled(taskId, false)) {
      logger.info({ taskId }, 'Task disabled');
      await this.commit();
    }
  }

  list(): TaskView[] {
    return this.registry.list().map((task) => this.registry.view(task));
  }

  get(taskId: string): TaskView {
    return this.registry.view(this.registry.require(taskId));
  }

  /**
   * Run one check immediately, regardless of schedule or enabled flag
   */
  async checkNow(taskId: string): Promise<CheckResult> {
    this.requireWritable();
    this.registry.require(taskId);
    return this.scheduler.runNow(taskId);
  }

  /**
   * Forget every seen item and the notices derived from them
   */
  async resetDedup(): Promise<void> {
    this.requireWritable();
    const cleared = this.dedup.size;
    this.dedup.reset();
    this.notices.clear();
    logger.warn({ cleared }, 'Dedup store reset');
    await this.commit();
  }

  listNotices(): Notice[] {
    return this.notices.list();
  }

  getStatus(): MonitorStatus {
    const byStatus: Record<TaskStatus, number> = { disabled: 0, pending: 0, healthy: 0, failing: 0, degraded: 0 };
    const tasks = this.registry.list();
    for (const task of tasks) {
      byStatus[this.registry.statusOf(task)]++;
    }
    return {
      tasks: tasks.length,
      byStatus,
      dedupEntries: this.dedup.size,
      notices: this.notices.size,
      inFlight: this.scheduler.inFlightCount,
      running: this.scheduler.running,
      pendingCommit: this.dirty,
    };
  }

  async tick(now?: Date): Promise<TickReport> {
    this.requireWritable();
    return this.scheduler.tick(now);
  }

  start(): void {
    if (!this.loaded) {
      throw new PersistenceError('Snapshot must be loaded before the scheduler starts');
    }
    this.requireWritable();
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
    if (this.dirty) {
      await this.commitSafely();
    }
    await this.renderer?.close?.();
    await this.store.close();
  }

  /**
   * Persist current state. Throws PersistenceError; the write is retried
   * on the next tick.
   */
  async commit(): Promise<void> {
    try {
      await this.store.acquire();
      await this.store.save({
        tasks: this.registry.snapshot(),
        dedup: this.dedup.entries(),
        notices: this.notices.list(),
      });
      if (this.dirty) {
        logger.info('Pending snapshot committed');
      }
      this.dirty = false;
    } catch (error) {
      this.dirty = true;
      throw error instanceof PersistenceError ? error : new PersistenceError(errorMessage(error), error);
    }
  }

  private requireWritable(): void {
    if (this.readOnly) {
      throw new PersistenceError('Snapshot was loaded read-only');
    }
  }

  private async commitSafely(): Promise<boolean> {
    try {
      await this.commit();
      return true;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Commit failed, will retry on next tick');
      return false;
    }
  }

  private async housekeeping(now: Date): Promise<void> {
    if (this.dirty) {
      await this.commitSafely();
    }
    const run: ReminderRun = await this.reminders.run(now, () => this.commitSafely());
    if (run.failed > 0) {
      logger.warn({ failed: run.failed }, 'Some reminders could not be delivered');
    }
  }
}

/**
 * Service wired from configuration: storage driver, transports,
 * classifier and renderer as configured
 */
export function createMonitorService(config: Config): MonitorService {
  const classifier = createClassifier(config.classifier);
  return new MonitorService(config, {
    store: createSnapshotStore(config),
    notifier: createNotifier(config),
    ...(config.renderer.enabled
      ? { renderer: new PuppeteerRenderer(config.renderer, config.fetch.userAgent, config.fetch.timeoutMs) }
      : {}),
    ...(classifier ? { classifier } : {}),
  });
}
