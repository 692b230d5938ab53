import * as cheerio from 'cheerio';
import { ConfigError, TaskNotFoundError } from '../types/index.js';
import { randomId } from '../utils/hash.js';
import { compilePattern } from './normalizer.js';
import { DEFAULT_ITEM_SELECTOR } from './change-detector.js';
import { parseDestination } from './notifier.js';
import {
  AddTaskOptions,
  Fingerprint,
  ListOptions,
  MonitorTask,
  TaskStatus,
  TaskView,
} from './types.js';

export interface TaskRegistryOptions {
  /** Smallest accepted poll interval in seconds */
  minIntervalSeconds: number;
  /** Destination schemes a transport exists for */
  destinationSchemes: string[];
  /** Failures above this count mark a task degraded */
  degradedThreshold: number;
  clock?: () => Date;
  generateId?: () => string;
}

/**
 * Owns the set of monitored tasks and their scheduling state.
 *
 * Callers receive copies; every mutation goes through a method here so the
 * scheduler and the command layer share one writer.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, MonitorTask>();
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly options: TaskRegistryOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomId(8));
  }

  /**
   * Validate and admit a new task. Throws ConfigError without touching the
   * registry when any field is invalid.
   */
  add(resource: string, interval: number, destination: string, options: AddTaskOptions = {}): MonitorTask {
    const url = this.validateResource(resource);
    this.validateInterval(interval);
    this.validateDestination(destination);
    const mode = options.mode ?? 'page';
    const list = mode === 'list' ? this.validateListOptions(options.list) : undefined;
    const ignorePatterns = options.ignorePatterns?.filter((p) => p.length > 0);
    ignorePatterns?.forEach((pattern) => compilePattern(pattern));

    let id = this.generateId();
    while (this.tasks.has(id)) {
      id = this.generateId();
    }

    const task: MonitorTask = {
      id,
      resource: url,
      interval,
      enabled: options.enabled ?? true,
      mode,
      ...(list ? { list } : {}),
      ...(ignorePatterns && ignorePatterns.length > 0 ? { ignorePatterns } : {}),
      destination,
      lastFingerprint: null,
      lastCheckedAt: null,
      lastChangedAt: null,
      failureCount: 0,
      lastError: null,
      createdAt: this.clock(),
    };

    this.tasks.set(id, task);
    return structuredClone(task);
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  get(id: string): MonitorTask | undefined {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : undefined;
  }

  require(id: string): MonitorTask {
    const task = this.get(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }

  remove(id: string): MonitorTask {
    const task = this.require(id);
    this.tasks.delete(id);
    return task;
  }

  /**
   * Returns true when the flag actually changed
   */
  setEnabled(id: string, enabled: boolean): boolean {
    const task = this.mutable(id);
    if (task.enabled === enabled) {
      return false;
    }
    task.enabled = enabled;
    return true;
  }

  list(): MonitorTask[] {
    return [...this.tasks.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .map((task) => structuredClone(task));
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Record a successful check. The fingerprint is replaced only here.
   */
  recordSuccess(id: string, fingerprint: Fingerprint, checkedAt: Date, changed: boolean): void {
    const task = this.mutable(id);
    task.lastFingerprint = { ...fingerprint };
    task.lastCheckedAt = checkedAt;
    if (changed) {
      task.lastChangedAt = checkedAt;
    }
    task.failureCount = 0;
    task.lastError = null;
  }

  /**
   * Record a failed check; the stored fingerprint is left alone.
   * Returns the new consecutive failure count.
   */
  recordFailure(id: string, error: string, checkedAt: Date): number {
    const task = this.mutable(id);
    task.lastCheckedAt = checkedAt;
    task.failureCount += 1;
    task.lastError = error;
    return task.failureCount;
  }

  nextDueAt(task: Pick<MonitorTask, 'lastCheckedAt' | 'interval' | 'createdAt'>): Date {
    if (!task.lastCheckedAt) {
      return task.createdAt;
    }
    return new Date(task.lastCheckedAt.getTime() + task.interval * 1000);
  }

  isDue(task: MonitorTask, now: Date): boolean {
    return task.enabled && now.getTime() >= this.nextDueAt(task).getTime();
  }

  /**
   * Enabled tasks that are due at `now`, oldest due first
   */
  dueTasks(now: Date): MonitorTask[] {
    return this.list()
      .filter((task) => this.isDue(task, now))
      .sort((a, b) => this.nextDueAt(a).getTime() - this.nextDueAt(b).getTime());
  }

  statusOf(task: MonitorTask): TaskStatus {
    if (!task.enabled) return 'disabled';
    if (task.failureCount > this.options.degradedThreshold) return 'degraded';
    if (task.failureCount > 0) return 'failing';
    if (!task.lastCheckedAt) return 'pending';
    return 'healthy';
  }

  view(task: MonitorTask): TaskView {
    return {
      ...task,
      status: this.statusOf(task),
      nextDueAt: task.enabled ? this.nextDueAt(task) : null,
    };
  }

  /**
   * Replace the contents with persisted tasks
   */
  load(tasks: MonitorTask[]): void {
    this.tasks.clear();
    for (const task of tasks) {
      this.tasks.set(task.id, structuredClone(task));
    }
  }

  snapshot(): MonitorTask[] {
    return this.list();
  }

  private mutable(id: string): MonitorTask {
    const task = this.tasks.get(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }

  private validateResource(resource: string): string {
    let url: URL;
    try {
      url = new URL(resource.trim());
    } catch {
      throw new ConfigError(`Invalid resource URL: ${resource}`, { resource });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigError(`Unsupported URL scheme "${url.protocol}", only http and https are allowed`, {
        resource,
      });
    }
    return url.href;
  }

  private validateInterval(interval: number): void {
    if (!Number.isInteger(interval)) {
      throw new ConfigError(`Interval must be a whole number of seconds: ${interval}`, { interval });
    }
    if (interval < this.options.minIntervalSeconds) {
      throw new ConfigError(
        `Interval ${interval}s is below the minimum of ${this.options.minIntervalSeconds}s`,
        { interval, minimum: this.options.minIntervalSeconds }
      );
    }
  }

  private validateDestination(destination: string): void {
    const { scheme } = parseDestination(destination);
    if (!this.options.destinationSchemes.includes(scheme)) {
      throw new ConfigError(`No transport for destination scheme "${scheme}"`, {
        destination,
        supported: this.options.destinationSchemes,
      });
    }
  }

  private validateListOptions(list: Partial<ListOptions> | undefined): ListOptions {
    const itemSelector = list?.itemSelector?.trim() || DEFAULT_ITEM_SELECTOR;
    try {
      cheerio.load('<html></html>')(itemSelector);
    } catch (error) {
      throw new ConfigError(`Invalid item selector: ${itemSelector}`, error);
    }
    const keywords = list?.keywords?.map((k) => k.trim()).filter((k) => k.length > 0);
    return {
      itemSelector,
      ...(keywords && keywords.length > 0 ? { keywords } : {}),
    };
  }
}
