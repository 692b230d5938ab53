import { Config } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { Notifier } from './notifier.js';
import { TaskRegistry } from './task-registry.js';
import { Classification, ListItem, MonitorTask, Notice, NotificationEvent } from './types.js';

const logger = createChildLogger('reminders');

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Local calendar date as YYYY-MM-DD
 */
export function localDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Whole days from the local date of `now` to a YYYY-MM-DD date.
 * Negative once the date has passed.
 */
export function daysUntil(isoDate: string, now: Date): number | null {
  const match = isoDate.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return null;
  }
  const target = Date.UTC(parseInt(match[1], 10), parseInt(match[2], 10) - 1, parseInt(match[3], 10));
  const today = Date.UTC(now.getFullYear(), now.getMonth(), now.getDate());
  return Math.round((target - today) / DAY_MS);
}

export function detectAnomaly(startDate: string | null, endDate: string | null): Notice['anomaly'] {
  if (!startDate || !endDate) return undefined;
  if (startDate === endDate) return 'start_equals_end';
  if (endDate < startDate) return 'end_before_start';
  return undefined;
}

/**
 * Relevant classified items kept for deadline reminders
 */
export class NoticeBook {
  private readonly notices = new Map<string, Notice>();

  /**
   * Build and store a notice for a relevant item. Returns undefined when
   * the item is not relevant, already known, or its deadline has passed.
   */
  record(
    task: Pick<MonitorTask, 'id'>,
    item: ListItem,
    classification: Classification,
    now: Date
  ): Notice | undefined {
    if (!classification.isRelevant) {
      return undefined;
    }
    const id = `${task.id}:${item.id}`;
    if (this.notices.has(id)) {
      return undefined;
    }
    if (classification.endDate) {
      const days = daysUntil(classification.endDate, now);
      if (days !== null && days < 0) {
        return undefined;
      }
    }

    const anomaly = detectAnomaly(classification.startDate, classification.endDate);
    const notice: Notice = {
      id,
      taskId: task.id,
      title: item.title,
      url: item.url,
      startDate: classification.startDate,
      endDate: classification.endDate,
      ...(anomaly ? { anomaly } : {}),
      lastRemindedOn: null,
      createdAt: now,
    };
    this.notices.set(id, notice);
    return { ...notice };
  }

  get(id: string): Notice | undefined {
    const notice = this.notices.get(id);
    return notice ? { ...notice } : undefined;
  }

  markReminded(id: string, day: string): void {
    const notice = this.notices.get(id);
    if (notice) {
      notice.lastRemindedOn = day;
    }
  }

  delete(id: string): boolean {
    return this.notices.delete(id);
  }

  /**
   * Returns the number of notices dropped
   */
  removeForTask(taskId: string): number {
    let removed = 0;
    for (const [id, notice] of this.notices) {
      if (notice.taskId === taskId) {
        this.notices.delete(id);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.notices.clear();
  }

  get size(): number {
    return this.notices.size;
  }

  /**
   * Sorted by end date, open-ended notices last
   */
  list(): Notice[] {
    return [...this.notices.values()]
      .map((notice) => ({ ...notice }))
      .sort((a, b) => (a.endDate ?? '9999-12-31').localeCompare(b.endDate ?? '9999-12-31'));
  }

  load(notices: Notice[]): void {
    this.notices.clear();
    for (const notice of notices) {
      this.notices.set(notice.id, { ...notice });
    }
  }
}

export interface ReminderRun {
  sent: number;
  failed: number;
  pruned: number;
  /** Whether any notice changed and needs a commit */
  mutated: boolean;
}

/**
 * Daily reminders for notices whose registration closes soon
 */
export class ReminderService {
  constructor(
    private config: Config['reminders'],
    private notices: NoticeBook,
    private registry: TaskRegistry,
    private notifier: Notifier
  ) {}

  /**
   * Send today's reminders if the reminder hour has been reached. Each
   * notice is reminded at most once per local day.
   *
   * `commit` is awaited after state changes and before any delivery; it
   * reports failure instead of throwing.
   */
  async run(now: Date, commit: () => Promise<boolean>): Promise<ReminderRun> {
    const result: ReminderRun = { sent: 0, failed: 0, pruned: 0, mutated: false };
    if (!this.config.enabled || now.getHours() < this.config.hour) {
      return result;
    }

    const today = localDate(now);
    const pending: Array<{ notice: Notice; task: MonitorTask; daysLeft: number }> = [];

    for (const notice of this.notices.list()) {
      const task = this.registry.get(notice.taskId);
      const daysLeft = notice.endDate ? daysUntil(notice.endDate, now) : null;

      if (!task || (daysLeft !== null && daysLeft < 0)) {
        this.notices.delete(notice.id);
        result.pruned++;
        continue;
      }
      if (daysLeft === null || daysLeft > this.config.daysAhead || notice.lastRemindedOn === today) {
        continue;
      }

      this.notices.markReminded(notice.id, today);
      pending.push({ notice, task, daysLeft });
    }

    result.mutated = result.pruned > 0 || pending.length > 0;
    if (!result.mutated) {
      return result;
    }

    await commit();

    for (const { notice, task, daysLeft } of pending) {
      const event: NotificationEvent = {
        taskId: task.id,
        resource: task.resource,
        kind: 'reminder',
        summary: `Closes ${notice.endDate}, ${daysLeft} day(s) left`,
        item: { id: notice.id, title: notice.title, url: notice.url },
        timestamp: now,
      };
      const delivery = await this.notifier.notify(event, task.destination);
      if (delivery.ok) {
        result.sent++;
      } else {
        result.failed++;
      }
    }

    logger.info({ ...result, day: today }, 'Deadline reminders processed');
    return result;
  }
}
