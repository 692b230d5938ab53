import { CancelledError, Config, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { ChangeDetector } from './change-detector.js';
import { DedupStore, dedupKey } from './dedup-store.js';
import { Fetcher } from './fetcher.js';
import { extractTextFromHtml } from './normalizer.js';
import { Notifier } from './notifier.js';
import { NoticeBook } from './reminders.js';
import { TaskRegistry } from './task-registry.js';
import {
  CheckOutcome,
  CheckResult,
  Classification,
  Classifier,
  Fingerprint,
  ListItem,
  MonitorTask,
  NotificationEvent,
} from './types.js';

const logger = createChildLogger('task-pipeline');

/**
 * Settle with CancelledError as soon as the signal aborts, even when the
 * wrapped call ignores it
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export interface TaskPipelineDeps {
  registry: TaskRegistry;
  detector: ChangeDetector;
  dedup: DedupStore;
  fetcher: Fetcher;
  notifier: Notifier;
  notices: NoticeBook;
  classifier?: Classifier;
  /** Persist current state; resolves false when the write failed */
  commit: () => Promise<boolean>;
  clock?: () => Date;
}

export interface TaskPipelineOptions {
  dedupScope: Config['monitor']['dedupScope'];
  /** Mark irrelevant items seen without notifying */
  suppressIrrelevant: boolean;
  degradedThreshold: number;
}

interface Mutation {
  outcome: CheckOutcome;
  fingerprint: Fingerprint;
  changed: boolean;
  events: NotificationEvent[];
  seenKeys: string[];
  classified: Array<{ item: ListItem; classification: Classification }>;
}

/**
 * One poll cycle for one task: fetch, detect, dedup, commit, notify.
 *
 * Everything that awaits happens before state is touched. If the run is
 * aborted or the task disappears meanwhile, nothing is mutated. State is
 * committed before any notification is attempted.
 */
export class TaskPipeline {
  private readonly clock: () => Date;

  constructor(
    private deps: TaskPipelineDeps,
    private options: TaskPipelineOptions
  ) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(taskId: string, signal: AbortSignal): Promise<CheckResult> {
    const task = this.deps.registry.require(taskId);
    const startedAt = this.clock();
    const log = logger.child({ taskId, resource: task.resource });

    let mutation: Mutation;
    const reserved: string[] = [];
    try {
      const content = await this.deps.fetcher.fetch(task.resource, { signal });
      this.ensureActive(taskId, signal);

      mutation =
        task.mode === 'list'
          ? await this.detectList(task, content, signal, reserved)
          : await this.detectPage(task, content, signal);
      this.ensureActive(taskId, signal);
    } catch (error) {
      this.deps.dedup.release(reserved);
      if (error instanceof CancelledError || signal.aborted || !this.deps.registry.has(taskId)) {
        log.info('Check cancelled');
        return this.result(taskId, 'cancelled', { checkedAt: startedAt, committed: true });
      }
      return this.fail(task, error, log);
    }

    const checkedAt = this.clock();
    for (const key of mutation.seenKeys) {
      this.deps.dedup.mark(key);
    }
    for (const { item, classification } of mutation.classified) {
      this.deps.notices.record(task, item, classification, checkedAt);
    }
    this.deps.registry.recordSuccess(taskId, mutation.fingerprint, checkedAt, mutation.changed);

    const committed = await this.deps.commit();

    let deliveryFailures = 0;
    for (const event of mutation.events) {
      const delivery = await this.deps.notifier.notify(event, task.destination);
      if (!delivery.ok) {
        deliveryFailures++;
        log.warn({ kind: event.kind, error: delivery.error.message }, 'Notification failed');
      }
    }

    log.info(
      {
        outcome: mutation.outcome,
        events: mutation.events.length,
        newItems: mutation.seenKeys.length,
        deliveryFailures,
      },
      'Check completed'
    );

    return this.result(taskId, mutation.outcome, {
      events: mutation.events,
      deliveryFailures,
      newItems: mutation.seenKeys.length,
      committed,
      checkedAt,
    });
  }

  private async detectPage(task: MonitorTask, content: string, signal: AbortSignal): Promise<Mutation> {
    const detection = this.deps.detector.detect(task, content);
    const base = { seenKeys: [], classified: [] };

    if (detection.kind !== 'changed') {
      return { ...base, outcome: detection.kind, fingerprint: detection.fingerprint, changed: false, events: [] };
    }

    const classification = await this.classify(task, content, signal);
    const event: NotificationEvent = {
      taskId: task.id,
      resource: task.resource,
      kind: 'changed',
      summary: detection.summary,
      ...(classification ? { classification } : {}),
      timestamp: this.clock(),
    };
    return { ...base, outcome: 'changed', fingerprint: detection.fingerprint, changed: true, events: [event] };
  }

  /**
   * New item keys are claimed before the first await and pushed to
   * `reserved`, so a concurrent run sharing an item skips it.
   */
  private async detectList(
    task: MonitorTask,
    content: string,
    signal: AbortSignal,
    reserved: string[]
  ): Promise<Mutation> {
    const { fingerprint, items } = this.deps.detector.detectItems(task, content);
    const keyed = new Map<string, ListItem>();
    for (const item of items) {
      keyed.set(dedupKey(this.options.dedupScope, task.id, item.id), item);
    }
    const freshKeys = this.deps.dedup.reserve([...keyed.keys()]);
    reserved.push(...freshKeys);

    if (!task.lastFingerprint) {
      return { outcome: 'baseline', fingerprint, changed: false, events: [], seenKeys: freshKeys, classified: [] };
    }

    const events: NotificationEvent[] = [];
    const classified: Mutation['classified'] = [];

    for (const key of freshKeys) {
      const item = keyed.get(key);
      if (!item) continue;

      const classification = await this.classifyItem(task, item, signal);
      if (classification) {
        classified.push({ item, classification });
        if (!classification.isRelevant && this.options.suppressIrrelevant) {
          logger.debug({ taskId: task.id, item: item.id }, 'Irrelevant item suppressed');
          continue;
        }
      }

      events.push({
        taskId: task.id,
        resource: task.resource,
        kind: 'new_item',
        summary: item.title,
        item,
        ...(classification ? { classification } : {}),
        timestamp: this.clock(),
      });
    }

    return {
      outcome: freshKeys.length > 0 ? 'changed' : 'unchanged',
      fingerprint,
      changed: freshKeys.length > 0,
      events,
      seenKeys: freshKeys,
      classified,
    };
  }

  /**
   * Classify the item's detail page, falling back to its title alone
   */
  private async classifyItem(
    task: MonitorTask,
    item: ListItem,
    signal: AbortSignal
  ): Promise<Classification | undefined> {
    if (!this.deps.classifier) {
      return undefined;
    }

    let detail = '';
    try {
      detail = await this.deps.fetcher.fetch(item.url, { signal });
    } catch (error) {
      if (signal.aborted) throw error;
      logger.warn({ taskId: task.id, url: item.url, error: errorMessage(error) }, 'Detail page fetch failed');
    }

    const text = detail ? `Title: ${item.title}\n${extractTextFromHtml(detail)}` : `Title: ${item.title}`;
    return this.runClassifier(task, text, signal);
  }

  private async classify(task: MonitorTask, content: string, signal: AbortSignal): Promise<Classification | undefined> {
    if (!this.deps.classifier) {
      return undefined;
    }
    return this.runClassifier(task, extractTextFromHtml(content), signal);
  }

  private async runClassifier(
    task: MonitorTask,
    text: string,
    signal: AbortSignal
  ): Promise<Classification | undefined> {
    if (!this.deps.classifier) {
      return undefined;
    }
    try {
      return await untilAborted(this.deps.classifier.classify(text, { signal }), signal);
    } catch (error) {
      if (signal.aborted) throw new CancelledError();
      logger.warn({ taskId: task.id, error: errorMessage(error) }, 'Classification failed, sending without it');
      return undefined;
    }
  }

  private async fail(task: MonitorTask, error: unknown, log: typeof logger): Promise<CheckResult> {
    const checkedAt = this.clock();
    const message = errorMessage(error);
    const failures = this.deps.registry.recordFailure(task.id, message, checkedAt);

    if (failures > this.options.degradedThreshold) {
      log.error({ failures, error: message }, 'Task degraded');
    } else {
      log.warn({ failures, error: message }, 'Check failed');
    }

    const committed = await this.deps.commit();
    return this.result(task.id, 'failed', { error: message, committed, checkedAt });
  }

  private ensureActive(taskId: string, signal: AbortSignal): void {
    if (signal.aborted || !this.deps.registry.has(taskId)) {
      throw new CancelledError();
    }
  }

  private result(
    taskId: string,
    outcome: CheckOutcome,
    fields: Partial<Omit<CheckResult, 'taskId' | 'outcome'>> & Pick<CheckResult, 'checkedAt' | 'committed'>
  ): CheckResult {
    return {
      taskId,
      outcome,
      events: [],
      deliveryFailures: 0,
      newItems: 0,
      ...fields,
    };
  }
}
