import { z } from 'zod';
import { Config, ParseError, PersistenceError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { DedupEntry, MonitorTask, Notice } from '../monitoring/types.js';
import { ByteStore, MemoryByteStore, Unlock } from './byte-store.js';
import { FileByteStore } from './file-byte-store.js';
import { PostgresByteStore } from './postgres-byte-store.js';

const logger = createChildLogger('snapshot-store');

export const SNAPSHOT_VERSION = 1;

/**
 * Everything that survives a restart
 */
export interface Snapshot {
  tasks: MonitorTask[];
  dedup: DedupEntry[];
  notices: Notice[];
}

export function emptySnapshot(): Snapshot {
  return { tasks: [], dedup: [], notices: [] };
}

// ============================================================
// Wire format
// ============================================================

const IsoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const FingerprintSchema = z.object({
  digest: z.string().min(1),
  summary: z.string().optional(),
});

const TaskRecordSchema = z.object({
  resource: z.string().url(),
  interval: z.number().int().positive(),
  enabled: z.boolean(),
  mode: z.enum(['page', 'list']).default('page'),
  list: z
    .object({
      itemSelector: z.string().min(1),
      keywords: z.array(z.string()).optional(),
    })
    .optional(),
  ignorePatterns: z.array(z.string()).optional(),
  lastFingerprint: FingerprintSchema.nullable(),
  lastCheck: IsoDateSchema.nullable(),
  lastChange: IsoDateSchema.nullable().default(null),
  failureCount: z.number().int().nonnegative(),
  lastError: z.string().nullable().default(null),
  destinationRef: z.string().min(1),
  createdAt: IsoDateSchema,
});

const NoticeSchema = z.object({
  id: z.string(),
  taskId: z.string(),
  title: z.string(),
  url: z.string(),
  startDate: z.string().nullable(),
  endDate: z.string().nullable(),
  anomaly: z.enum(['start_equals_end', 'end_before_start']).optional(),
  lastRemindedOn: z.string().nullable().default(null),
  createdAt: IsoDateSchema,
});

const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  tasks: z.record(TaskRecordSchema),
  dedup: z.array(z.object({ id: z.string(), firstSeen: IsoDateSchema })),
  notices: z.array(NoticeSchema).default([]),
});

type TaskRecord = z.input<typeof TaskRecordSchema>;

function toRecord(task: MonitorTask): TaskRecord {
  return {
    resource: task.resource,
    interval: task.interval,
    enabled: task.enabled,
    mode: task.mode,
    ...(task.list ? { list: task.list } : {}),
    ...(task.ignorePatterns ? { ignorePatterns: task.ignorePatterns } : {}),
    lastFingerprint: task.lastFingerprint,
    lastCheck: task.lastCheckedAt?.toISOString() ?? null,
    lastChange: task.lastChangedAt?.toISOString() ?? null,
    failureCount: task.failureCount,
    lastError: task.lastError,
    destinationRef: task.destination,
    createdAt: task.createdAt.toISOString(),
  };
}

export function encodeSnapshot(snapshot: Snapshot): string {
  const tasks: Record<string, TaskRecord> = {};
  for (const task of snapshot.tasks) {
    tasks[task.id] = toRecord(task);
  }

  return JSON.stringify(
    {
      version: SNAPSHOT_VERSION,
      tasks,
      dedup: snapshot.dedup.map((entry) => ({ id: entry.id, firstSeen: entry.firstSeen.toISOString() })),
      notices: snapshot.notices.map((notice) => ({ ...notice, createdAt: notice.createdAt.toISOString() })),
    },
    null,
    2
  );
}

export function decodeSnapshot(text: string): Snapshot {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParseError('Snapshot is not valid JSON', error);
  }

  const parsed = SnapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError('Snapshot does not match the expected layout', { issues: parsed.error.issues });
  }

  const tasks: MonitorTask[] = Object.entries(parsed.data.tasks).map(([id, record]) => ({
    id,
    resource: record.resource,
    interval: record.interval,
    enabled: record.enabled,
    mode: record.mode,
    ...(record.list ? { list: record.list } : {}),
    ...(record.ignorePatterns ? { ignorePatterns: record.ignorePatterns } : {}),
    destination: record.destinationRef,
    lastFingerprint: record.lastFingerprint,
    lastCheckedAt: record.lastCheck,
    lastChangedAt: record.lastChange,
    failureCount: record.failureCount,
    lastError: record.lastError,
    createdAt: record.createdAt,
  }));

  return { tasks, dedup: parsed.data.dedup, notices: parsed.data.notices };
}

// ============================================================
// Store
// ============================================================

/**
 * Loads and saves the whole snapshot under one key. Saves are serialized:
 * one write is in flight at a time and later saves queue behind it.
 */
export class SnapshotStore {
  private queue: Promise<void> = Promise.resolve();
  private unlock: Unlock | null = null;
  private locking: Promise<void> | null = null;

  constructor(
    private store: ByteStore,
    private key: string = 'snapshot'
  ) {}

  /**
   * Become the only writer of this snapshot until `close()`. Concurrent
   * calls share one attempt; a failed attempt can be retried.
   */
  async acquire(): Promise<void> {
    this.locking ??= this.store.lock(this.key).then(
      (unlock) => {
        this.unlock = unlock;
      },
      (error: unknown) => {
        this.locking = null;
        throw error;
      }
    );
    await this.locking;
  }

  async load(): Promise<Snapshot> {
    let text: string | null;
    try {
      text = await this.store.get(this.key);
    } catch (error) {
      throw this.wrap('Failed to read snapshot', error);
    }

    if (text === null) {
      logger.info({ key: this.key }, 'No snapshot found, starting empty');
      return emptySnapshot();
    }

    try {
      const snapshot = decodeSnapshot(text);
      logger.info(
        { key: this.key, tasks: snapshot.tasks.length, dedup: snapshot.dedup.length },
        'Snapshot loaded'
      );
      return snapshot;
    } catch (error) {
      throw this.wrap('Failed to decode snapshot', error);
    }
  }

  /**
   * Encodes immediately, so the write reflects state at call time
   */
  save(snapshot: Snapshot): Promise<void> {
    const text = encodeSnapshot(snapshot);
    const write = this.queue.then(() => this.store.put(this.key, text));
    // Later saves run even after a failed write; this caller gets the error
    this.queue = write.then(
      () => undefined,
      () => undefined
    );
    return write.catch((error: unknown) => {
      logger.error({ key: this.key, error: errorMessage(error) }, 'Snapshot write failed');
      throw this.wrap('Failed to write snapshot', error);
    });
  }

  async close(): Promise<void> {
    await this.queue;
    await Promise.allSettled([this.locking]);
    this.locking = null;
    if (this.unlock) {
      const unlock = this.unlock;
      this.unlock = null;
      await unlock();
    }
    await this.store.close?.();
  }

  private wrap(message: string, error: unknown): PersistenceError {
    if (error instanceof PersistenceError) {
      return error;
    }
    return new PersistenceError(`${message}: ${errorMessage(error)}`, error);
  }
}

/**
 * Byte store selected by STORAGE_DRIVER
 */
export function createByteStore(config: Config): ByteStore {
  switch (config.storage.driver) {
    case 'postgres':
      return new PostgresByteStore(config.postgres);
    case 'memory':
      return new MemoryByteStore();
    case 'file':
      return new FileByteStore(config.storage.dataDir);
  }
}

export function createSnapshotStore(config: Config): SnapshotStore {
  return new SnapshotStore(createByteStore(config), config.storage.snapshotKey);
}
