import { describe, it, expect, vi } from 'vitest';
import { ParseError, PersistenceError, StoreLockedError } from '../types/index.js';
import { FlakyByteStore, createTestConfig } from '../../tests/helpers/fakes.js';
import { MemoryByteStore } from './byte-store.js';
import { FileByteStore } from './file-byte-store.js';
import {
  Snapshot,
  SnapshotStore,
  createByteStore,
  decodeSnapshot,
  emptySnapshot,
  encodeSnapshot,
} from './snapshot-store.js';

function sampleSnapshot(): Snapshot {
  return {
    tasks: [
      {
        id: 'a1',
        resource: 'https://example.com/notices',
        interval: 300,
        enabled: true,
        mode: 'list',
        list: { itemSelector: 'li a', keywords: ['grant'] },
        destination: 'telegram:42',
        lastFingerprint: { digest: 'abc123', summary: '2 item(s); latest: Grant call' },
        lastCheckedAt: new Date('2025-03-01T08:05:00.000Z'),
        lastChangedAt: new Date('2025-03-01T08:00:00.000Z'),
        failureCount: 0,
        lastError: null,
        createdAt: new Date('2025-02-28T12:00:00.000Z'),
      },
      {
        id: 'b2',
        resource: 'https://example.com/page',
        interval: 600,
        enabled: false,
        mode: 'page',
        ignorePatterns: ['Visitors: \\d+'],
        destination: 'log:main',
        lastFingerprint: null,
        lastCheckedAt: null,
        lastChangedAt: null,
        failureCount: 2,
        lastError: 'HTTP 503',
        createdAt: new Date('2025-02-28T12:30:00.000Z'),
      },
    ],
    dedup: [{ id: 'https://example.com/n/1', firstSeen: new Date('2025-03-01T08:00:00.000Z') }],
    notices: [
      {
        id: 'a1:https://example.com/n/1',
        taskId: 'a1',
        title: 'Grant call',
        url: 'https://example.com/n/1',
        startDate: '2025-03-01',
        endDate: '2025-03-20',
        lastRemindedOn: null,
        createdAt: new Date('2025-03-01T08:00:00.000Z'),
      },
    ],
  };
}

describe('snapshot encoding', () => {
  it('should round-trip every field', () => {
    const snapshot = sampleSnapshot();

    expect(decodeSnapshot(encodeSnapshot(snapshot))).toEqual(snapshot);
  });

  it('should key tasks by id with the stored field names', () => {
    const json = JSON.parse(encodeSnapshot(sampleSnapshot()));

    expect(json.version).toBe(1);
    expect(Object.keys(json.tasks)).toEqual(['a1', 'b2']);
    expect(json.tasks.a1).toMatchObject({
      destinationRef: 'telegram:42',
      lastCheck: '2025-03-01T08:05:00.000Z',
      lastFingerprint: { digest: 'abc123' },
    });
  });

  it('should fill defaults for fields older snapshots lack', () => {
    const text = JSON.stringify({
      version: 1,
      tasks: {
        t1: {
          resource: 'https://example.com/',
          interval: 120,
          enabled: true,
          lastFingerprint: null,
          lastCheck: null,
          failureCount: 0,
          destinationRef: 'log:main',
          createdAt: '2025-03-01T00:00:00.000Z',
        },
      },
      dedup: [],
    });

    const snapshot = decodeSnapshot(text);

    expect(snapshot.notices).toEqual([]);
    expect(snapshot.tasks[0]).toMatchObject({ id: 't1', mode: 'page', lastChangedAt: null, lastError: null });
  });

  it('should reject malformed snapshots', () => {
    expect(() => decodeSnapshot('{"version": 1, "tasks": ')).toThrow(ParseError);
    expect(() => decodeSnapshot('{"version": 2, "tasks": {}, "dedup": []}')).toThrow(
      'Snapshot does not match the expected layout'
    );
  });
});

describe('SnapshotStore', () => {
  it('should start empty when nothing is stored', async () => {
    const store = new SnapshotStore(new MemoryByteStore());

    await expect(store.load()).resolves.toEqual(emptySnapshot());
  });

  it('should load what it saved', async () => {
    const store = new SnapshotStore(new MemoryByteStore(), 'state');
    const snapshot = sampleSnapshot();

    await store.save(snapshot);

    await expect(store.load()).resolves.toEqual(snapshot);
  });

  it('should report corrupt snapshots as persistence errors', async () => {
    const bytes = new MemoryByteStore();
    await bytes.put('snapshot', 'not json');
    const store = new SnapshotStore(bytes);

    await expect(store.load()).rejects.toThrow('Failed to decode snapshot: Snapshot is not valid JSON');
  });

  it('should keep the previous snapshot when a write fails', async () => {
    const bytes = new FlakyByteStore();
    const store = new SnapshotStore(bytes);
    const before = sampleSnapshot();
    await store.save(before);

    bytes.failPuts = 1;
    const after = { ...before, dedup: [] };
    await expect(store.save(after)).rejects.toBeInstanceOf(PersistenceError);

    await expect(store.load()).resolves.toEqual(before);

    await store.save(after);
    await expect(store.load()).resolves.toEqual(after);
  });

  it('should encode at call time', async () => {
    const store = new SnapshotStore(new MemoryByteStore());
    const snapshot = sampleSnapshot();

    const pending = store.save(snapshot);
    snapshot.tasks[0].interval = 999;
    await pending;

    const loaded = await store.load();
    expect(loaded.tasks[0].interval).toBe(300);
  });

  it('should run one write at a time in call order', async () => {
    class GatedStore extends MemoryByteStore {
      readonly started: string[] = [];
      readonly gates: Array<() => void> = [];

      async put(key: string, value: string): Promise<void> {
        this.started.push(value);
        await new Promise<void>((resolve) => this.gates.push(resolve));
        await super.put(key, value);
      }
    }
    const bytes = new GatedStore();
    const store = new SnapshotStore(bytes);
    const first = sampleSnapshot();
    const second = { ...first, notices: [] };

    const firstSave = store.save(first);
    const secondSave = store.save(second);
    await vi.waitFor(() => expect(bytes.started).toHaveLength(1));
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(bytes.started).toHaveLength(1);

    bytes.gates[0]();
    await firstSave;
    await vi.waitFor(() => expect(bytes.started).toHaveLength(2));
    bytes.gates[1]();
    await secondSave;

    await expect(store.load()).resolves.toEqual(second);
  });

  it('should close the underlying store after pending writes', async () => {
    const bytes = new MemoryByteStore();
    const close = vi.fn(async () => undefined);
    const store = new SnapshotStore(Object.assign(bytes, { close }));

    const pending = store.save(sampleSnapshot());
    await store.close();

    await pending;
    expect(close).toHaveBeenCalledTimes(1);
    expect(await bytes.get('snapshot')).not.toBeNull();
  });

  it('should allow one writer at a time and release the lock on close', async () => {
    const bytes = new MemoryByteStore();
    const daemon = new SnapshotStore(bytes);
    const cli = new SnapshotStore(bytes);

    await Promise.all([daemon.acquire(), daemon.acquire()]);
    await expect(cli.acquire()).rejects.toBeInstanceOf(StoreLockedError);
    await expect(cli.load()).resolves.toEqual(emptySnapshot());

    await daemon.close();
    await expect(cli.acquire()).resolves.toBeUndefined();
  });
});

describe('createByteStore', () => {
  it('should pick the store for the configured driver', () => {
    expect(createByteStore(createTestConfig())).toBeInstanceOf(MemoryByteStore);
    expect(createByteStore(createTestConfig({ storage: { driver: 'file' } }))).toBeInstanceOf(FileByteStore);
  });
});
