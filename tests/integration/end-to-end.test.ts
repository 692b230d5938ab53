/**
 * Monitor end-to-end: scheduler ticks drive the full pipeline against
 * scripted responses, with state persisted through a real snapshot store.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TimeoutError } from '../../src/types/index.js';
import { MonitorService } from '../../src/monitoring/monitor-service.js';
import { Notifier } from '../../src/monitoring/notifier.js';
import { MemoryByteStore } from '../../src/persistence/byte-store.js';
import { SnapshotStore } from '../../src/persistence/snapshot-store.js';
import { sha256 } from '../../src/utils/hash.js';
import {
  FakeRawFetcher,
  FlakyByteStore,
  ManualClock,
  RecordingTransport,
  createTestConfig,
  deferred,
  noSleep,
  page,
} from '../helpers/fakes.js';
import { RawResponse } from '../../src/monitoring/types.js';

const RESOURCE = 'https://example.com/exams';

describe('periodic page monitoring', () => {
  let raw: FakeRawFetcher;
  let transport: RecordingTransport;
  let clock: ManualClock;
  let service: MonitorService;

  beforeEach(async () => {
    raw = new FakeRawFetcher();
    transport = new RecordingTransport('log');
    clock = new ManualClock(new Date('2025-03-01T00:00:00.000Z'));
    service = new MonitorService(createTestConfig(), {
      store: new SnapshotStore(new MemoryByteStore()),
      notifier: new Notifier([transport]),
      rawFetcher: raw,
      sleep: noSleep,
      clock: clock.now,
      generateId: () => 'T',
    });
    await service.load();
  });

  it('should baseline, skip unchanged, notify a change and survive a timeout', async () => {
    const v1 = page('Exams', '<p>Registration opens 3 March</p><script>var now = 1;</script>');
    const v1Again = page('Exams', '<p>Registration opens 3 March</p><script>var now = 2;</script>');
    const v2 = page('Exams', '<p>Registration opens 10 March</p>');
    raw.respond(RESOURCE, { status: 200, body: v1 }, { status: 200, body: v1Again }, { status: 200, body: v2 });

    const id = await service.add(RESOURCE, 300, 'log:exams');

    // t=0: baseline
    const t0 = await service.tick(clock.now());
    const f0 = service.get(id).lastFingerprint;
    expect(t0.results.map((r) => r.outcome)).toEqual(['baseline']);
    expect(f0?.digest).toBe(sha256('Exams Registration opens 3 March'));
    expect(transport.deliveries).toEqual([]);

    // not due again until the interval has passed
    clock.advance(299);
    expect((await service.tick(clock.now())).started).toEqual([]);

    // t=300: same normalized content
    clock.advance(1);
    const t300 = await service.tick(clock.now());
    expect(t300.results.map((r) => r.outcome)).toEqual(['unchanged']);
    expect(service.get(id).lastFingerprint).toEqual(f0);
    expect(transport.deliveries).toEqual([]);

    // t=600: content changed
    clock.advance(300);
    const t600 = await service.tick(clock.now());
    const f1 = service.get(id).lastFingerprint;
    expect(t600.results.map((r) => r.outcome)).toEqual(['changed']);
    expect(f1?.digest).toBe(sha256('Exams Registration opens 10 March'));
    expect(transport.deliveries).toEqual([
      { target: 'exams', message: 'Change detected: https://example.com/exams\nExams\nRegistration opens 10 March' },
    ]);

    // t=900: timeout on every attempt
    raw.set(RESOURCE, new TimeoutError('Fetch timed out'));
    clock.advance(300);
    const t900 = await service.tick(clock.now());
    expect(t900.results[0]).toMatchObject({ outcome: 'failed', error: 'Fetch timed out' });
    expect(raw.callsTo(RESOURCE)).toBe(3 + 3);
    expect(service.get(id)).toMatchObject({ failureCount: 1, status: 'failing', lastFingerprint: f1 });
    expect(transport.deliveries).toHaveLength(1);
  });

  it('should run one pipeline for overlapping ticks', async () => {
    const gate = deferred<RawResponse>();
    raw.respond(RESOURCE, () => gate.promise);
    await service.add(RESOURCE, 300, 'log:exams');

    const first = service.tick(clock.now());
    await vi.waitFor(() => expect(raw.callsTo(RESOURCE)).toBe(1));
    const second = await service.tick(clock.now());
    gate.resolve({ status: 200, body: page('Exams', '<p>v1</p>') });
    const firstReport = await first;

    expect(second).toMatchObject({ started: [], skipped: ['T'] });
    expect(firstReport.results.map((r) => r.outcome)).toEqual(['baseline']);
    expect(raw.callsTo(RESOURCE)).toBe(1);
  });
});

describe('list monitoring across restarts', () => {
  it('should not repeat notifications after a restart', async () => {
    const bytes = new MemoryByteStore();
    const raw = new FakeRawFetcher();
    const transport = new RecordingTransport('log');
    const clock = new ManualClock(new Date('2025-03-01T00:00:00.000Z'));
    const listing = (...ids: number[]) =>
      page('Notices', `<ul>${ids.map((n) => `<li><a href="/n/${n}">Notice ${n}</a></li>`).join('')}</ul>`);
    const boot = async (): Promise<MonitorService> => {
      const service = new MonitorService(createTestConfig(), {
        store: new SnapshotStore(bytes),
        notifier: new Notifier([transport]),
        rawFetcher: raw,
        sleep: noSleep,
        clock: clock.now,
        generateId: () => 'L',
      });
      await service.load();
      return service;
    };
    raw.respond('https://example.com/notices', { status: 200, body: listing(1) }, { status: 200, body: listing(2, 1) });

    const before = await boot();
    await before.add('https://example.com/notices', 60, 'log:main', { mode: 'list', list: { itemSelector: 'li' } });
    await before.tick(clock.now());
    clock.advance(60);
    await before.tick(clock.now());
    await before.stop();

    const after = await boot();
    clock.advance(60);
    const report = await after.tick(clock.now());

    expect(report.results.map((r) => r.outcome)).toEqual(['unchanged']);
    expect(transport.headlines()).toEqual(['New item: Notice 2']);
    expect(after.getStatus().dedupEntries).toBe(2);
  });

  it('should recover unsaved state on the next tick after a failed write', async () => {
    const bytes = new FlakyByteStore();
    const raw = new FakeRawFetcher();
    const clock = new ManualClock(new Date('2025-03-01T00:00:00.000Z'));
    const service = new MonitorService(createTestConfig(), {
      store: new SnapshotStore(bytes),
      notifier: new Notifier([new RecordingTransport('log')]),
      rawFetcher: raw,
      sleep: noSleep,
      clock: clock.now,
      generateId: () => 'P',
    });
    await service.load();
    raw.respond('https://example.com/page', { status: 200, body: page('Page', '<p>v1</p>') });
    await service.add('https://example.com/page', 60, 'log:main');

    bytes.failPuts = 1;
    const baseline = await service.tick(clock.now());
    expect(baseline.results[0]).toMatchObject({ outcome: 'baseline', committed: false });
    expect(service.getStatus().pendingCommit).toBe(true);

    clock.advance(10);
    await service.tick(clock.now());
    expect(service.getStatus().pendingCommit).toBe(false);

    const reloaded = await new SnapshotStore(bytes).load();
    expect(reloaded.tasks[0].lastFingerprint).toEqual(service.get('P').lastFingerprint);
  });
});
