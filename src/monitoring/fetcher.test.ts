import { describe, it, expect, vi, beforeEach, Mock } from 'vitest';
import { BlockedError, CancelledError, HttpError, NetworkError, TimeoutError } from '../types/index.js';
import { FakeRawFetcher, createTestConfig } from '../../tests/helpers/fakes.js';
import { Fetcher, HttpRawFetcher, Sleep, abortableSleep, isRetryable } from './fetcher.js';
import { RenderedFetcher } from './types.js';

const URL_A = 'https://example.com/a';

describe('Fetcher', () => {
  const config = createTestConfig().fetch;
  let raw: FakeRawFetcher;
  let sleep: Mock<Sleep>;

  beforeEach(() => {
    raw = new FakeRawFetcher();
    sleep = vi.fn<Sleep>(async () => undefined);
  });

  function delays(): number[] {
    return sleep.mock.calls.map((call) => call[0]);
  }

  it('should return the body of a successful response', async () => {
    raw.respond(URL_A, { status: 200, body: '<p>ok</p>' });
    const fetcher = new Fetcher(raw, config, { sleep });

    await expect(fetcher.fetch(URL_A)).resolves.toBe('<p>ok</p>');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry server errors with backoff', async () => {
    raw.respond(URL_A, { status: 503, body: 'busy' }, { status: 200, body: 'ok' });
    const fetcher = new Fetcher(raw, config, { sleep });

    await expect(fetcher.fetch(URL_A)).resolves.toBe('ok');
    expect(raw.callsTo(URL_A)).toBe(2);
    expect(delays()).toEqual([10]);
  });

  it('should give up after the attempt budget', async () => {
    raw.respond(URL_A, { status: 500, body: 'boom' });
    const fetcher = new Fetcher(raw, config, { sleep });

    const error = await fetcher.fetch(URL_A).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 500 });
    expect(raw.callsTo(URL_A)).toBe(3);
    expect(delays()).toEqual([10, 20]);
  });

  it('should retry network failures', async () => {
    raw.respond(URL_A, new NetworkError('reset'), { status: 200, body: 'ok' });
    const fetcher = new Fetcher(raw, config, { sleep });

    await expect(fetcher.fetch(URL_A)).resolves.toBe('ok');
  });

  it('should not retry client errors', async () => {
    raw.respond(URL_A, { status: 404, body: 'missing' });
    const fetcher = new Fetcher(raw, config, { sleep });

    await expect(fetcher.fetch(URL_A)).rejects.toThrow('HTTP 404 for https://example.com/a');
    expect(raw.callsTo(URL_A)).toBe(1);
  });

  it('should treat 403 and 429 as blocked without retrying', async () => {
    raw.respond(URL_A, { status: 429, body: 'slow down' });
    const fetcher = new Fetcher(raw, config, { sleep });

    await expect(fetcher.fetch(URL_A)).rejects.toBeInstanceOf(BlockedError);
    expect(raw.callsTo(URL_A)).toBe(1);
  });

  it('should detect challenge markers in a 200 response', async () => {
    raw.respond(URL_A, { status: 200, body: '<script src="/dynamic_challenge.js"></script>' });
    const fetcher = new Fetcher(raw, config, { sleep });

    await expect(fetcher.fetch(URL_A)).rejects.toThrow('Challenge page served for https://example.com/a');
  });

  describe('rendered fallback', () => {
    it('should use the renderer after a challenge', async () => {
      raw.respond(URL_A, { status: 403, body: 'denied' });
      const renderer: RenderedFetcher = { fetchRendered: vi.fn(async () => '<p>real</p>') };
      const fetcher = new Fetcher(raw, config, { sleep, renderer });

      await expect(fetcher.fetch(URL_A)).resolves.toBe('<p>real</p>');
      expect(renderer.fetchRendered).toHaveBeenCalledWith(URL_A);
    });

    it('should stay blocked when rendering fails', async () => {
      raw.respond(URL_A, { status: 403, body: 'denied' });
      const renderer: RenderedFetcher = {
        fetchRendered: async () => {
          throw new Error('no browser');
        },
      };
      const fetcher = new Fetcher(raw, config, { sleep, renderer });

      const error = await fetcher.fetch(URL_A).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BlockedError);
      expect(error).toMatchObject({ details: { url: URL_A, renderError: 'no browser' } });
    });

    it('should stay blocked when the rendered page is still a challenge', async () => {
      raw.respond(URL_A, { status: 403, body: 'denied' });
      const renderer: RenderedFetcher = { fetchRendered: async () => 'dynamic_challenge' };
      const fetcher = new Fetcher(raw, config, { sleep, renderer });

      await expect(fetcher.fetch(URL_A)).rejects.toThrow('Challenge persists after rendering https://example.com/a');
    });

    it('should not render for other failures', async () => {
      raw.respond(URL_A, { status: 404, body: 'missing' });
      const renderer: RenderedFetcher = { fetchRendered: vi.fn(async () => 'unused') };
      const fetcher = new Fetcher(raw, config, { sleep, renderer });

      await expect(fetcher.fetch(URL_A)).rejects.toBeInstanceOf(HttpError);
      expect(renderer.fetchRendered).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    it('should stop retrying once the signal is aborted', async () => {
      const controller = new AbortController();
      raw.respond(URL_A, async () => {
        controller.abort();
        return { status: 500, body: 'boom' };
      });
      const fetcher = new Fetcher(raw, config, { sleep });

      await expect(fetcher.fetch(URL_A, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
      expect(raw.callsTo(URL_A)).toBe(1);
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('backoffFor', () => {
    it('should repeat the last delay past the end of the schedule', () => {
      const fetcher = new Fetcher(raw, config);

      expect([1, 2, 3, 7].map((attempt) => fetcher.backoffFor(attempt))).toEqual([10, 20, 20, 20]);
    });

    it('should not wait with an empty schedule', () => {
      const fetcher = new Fetcher(raw, { ...config, backoffMs: [] });

      expect(fetcher.backoffFor(1)).toBe(0);
    });
  });
});

describe('isRetryable', () => {
  it('should retry transient failures only', () => {
    expect(isRetryable(new TimeoutError('slow'))).toBe(true);
    expect(isRetryable(new NetworkError('reset'))).toBe(true);
    expect(isRetryable(new HttpError('HTTP 502', 502))).toBe(true);
    expect(isRetryable(new HttpError('HTTP 408', 408))).toBe(true);
    expect(isRetryable(new HttpError('HTTP 410', 410))).toBe(false);
    expect(isRetryable(new BlockedError('challenge'))).toBe(false);
    expect(isRetryable(new Error('other'))).toBe(false);
  });
});

describe('abortableSleep', () => {
  it('should resolve after the delay', async () => {
    await expect(abortableSleep(1)).resolves.toBeUndefined();
  });

  it('should reject when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableSleep(1000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });

  it('should reject when aborted while waiting', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(10000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('HttpRawFetcher', () => {
  const mockFetch = vi.fn();
  global.fetch = mockFetch;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return status, body and content type', async () => {
    mockFetch.mockResolvedValueOnce({
      status: 200,
      text: async () => '<p>hi</p>',
      headers: new Headers({ 'content-type': 'text/html; charset=utf-8' }),
    });
    const fetcher = new HttpRawFetcher('notice-watch-test');

    const response = await fetcher.fetchRaw(URL_A, { timeoutMs: 1000 });

    expect(response).toEqual({ status: 200, body: '<p>hi</p>', contentType: 'text/html; charset=utf-8' });
    expect(mockFetch).toHaveBeenCalledWith(
      URL_A,
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({ 'User-Agent': 'notice-watch-test' }),
      })
    );
  });

  it('should map transport failures to NetworkError', async () => {
    mockFetch.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const fetcher = new HttpRawFetcher('notice-watch-test');

    await expect(fetcher.fetchRaw(URL_A, { timeoutMs: 1000 })).rejects.toThrow(
      'Fetch of https://example.com/a failed: ECONNREFUSED'
    );
  });

  it('should map an expired timeout to TimeoutError', async () => {
    mockFetch.mockImplementationOnce(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const fetcher = new HttpRawFetcher('notice-watch-test');

    await expect(fetcher.fetchRaw(URL_A, { timeoutMs: 5 })).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should refuse to start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = new HttpRawFetcher('notice-watch-test');

    await expect(fetcher.fetchRaw(URL_A, { timeoutMs: 1000, signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
