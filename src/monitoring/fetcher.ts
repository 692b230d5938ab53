import {
  BlockedError,
  CancelledError,
  Config,
  HttpError,
  NetworkError,
  TimeoutError,
  errorMessage,
} from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { RawFetcher, RawFetchOptions, RawResponse, RenderedFetcher } from './types.js';

const logger = createChildLogger('fetcher');

/**
 * Bounded retry schedule. The delay before attempt n+1 is
 * `backoffMs[min(n - 1, backoffMs.length - 1)]`.
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number[];
}

export interface FetchOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface FetcherOptions {
  /** Headless-browser fallback tried once after a BlockedError */
  renderer?: RenderedFetcher;
  sleep?: Sleep;
}

/**
 * Resolve after `ms`, rejecting with CancelledError if the signal fires first
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new CancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Plain GET over the global fetch API
 */
export class HttpRawFetcher implements RawFetcher {
  constructor(private userAgent: string) {}

  async fetchRaw(url: string, options: RawFetchOptions): Promise<RawResponse> {
    const { timeoutMs, signal } = options;
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        redirect: 'follow',
        signal: controller.signal,
      });
      const body = await response.text();
      const contentType = response.headers.get('content-type') ?? undefined;
      return { status: response.status, body, ...(contentType ? { contentType } : {}) };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Fetch of ${url} cancelled`);
      }
      if (timedOut) {
        throw new TimeoutError(`Fetch of ${url} timed out after ${timeoutMs}ms`, { url, timeoutMs });
      }
      throw new NetworkError(`Fetch of ${url} failed: ${errorMessage(error)}`, { url });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Whether a failed attempt may be repeated
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError || error instanceof NetworkError) {
    return true;
  }
  if (error instanceof HttpError) {
    return error.status >= 500 || error.status === 408;
  }
  return false;
}

/**
 * Retrieves resource content with bounded retries, challenge detection and
 * an optional rendered fallback
 */
export class Fetcher {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly renderer: RenderedFetcher | undefined;

  constructor(
    private raw: RawFetcher,
    private config: Config['fetch'],
    options: FetcherOptions = {}
  ) {
    this.policy = { maxAttempts: Math.max(1, config.maxAttempts), backoffMs: config.backoffMs };
    this.sleep = options.sleep ?? abortableSleep;
    this.renderer = options.renderer;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    try {
      return await this.fetchWithRetry(url, options);
    } catch (error) {
      if (error instanceof BlockedError && this.renderer) {
        return this.fetchRendered(this.renderer, url, error, options.signal);
      }
      throw error;
    }
  }

  /**
   * Delay before the attempt following attempt `attempt` (1-based)
   */
  backoffFor(attempt: number): number {
    const schedule = this.policy.backoffMs;
    if (schedule.length === 0) {
      return 0;
    }
    return schedule[Math.min(attempt - 1, schedule.length - 1)];
  }

  private async fetchWithRetry(url: string, options: FetchOptions): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;

    for (let attempt = 1; ; attempt++) {
      try {
        logger.debug({ url, attempt }, 'Fetching URL');
        const response = await this.raw.fetchRaw(url, { timeoutMs, signal: options.signal });
        const content = this.checkResponse(url, response);
        logger.debug({ url, status: response.status, contentLength: content.length }, 'Fetch successful');
        return content;
      } catch (error) {
        if (options.signal?.aborted) {
          throw error instanceof CancelledError ? error : new CancelledError(`Fetch of ${url} cancelled`);
        }
        if (!isRetryable(error) || attempt >= this.policy.maxAttempts) {
          throw error;
        }
        const delay = this.backoffFor(attempt);
        logger.warn({ url, attempt, delay, error: errorMessage(error) }, 'Fetch attempt failed');
        await this.sleep(delay, options.signal);
      }
    }
  }

  private checkResponse(url: string, response: RawResponse): string {
    if (response.status === 403 || response.status === 429) {
      throw new BlockedError(`Access to ${url} blocked with HTTP ${response.status}`, {
        url,
        status: response.status,
      });
    }

    const marker = this.findChallengeMarker(response.body);
    if (marker) {
      throw new BlockedError(`Challenge page served for ${url}`, { url, status: response.status, marker });
    }

    if (response.status >= 400) {
      throw new HttpError(`HTTP ${response.status} for ${url}`, response.status, { url });
    }

    return response.body;
  }

  private findChallengeMarker(body: string): string | undefined {
    return this.config.blockedMarkers.find((marker) => marker.length > 0 && body.includes(marker));
  }

  private async fetchRendered(
    renderer: RenderedFetcher,
    url: string,
    blocked: BlockedError,
    signal: AbortSignal | undefined
  ): Promise<string> {
    logger.info({ url }, 'Blocked by challenge, trying rendered fetch');

    let html: string;
    try {
      html = await renderer.fetchRendered(url);
    } catch (error) {
      logger.warn({ url, error: errorMessage(error) }, 'Rendered fetch failed');
      throw new BlockedError(blocked.message, { url, renderError: errorMessage(error) });
    }

    if (signal?.aborted) {
      throw new CancelledError(`Fetch of ${url} cancelled`);
    }

    const marker = this.findChallengeMarker(html);
    if (marker) {
      throw new BlockedError(`Challenge persists after rendering ${url}`, { url, marker });
    }
    return html;
  }
}
