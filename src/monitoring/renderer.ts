import puppeteer, { Browser } from 'puppeteer-core';
import { Config, ConfigError, NetworkError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { RenderedFetcher } from './types.js';

const logger = createChildLogger('renderer');

/**
 * Loads pages in a locally installed Chromium so script-driven challenges
 * can complete. The browser is launched on first use and reused; calls
 * that arrive during the launch wait for it.
 */
export class PuppeteerRenderer implements RenderedFetcher {
  private launching: Promise<Browser> | null = null;

  constructor(
    private config: Config['renderer'],
    private userAgent: string,
    private timeoutMs: number
  ) {}

  async fetchRendered(url: string): Promise<string> {
    const browser = await this.getBrowser();
    const page = await browser.newPage();

    try {
      await page.setUserAgent(this.userAgent);
      await page.setViewport({ width: 1200, height: 800 });
      await page.goto(url, { waitUntil: 'networkidle2', timeout: this.timeoutMs });

      if (this.config.waitMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.config.waitMs));
      }

      const html = await page.content();
      logger.debug({ url, contentLength: html.length }, 'Rendered page');
      return html;
    } catch (error) {
      throw new NetworkError(`Rendering ${url} failed: ${errorMessage(error)}`, { url });
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    const launching = this.launching;
    this.launching = null;
    if (!launching) {
      return;
    }
    const [launch] = await Promise.allSettled([launching]);
    if (launch.status === 'fulfilled') {
      await launch.value.close();
    }
  }

  private getBrowser(): Promise<Browser> {
    if (this.launching) {
      return this.launching;
    }
    if (!this.config.executablePath) {
      return Promise.reject(new ConfigError('RENDERER_EXECUTABLE_PATH is required when the renderer is enabled'));
    }

    logger.info({ executablePath: this.config.executablePath }, 'Launching browser');
    const launching = puppeteer
      .launch({
        executablePath: this.config.executablePath,
        headless: true,
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
      })
      .catch((error: unknown) => {
        // A failed launch is retried by the next call
        if (this.launching === launching) {
          this.launching = null;
        }
        throw error;
      });
    this.launching = launching;
    return launching;
  }
}
