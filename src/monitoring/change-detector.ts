import * as cheerio from 'cheerio';
import { Config, ParseError } from '../types/index.js';
import { sha256 } from '../utils/hash.js';
import { sanitizeText } from '../utils/text-sanitizer.js';
import { createChildLogger } from '../utils/logger.js';
import {
  buildNormalizationRules,
  normalizeContent,
  summarizeContent,
  NormalizationRules,
} from './normalizer.js';
import { DetectionResult, Fingerprint, ListItem, ListOptions, MonitorTask } from './types.js';

const logger = createChildLogger('change-detector');

export const DEFAULT_ITEM_SELECTOR = 'a[href]';

type DetectableTask = Pick<MonitorTask, 'id' | 'resource' | 'lastFingerprint' | 'ignorePatterns' | 'list'>;

/**
 * Computes fingerprints of fetched content and classifies it against the
 * task's stored fingerprint. Throws ConfigError on construction when the
 * configured presets or patterns are invalid.
 */
export class ChangeDetector {
  private readonly baseRules: NormalizationRules;

  constructor(private config: Config['normalize']) {
    this.baseRules = buildNormalizationRules(config);
  }

  /**
   * Normalization rules for a task: configured rules plus its own patterns
   */
  rulesFor(task: Pick<MonitorTask, 'ignorePatterns'>): NormalizationRules {
    if (!task.ignorePatterns || task.ignorePatterns.length === 0) {
      return this.baseRules;
    }
    return buildNormalizationRules(this.config, task.ignorePatterns);
  }

  /**
   * Fingerprint of content under the given rules
   */
  fingerprint(content: string, rules: NormalizationRules): Fingerprint {
    return {
      digest: sha256(normalizeContent(content, rules)),
      summary: summarizeContent(content, rules),
    };
  }

  /**
   * Whole-resource detection. Does not mutate the task.
   */
  detect(task: DetectableTask, content: string): DetectionResult {
    const rules = this.rulesFor(task);
    const fingerprint = this.fingerprint(content, rules);
    const previous = task.lastFingerprint;

    if (!previous) {
      logger.debug({ taskId: task.id, digest: fingerprint.digest }, 'Baseline fingerprint');
      return { kind: 'baseline', fingerprint };
    }

    if (previous.digest === fingerprint.digest) {
      return { kind: 'unchanged', fingerprint };
    }

    return {
      kind: 'changed',
      fingerprint,
      previous,
      summary: fingerprint.summary ?? '',
    };
  }

  /**
   * List detection: enumerate items in listing order. Novelty is decided by
   * the dedup store, not here.
   */
  detectItems(task: DetectableTask, content: string): { fingerprint: Fingerprint; items: ListItem[] } {
    const options: ListOptions = task.list ?? { itemSelector: DEFAULT_ITEM_SELECTOR };
    const items = this.extractItems(content, task.resource, options);

    if (items.length === 0) {
      throw new ParseError(`No items matched selector "${options.itemSelector}"`, {
        taskId: task.id,
        resource: task.resource,
      });
    }

    const digest = sha256(items.map((item) => `${item.id}\t${item.title}`).join('\n'));
    return {
      fingerprint: { digest, summary: `${items.length} item(s); latest: ${items[0].title}` },
      items,
    };
  }

  /**
   * Extract items from a list page. Each item is identified by its absolute
   * link URL; duplicates keep their first position.
   */
  extractItems(content: string, baseUrl: string, options: ListOptions): ListItem[] {
    const $ = cheerio.load(content);
    const keywords = (options.keywords ?? []).map((k) => k.toLowerCase()).filter((k) => k.length > 0);
    const seen = new Set<string>();
    const items: ListItem[] = [];

    $(options.itemSelector).each((_, element) => {
      const node = $(element);
      const anchor = node.is('a[href]') ? node : node.find('a[href]').first();
      const href = anchor.attr('href')?.trim();
      if (!href || isNavigationHref(href)) {
        return;
      }

      const url = resolveUrl(href, baseUrl);
      if (!url || seen.has(url)) {
        return;
      }

      const title = sanitizeText(anchor.text()) || sanitizeText(anchor.attr('title') ?? '');
      if (!title) {
        return;
      }

      if (keywords.length > 0 && !keywords.some((k) => title.toLowerCase().includes(k))) {
        return;
      }

      const dateNode = node
        .find('time, span')
        .filter((_, el) => $(el).closest('a').length === 0)
        .first();
      const postedAt = sanitizeText(dateNode.text());

      seen.add(url);
      items.push({
        id: url,
        title,
        url,
        ...(postedAt ? { postedAt } : {}),
      });
    });

    logger.debug({ baseUrl, itemCount: items.length }, 'Extracted list items');
    return items;
  }
}

function isNavigationHref(href: string): boolean {
  const lower = href.toLowerCase();
  return lower.startsWith('#') || lower.startsWith('javascript:') || lower.startsWith('mailto:');
}

/**
 * Resolve a link against the page URL, dropping the fragment
 */
export function resolveUrl(href: string, baseUrl: string): string | undefined {
  try {
    const url = new URL(href, baseUrl);
    url.hash = '';
    return url.href;
  } catch {
    return undefined;
  }
}
