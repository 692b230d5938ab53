import { Config, ConfigError } from '../types/index.js';
import { sanitizeText, truncateText } from '../utils/text-sanitizer.js';

/**
 * A class of volatile content replaced by a fixed placeholder before
 * fingerprinting
 */
export interface VolatilePattern {
  name: string;
  pattern: RegExp;
  replacement: string;
}

/**
 * Deterministic normalization applied to fetched content before hashing.
 *
 * 1. HTML comments and every element in `stripElements` are removed
 * 2. With `textOnly`, remaining tags are dropped and entities decoded
 * 3. Each volatile pattern is replaced by its placeholder, in order
 * 4. The result is NFC-normalized and whitespace is collapsed
 */
export interface NormalizationRules {
  stripElements: string[];
  textOnly: boolean;
  volatile: VolatilePattern[];
}

/**
 * Named presets that can be enabled through configuration
 */
export const VOLATILE_PRESETS: Record<string, VolatilePattern> = {
  dates: {
    name: 'dates',
    pattern: /\b\d{4}-\d{2}-\d{2}\b/g,
    replacement: '[DATE]',
  },
  times: {
    name: 'times',
    pattern: /\b\d{2}:\d{2}(?::\d{2})?\b/g,
    replacement: '[TIME]',
  },
  unix_timestamps: {
    name: 'unix_timestamps',
    pattern: /\b\d{10,13}\b/g,
    replacement: '[TIMESTAMP]',
  },
  csrf_tokens: {
    name: 'csrf_tokens',
    pattern: /csrf[\w-]*["\s]*[:=]["\s]*["']?[^"'\s>]{8,}["']?/gi,
    replacement: 'csrf:"[CSRF_TOKEN]"',
  },
  request_ids: {
    name: 'request_ids',
    pattern: /request[_-]?id["\s]*[:=]["\s]*["']?[^"'\s>]{8,}["']?/gi,
    replacement: 'request_id:"[REQUEST_ID]"',
  },
  nonce: {
    name: 'nonce',
    pattern: /nonce="[^"]*"/gi,
    replacement: 'nonce="[NONCE]"',
  },
  session_ids: {
    name: 'session_ids',
    pattern: /(?:session|sess|sid)[\w-]*["\s]*[:=]["\s]*["']?[^"'\s>&]{16,}["']?/gi,
    replacement: 'session:"[SESSION]"',
  },
  uuids: {
    name: 'uuids',
    pattern: /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi,
    replacement: '[UUID]',
  },
  version_numbers: {
    name: 'version_numbers',
    pattern: /\bv?\d+\.\d+\.\d+(?:-[a-zA-Z0-9]+)?\b/g,
    replacement: '[VERSION]',
  },
};

/**
 * Compile a user supplied regex source into a global pattern
 */
export function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, 'g');
  } catch (error) {
    throw new ConfigError(`Invalid volatile pattern: ${source}`, error);
  }
}

/**
 * Build the rule set from configuration plus any per-task patterns
 */
export function buildNormalizationRules(
  config: Config['normalize'],
  extraPatterns: string[] = []
): NormalizationRules {
  const volatile: VolatilePattern[] = config.volatilePresets.map((name) => {
    const preset = VOLATILE_PRESETS[name];
    if (!preset) {
      throw new ConfigError(`Unknown volatile preset: ${name}`, {
        known: Object.keys(VOLATILE_PRESETS),
      });
    }
    return preset;
  });

  [...config.volatilePatterns, ...extraPatterns].forEach((source, index) => {
    volatile.push({ name: `custom_${index}`, pattern: compilePattern(source), replacement: '' });
  });

  return {
    stripElements: config.stripElements,
    textOnly: config.textOnly,
    volatile,
  };
}

function fromCodePoint(code: number, fallback: string): string {
  return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

/**
 * Decode common HTML entities
 */
export function decodeHtmlEntities(text: string): string {
  const entities: Record<string, string> = {
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
    '&nbsp;': ' ',
    '&ndash;': '–',
    '&mdash;': '—',
  };

  let decoded = text;
  for (const [entity, char] of Object.entries(entities)) {
    decoded = decoded.split(entity).join(char);
  }

  decoded = decoded.replace(/&#(\d+);/g, (entity, code: string) => fromCodePoint(parseInt(code, 10), entity));
  decoded = decoded.replace(/&#x([0-9a-f]+);/gi, (entity, code: string) => fromCodePoint(parseInt(code, 16), entity));

  // Last, so "&amp;lt;" decodes to "&lt;" and not "<"
  return decoded.split('&amp;').join('&');
}

/**
 * Remove comments and the given elements (with their content) from HTML
 */
export function stripElements(html: string, elements: string[]): string {
  let stripped = html.replace(/<!--[\s\S]*?-->/g, '');
  for (const element of elements) {
    const tag = element.replace(/[^a-zA-Z0-9-]/g, '');
    if (!tag) continue;
    stripped = stripped.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, 'gi'), ' ');
    // Void or unclosed occurrences
    stripped = stripped.replace(new RegExp(`<${tag}\\b[^>]*\\/?>`, 'gi'), ' ');
  }
  return stripped;
}

/**
 * Extract visible text from HTML
 */
export function extractTextFromHtml(html: string, elements: string[] = ['script', 'style']): string {
  let text = stripElements(html, elements);
  text = text.replace(/<[^>]+>/g, ' ');
  text = decodeHtmlEntities(text);
  return sanitizeText(text);
}

/**
 * Extract the document title, if present
 */
export function extractTitle(html: string): string | undefined {
  const match = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  if (!match) {
    return undefined;
  }
  const title = sanitizeText(decodeHtmlEntities(match[1]));
  return title.length > 0 ? title : undefined;
}

/**
 * Apply the normalization rules to raw content
 */
export function normalizeContent(content: string, rules: NormalizationRules): string {
  let normalized = stripElements(content, rules.stripElements);

  if (rules.textOnly) {
    normalized = normalized.replace(/<[^>]+>/g, ' ');
    normalized = decodeHtmlEntities(normalized);
  }

  for (const { pattern, replacement } of rules.volatile) {
    normalized = normalized.replace(pattern, replacement);
  }

  return sanitizeText(normalized);
}

/**
 * Short display text: the title on the first line, then an excerpt of the
 * visible text
 */
export function summarizeContent(content: string, rules: NormalizationRules, maxLength: number = 200): string {
  const title = extractTitle(content);
  const body = extractTextFromHtml(content, [...rules.stripElements, 'title', 'head']);
  const excerpt = truncateText(body, maxLength);
  return title ? `${title}\n${excerpt}` : excerpt;
}
