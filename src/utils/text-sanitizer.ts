/**
 * Text sanitization utilities shared by fingerprinting and classification
 */

/**
 * Remove control characters, normalize to NFC and collapse all whitespace
 * runs (including newlines) to a single space
 */
export function sanitizeText(text: string): string {
  // Control characters except tab and newline
  let sanitized = text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '');

  // Lone surrogates
  sanitized = sanitized.replace(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g, '\uFFFD');

  // Byte order marks and zero-width characters
  sanitized = sanitized.replace(/[\uFEFF\uFFFE\u200B-\u200D\u2060]/g, '');

  sanitized = sanitized.normalize('NFC');

  return sanitized.replace(/\s+/g, ' ').trim();
}

/**
 * Cut text to at most `maxLength` code points, ending with an ellipsis when
 * cut. Surrogate pairs are never split.
 */
export function truncateText(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return `${chars.slice(0, maxLength).join('').trimEnd()}...`;
}
