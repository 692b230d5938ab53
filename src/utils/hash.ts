import { createHash, randomBytes } from 'crypto';

/**
 * Generate SHA-256 hex digest of a string
 */
export function sha256(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Generate a short random hex identifier
 */
export function randomId(length: number = 8): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').substring(0, length);
}
