/**
 * Content Hasher
 *
 * Normalizes text and derives the SHA-256 fingerprint used as a cache key.
 * Two inputs that differ only in line endings, Unicode composition or
 * runs of whitespace share a fingerprint.
 */

import { createHash } from 'crypto';

/**
 * Canonical form of text content
 */
export function normalizeContent(text: string): string {
  return text
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Hex SHA-256 of the normalized text
 */
export function fingerprint(text: string): string {
  return createHash('sha256').update(normalizeContent(text), 'utf8').digest('hex');
}
