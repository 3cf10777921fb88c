import { SEARCH_LIMITS } from '../constants/limits';

/**
 * Split a comma-separated keyword string into trimmed, non-empty terms.
 * Throws when the raw string is longer than the contract allows.
 */
export function parseKeywords(raw: string | undefined): string[] {
  if (!raw || raw.trim() === '') return [];
  if (raw.length > SEARCH_LIMITS.MAX_KEYWORDS_LENGTH) {
    throw new RangeError(
      `Keywords string too long: ${raw.length} characters (max: ${SEARCH_LIMITS.MAX_KEYWORDS_LENGTH})`,
    );
  }
  return raw
    .split(',')
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

/** Escape `%`, `_` and the escape char itself for a LIKE ... ESCAPE '\' clause */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Case-insensitive "contains" pattern for one keyword */
export function containsPattern(keyword: string): string {
  return `%${escapeLikePattern(keyword.toLowerCase())}%`;
}
