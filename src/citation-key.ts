/**
 * Citation key grammar shared by tag recognition and bibliography synthesis.
 */

import type { CitationKey, ParsedCitationKey } from './types.js';

/**
 * Surface form of one author+year citation: letters, a 4-digit year,
 * and an optional lowercase disambiguation letter ("Smith2024", "Smith2024a").
 */
export const CITATION_KEY_PATTERN = '[A-Za-z]+\\d{4}[a-z]?';

const PARSE_REGEX = /^([a-z]+)(\d{4})([a-z]?)$/;

/**
 * Normalize a citation surface form to its key.
 * The same surface form always yields the same key.
 */
export function normalizeCitationKey(raw: string): CitationKey {
  return raw.toLowerCase().replace(/\s+/g, '');
}

/**
 * Split a normalized key into author token and year.
 * Returns undefined for keys that do not follow the author+year grammar.
 */
export function parseCitationKey(key: CitationKey): ParsedCitationKey | undefined {
  const match = PARSE_REGEX.exec(normalizeCitationKey(key));
  if (!match) return undefined;

  const [, author, year, suffix] = match;
  if (author === undefined || year === undefined) return undefined;

  const parsed: ParsedCitationKey = { key: `${author}${year}${suffix ?? ''}`, author, year };
  if (suffix) parsed.suffix = suffix;
  return parsed;
}

/** Sort and deduplicate citation keys. */
export function uniqueSortedKeys(keys: Iterable<CitationKey>): CitationKey[] {
  return [...new Set(keys)].sort();
}
