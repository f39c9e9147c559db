/**
 * Citation tag rewriting and citation key extraction.
 *
 * Tags: `[Smith2024]`, `[Smith2024a]`, `[Smith2024; Jones2021]`.
 * Multi-key tags are always rewritten before single-key tags.
 */

import { CITATION_KEY_PATTERN, normalizeCitationKey, uniqueSortedKeys } from '../citation-key.js';
import type { CitationKey } from '../types.js';

const MULTI_CITATION_REGEX = new RegExp(
  `\\[(${CITATION_KEY_PATTERN}(?:\\s*;\\s*${CITATION_KEY_PATTERN})+)\\]`,
  'g'
);
const SINGLE_CITATION_REGEX = new RegExp(`\\[(${CITATION_KEY_PATTERN})\\]`, 'g');
const CITE_COMMAND_REGEX = /\\cite\{([^}]*)\}/g;

function splitGroup(group: string, separator: string): CitationKey[] {
  return group
    .split(separator)
    .map((part) => normalizeCitationKey(part))
    .filter(Boolean);
}

/** Rewrite `[A2020; B2021]` tags into `\cite{a2020,b2021}`. */
export function convertMultiCitations(text: string): string {
  return text.replace(
    MULTI_CITATION_REGEX,
    (_match, group: string) => `\\cite{${splitGroup(group, ';').join(',')}}`
  );
}

/** Rewrite `[A2020]` tags into `\cite{a2020}`. */
export function convertSingleCitations(text: string): string {
  return text.replace(
    SINGLE_CITATION_REGEX,
    (_match, key: string) => `\\cite{${normalizeCitationKey(key)}}`
  );
}

/** Multi-key tags first, then single-key tags. */
export function convertCitations(text: string): string {
  return convertSingleCitations(convertMultiCitations(text));
}

/**
 * Collect every citation key referenced in text.
 *
 * Reads `\cite{...}` arguments as well as any bracketed tags still present,
 * so it works on both finished LaTeX and raw markdown. Returns sorted,
 * unique keys.
 */
export function extractCitationKeys(text: string): CitationKey[] {
  const keys: CitationKey[] = [];

  for (const match of text.matchAll(CITE_COMMAND_REGEX)) {
    keys.push(...splitGroup(match[1] ?? '', ','));
  }
  for (const match of text.matchAll(MULTI_CITATION_REGEX)) {
    keys.push(...splitGroup(match[1] ?? '', ';'));
  }
  for (const match of text.matchAll(SINGLE_CITATION_REGEX)) {
    keys.push(normalizeCitationKey(match[1] ?? ''));
  }

  return uniqueSortedKeys(keys.filter(Boolean));
}
