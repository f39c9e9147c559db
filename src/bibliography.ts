/**
 * Placeholder bibliography synthesis.
 *
 * Every citation key found in a transpiled body gets one BibTeX record with
 * fixed placeholder text. Keys that do not follow the author+year grammar are
 * skipped; their `\cite{}` stays dangling in the body.
 */

import { parseCitationKey, uniqueSortedKeys } from './citation-key.js';
import { extractCitationKeys } from './convert/citations.js';
import type { BibliographyEntry, CitationKey } from './types.js';

export const PLACEHOLDER_NOTE = 'Placeholder citation - replace with actual reference';

function capitalize(token: string): string {
  return token.charAt(0).toUpperCase() + token.slice(1);
}

/** Build the placeholder record for one key, or undefined if it does not parse. */
export function createBibliographyEntry(key: CitationKey): BibliographyEntry | undefined {
  const parsed = parseCitationKey(key);
  if (!parsed) return undefined;

  const author = capitalize(parsed.author);
  return {
    key: parsed.key,
    author,
    title: `Placeholder Title for ${author} (${parsed.year})`,
    journal: 'Placeholder Journal',
    volume: '1',
    pages: '1--10',
    year: parsed.year.slice(0, 4),
    note: PLACEHOLDER_NOTE,
  };
}

/** One record per unique key, in sorted key order. */
export function synthesizeBibliography(keys: Iterable<CitationKey>): BibliographyEntry[] {
  const entries: BibliographyEntry[] = [];
  for (const key of uniqueSortedKeys(keys)) {
    const entry = createBibliographyEntry(key);
    if (entry) entries.push(entry);
  }
  return entries;
}

/** Serialize one record as a BibTeX `@article`. */
export function formatBibtexEntry(entry: BibliographyEntry): string {
  const fields: Array<[string, string]> = [
    ['author', entry.author],
    ['title', entry.title],
    ['journal', entry.journal],
    ['year', entry.year],
    ['volume', entry.volume],
    ['pages', entry.pages],
    ['note', entry.note],
  ];
  const body = fields.map(([name, value]) => `  ${name} = {${value}}`).join(',\n');
  return `@article{${entry.key},\n${body}\n}`;
}

/** Serialize records, blank-line separated. */
export function formatBibliography(entries: readonly BibliographyEntry[]): string {
  return entries.map(formatBibtexEntry).join('\n\n');
}

/** Bibliography for every key cited in a transpiled LaTeX body. */
export function generateBibliography(latexBody: string): string {
  return formatBibliography(synthesizeBibliography(extractCitationKeys(latexBody)));
}
