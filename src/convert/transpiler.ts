/**
 * Markdown to LaTeX transpiler.
 *
 * Runs a fixed sequence of whole-text rewrites. The order matters:
 *
 * 1. placeholders (including tables inside placeholder windows)
 * 2. residual metadata lines
 * 3. plain-text escaping of prose and heading lines
 * 4. headers
 * 5. bold, then italic
 * 6. multi-key, then single-key citations
 * 7. inline tables
 * 8. bullet, then numbered lists
 * 9. blank-line normalization
 *
 * Prose is escaped before any command lands on its line, so emphasis and
 * citations on the same line do not stop the escaping. Citations run after
 * emphasis and before tables and lists, so cell and item escaping sees
 * finished `\cite{...}` commands and leaves them alone.
 */

import type { TranspileOptions, TranspileResult } from '../types.js';
import { convertBold, convertHeaders, convertItalic, escapePlainText } from './blocks.js';
import { convertMultiCitations, convertSingleCitations, extractCitationKeys } from './citations.js';
import { convertBulletLists, convertNumberedLists } from './lists.js';
import { expandPlaceholders, stripMetadataLines } from './placeholders.js';
import { convertInlineTables } from './tables.js';
import type { TranspilePass } from './types.js';

/** Default tunables; override any subset per call. */
export const DEFAULT_TRANSPILE_OPTIONS: Readonly<TranspileOptions> = {
  placeholderWindow: 800,
  labelMaxLength: 20,
};

/** Collapse runs of two or more blank lines into one and trim the ends. */
export function normalizeBlankLines(text: string): string {
  return text.replace(/\n[ \t]*\n(?:[ \t]*\n)+/g, '\n\n').trim();
}

export const TRANSPILE_PASSES: readonly TranspilePass[] = [
  { name: 'placeholders', run: expandPlaceholders },
  { name: 'metadata', run: stripMetadataLines },
  { name: 'plain-text', run: escapePlainText },
  { name: 'headers', run: convertHeaders },
  { name: 'bold', run: convertBold },
  { name: 'italic', run: convertItalic },
  { name: 'multi-citations', run: convertMultiCitations },
  { name: 'single-citations', run: convertSingleCitations },
  { name: 'inline-tables', run: convertInlineTables },
  { name: 'bullet-lists', run: convertBulletLists },
  { name: 'numbered-lists', run: convertNumberedLists },
  { name: 'whitespace', run: normalizeBlankLines },
];

function resolveOptions(options: Partial<TranspileOptions>): TranspileOptions {
  return { ...DEFAULT_TRANSPILE_OPTIONS, ...options };
}

/**
 * Convert one markdown document to body-level LaTeX.
 * Stateless: nothing is shared between calls.
 */
export function markdownToLatex(
  markdown: string,
  options: Partial<TranspileOptions> = {}
): string {
  const resolved = resolveOptions(options);
  const normalized = markdown.replace(/\r\n?/g, '\n');
  return TRANSPILE_PASSES.reduce((text, pass) => pass.run(text, resolved), normalized);
}

/** Transpile and collect the citation keys of the finished body. */
export function transpileMarkdown(
  markdown: string,
  options: Partial<TranspileOptions> = {}
): TranspileResult {
  const body = markdownToLatex(markdown, options);
  return { body, citationKeys: extractCitationKeys(body) };
}
