/**
 * Paper rendering context: everything a LaTeX document template needs,
 * with the body transpiled and the title and abstract escaped.
 */

import { formatBibliography, synthesizeBibliography } from './bibliography.js';
import { escapeLatex } from './convert/escape.js';
import { transpileMarkdown } from './convert/transpiler.js';
import type { CitationKey, TranspileOptions } from './types.js';

const BABEL_LANGUAGES: Record<string, string> = {
  en: 'english',
  de: 'ngerman',
  es: 'spanish',
  fr: 'french',
};

const DEFAULT_CITATION_STYLE = 'apa';

export interface PaperSource {
  title: string;
  abstract: string;
  /** Markdown body */
  body: string;
  /** Document language code, e.g. "en" */
  language?: string;
  citationStyle?: string;
}

export interface PaperContext {
  title: string;
  abstract: string;
  /** Body-level LaTeX */
  body: string;
  /** BibTeX records for every cited key */
  bibliography: string;
  /** babel language name */
  language: string;
  citationStyle: string;
  citationKeys: CitationKey[];
  bibliographyEntries: number;
}

/** Map a language code to its babel name; unknown codes fall back to english. */
export function babelLanguage(code: string | undefined): string {
  if (!code) return 'english';
  return BABEL_LANGUAGES[code.toLowerCase()] ?? 'english';
}

/** Transpile a paper and gather its template context. */
export function renderPaper(
  source: PaperSource,
  options: Partial<TranspileOptions> = {}
): PaperContext {
  const { body, citationKeys } = transpileMarkdown(source.body, options);
  const entries = synthesizeBibliography(citationKeys);

  return {
    title: escapeLatex(source.title),
    abstract: escapeLatex(source.abstract),
    body,
    bibliography: formatBibliography(entries),
    language: babelLanguage(source.language),
    citationStyle: source.citationStyle ?? DEFAULT_CITATION_STYLE,
    citationKeys,
    bibliographyEntries: entries.length,
  };
}
