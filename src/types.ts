/**
 * Shared type definitions for markdown to LaTeX transpilation.
 * Defines the citation, bibliography, and conversion option shapes.
 */

/**
 * A normalized citation key: lower-cased, whitespace removed.
 * Format: {author-letters}{4-digit year}{optional disambiguation letter}, e.g. "smith2024a".
 */
export type CitationKey = string;

/** A citation key split back into its author token and year. */
export interface ParsedCitationKey {
  key: CitationKey;
  /** Letter prefix of the key, e.g. "smith" */
  author: string;
  /** Four-digit year, without the disambiguation letter */
  year: string;
  /** Disambiguation letter, if present (e.g. "a" in "smith2024a") */
  suffix?: string;
}

/**
 * Placeholder bibliographic record synthesized for one citation key.
 * Created once per unique key after transpilation; never mutated.
 */
export interface BibliographyEntry {
  readonly key: CitationKey;
  /** Author token with a capitalized first letter */
  readonly author: string;
  readonly title: string;
  readonly journal: string;
  readonly volume: string;
  readonly pages: string;
  /** Four-character year substring */
  readonly year: string;
  readonly note: string;
}

/** Tunables for one transpilation run. */
export interface TranspileOptions {
  /** Characters after a placeholder tag scanned for metadata lines */
  placeholderWindow: number;
  /** Maximum length of a generated \label slug */
  labelMaxLength: number;
}

/** Result of transpiling one markdown document. */
export interface TranspileResult {
  /** Body-level LaTeX (never a full document) */
  body: string;
  /** Sorted unique citation keys referenced by the body */
  citationKeys: CitationKey[];
}
