/**
 * Intermediate types for the markdown to LaTeX passes.
 */

import type { TranspileOptions } from '../types.js';

/** Placeholder tag families, matched by their bracketed marker. */
export type PlaceholderKind = 'figure' | 'table' | 'chart';

/** Metadata lines found in a placeholder's lookahead window. */
export interface PlaceholderMetadata {
  caption?: string;
  description?: string;
  /** Chart type (e.g. "line", "bar"); only meaningful for charts */
  type?: string;
}

/** One recognized placeholder tag. */
export interface PlaceholderTag {
  kind: PlaceholderKind;
  /** Free text after the marker inside the brackets, if any */
  inlineLabel?: string;
  /** Offset of the opening bracket in the source text */
  start: number;
  /** Offset just past the closing bracket */
  end: number;
}

/** A parsed pipe table. */
export interface TableBlock {
  header: readonly string[];
  /** Derived from the header; data rows are truncated to this width */
  columnCount: number;
  rows: readonly (readonly string[])[];
}

/** Where a table was found; decides its default caption. */
export type TableSource = 'inline' | 'placeholder';

export type ListKind = 'bullet' | 'numbered';

/**
 * Line-scan state for one list pass. `tabular` covers the rows of an
 * already emitted tabular, which are never list items.
 */
export type ListState = 'outside' | 'tabular' | ListKind;

/** A single rewrite over the whole working text. */
export interface TranspilePass {
  name: string;
  run: (text: string, options: TranspileOptions) => string;
}
