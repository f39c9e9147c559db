/**
 * # markdown-paper-latex
 *
 * Markdown to LaTeX transpilation for generated research papers, with a
 * placeholder bibliography synthesized from the citations in the result.
 *
 * ## Workflow
 *
 * 1. **Transpile** — Convert the markdown body into body-level LaTeX.
 * 2. **Collect** — Re-scan the finished body for its citation keys.
 * 3. **Synthesize** — Build one placeholder BibTeX record per key.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { generateBibliography, markdownToLatex, renderPaper } from "markdown-paper-latex";
 *
 * const body = markdownToLatex("## Results\n\nOur findings [Lee2022] show **strong** support.");
 * // \section{Results}
 * //
 * // Our findings \cite{lee2022} show \textbf{strong} support.
 *
 * const bib = generateBibliography(body);
 * // @article{lee2022, ... }
 *
 * // Or everything a document template needs at once:
 * const paper = renderPaper({ title: "R&D", abstract: "...", body: markdown, language: "de" });
 * ```
 *
 * ## Markdown dialect
 *
 * - Headings `#` to `####`, `**bold**`, `*italic*`
 * - `- ` bullet and `1. ` numbered lists (single level)
 * - Citations `[Smith2024]`, `[Smith2024a]`, `[Smith2024; Jones2021]`
 * - Pipe tables with a separator row
 * - Placeholders `[FIGURE ...]`, `[TABLE ...]`, `[CHART ...]` followed by
 *   `Caption:`, `Description:` and `Type:` lines
 * - `& % $ # _ { } ~ ^` in prose, headings, table cells and list items are
 *   escaped
 *
 * ## Configuration
 *
 * - **placeholderWindow**: Characters after a placeholder scanned for metadata. Default: `800`.
 * - **labelMaxLength**: Maximum `\label` slug length. Default: `20`.
 *
 * @module markdown-paper-latex
 */

// === Transpilation ===
export {
  DEFAULT_TRANSPILE_OPTIONS,
  TRANSPILE_PASSES,
  markdownToLatex,
  normalizeBlankLines,
  transpileMarkdown,
} from "./convert/transpiler.js";
export { escapeLatex, containsEmittedLatex } from "./convert/escape.js";
export {
  convertCitations,
  convertMultiCitations,
  convertSingleCitations,
  extractCitationKeys,
} from "./convert/citations.js";
export { convertInlineTables, convertTableLines, parseTableBlock, renderTabular } from "./convert/tables.js";
export {
  expandPlaceholders,
  extractPlaceholderMetadata,
  findPlaceholderTags,
  stripMetadataLines,
} from "./convert/placeholders.js";
export {
  convertBold,
  convertEmphasis,
  convertHeaders,
  convertItalic,
  escapePlainText,
} from "./convert/blocks.js";
export {
  convertBulletLists,
  convertNumberedLists,
  isListItem,
  stepListScan,
  wrapListRuns,
} from "./convert/lists.js";
export type {
  ListKind,
  ListState,
  PlaceholderKind,
  PlaceholderMetadata,
  PlaceholderTag,
  TableBlock,
  TableSource,
  TranspilePass,
} from "./convert/types.js";

// === Bibliography ===
export {
  PLACEHOLDER_NOTE,
  createBibliographyEntry,
  formatBibliography,
  formatBibtexEntry,
  generateBibliography,
  synthesizeBibliography,
} from "./bibliography.js";
export { CITATION_KEY_PATTERN, normalizeCitationKey, parseCitationKey } from "./citation-key.js";

// === Paper & Files ===
export { babelLanguage, renderPaper } from "./paper.js";
export type { PaperContext, PaperSource } from "./paper.js";
export { convertMarkdownFileToLatex, decodeMarkdown } from "./convert/index.js";
export type { ConvertResult } from "./convert/index.js";
export { BIBLIOGRAPHY_FILENAME, BODY_FILENAME, getBibliographyPath, getBodyPath } from "./paths.js";

// === Errors & Types ===
export { EncodingError, ListBalanceError, TranspileError } from "./errors.js";
export type {
  BibliographyEntry,
  CitationKey,
  ParsedCitationKey,
  TranspileOptions,
  TranspileResult,
} from "./types.js";
