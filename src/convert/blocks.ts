/**
 * Plain-text escaping, header and emphasis rewriting.
 */

import { escapeLatex } from './escape.js';
import { isListItem } from './lists.js';
import { isTableRow } from './tables.js';

const HEADING_LINE_REGEX = /^(#{1,4} )(.*)$/;

/**
 * Escape special characters in plain prose and heading text, line by line.
 * Runs before any command is emitted on those lines. Lines already holding
 * a backslash (emitted floats, author LaTeX) are left alone, and so are
 * table rows and list items, whose cells and items are escaped by their
 * own passes.
 */
export function escapePlainText(text: string): string {
  return text
    .split('\n')
    .map((line) => {
      if (line.includes('\\') || isTableRow(line) || isListItem(line)) return line;
      const heading = HEADING_LINE_REGEX.exec(line);
      if (heading) return `${heading[1] ?? ''}${escapeLatex(heading[2] ?? '')}`;
      return escapeLatex(line);
    })
    .join('\n');
}

/** Markdown heading depth to LaTeX sectioning command. */
const HEADING_COMMANDS: ReadonlyArray<[RegExp, string]> = [
  [/^#### (.+)$/gm, '\\subsubsection{$1}'],
  [/^### (.+)$/gm, '\\subsection{$1}'],
  [/^## (.+)$/gm, '\\section{$1}'],
  [/^# (.+)$/gm, '\\section*{$1}'],
];

/**
 * Convert line-initial `#` to `####` headings.
 * A single `#` is the unnumbered top level; deeper levels are numbered.
 */
export function convertHeaders(text: string): string {
  return HEADING_COMMANDS.reduce(
    (result, [pattern, replacement]) => result.replace(pattern, replacement),
    text
  );
}

/** `**text**` to `\textbf{text}`. */
export function convertBold(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, '\\textbf{$1}');
}

/** `*text*` to `\textit{text}`. The star of `\section*` is not a marker. */
export function convertItalic(text: string): string {
  return text.replace(/(?<!\\section)\*(.+?)\*/g, '\\textit{$1}');
}

/** Bold before italic, so `**x**` is never read as two italic markers. */
export function convertEmphasis(text: string): string {
  return convertItalic(convertBold(text));
}
