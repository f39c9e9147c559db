/**
 * Pipe table to LaTeX tabular conversion.
 *
 * Inline tables need a header row, a separator row, and at least one data
 * row. Tables inside a placeholder window need only two pipe rows; their
 * separator, if any, is skipped.
 */

import type { TranspileOptions } from '../types.js';
import { escapeLatex } from './escape.js';
import { makeLabel } from './labels.js';
import type { TableBlock, TableSource } from './types.js';

const ROW_REGEX = /^\s*\|.*\|\s*$/;
const SEPARATOR_REGEX = /^\s*\|(?:\s*:?-+:?\s*\|)+\s*$/;

const DEFAULT_CAPTIONS: Record<TableSource, string> = {
  inline: 'Data Summary',
  placeholder: 'Table',
};

export function isTableRow(line: string): boolean {
  return ROW_REGEX.test(line);
}

export function isSeparatorRow(line: string): boolean {
  return SEPARATOR_REGEX.test(line);
}

/** Split `| a | b |` into trimmed cells. */
export function parseTableRow(line: string): string[] {
  return line
    .trim()
    .replace(/^\|/, '')
    .replace(/\|$/, '')
    .split('|')
    .map((cell) => cell.trim());
}

/**
 * Parse pipe lines into a table. Separator rows are ignored.
 * Returns undefined for fewer than two rows (header plus data).
 */
export function parseTableBlock(lines: readonly string[]): TableBlock | undefined {
  const rows = lines.filter((line) => !isSeparatorRow(line)).map(parseTableRow);
  const [header, ...data] = rows;
  if (!header || data.length === 0) return undefined;

  return {
    header,
    columnCount: header.length,
    rows: data.map((row) => row.slice(0, header.length)),
  };
}

function renderRow(cells: readonly string[]): string {
  return `${cells.map((cell) => escapeLatex(cell)).join(' & ')} \\\\`;
}

/** Render the tabular environment alone. */
export function renderTabular(block: TableBlock): string {
  const lines: string[] = [];
  lines.push(`\\begin{tabular}{${'l'.repeat(block.columnCount)}}`);
  lines.push('\\toprule');
  lines.push(renderRow(block.header));
  lines.push('\\midrule');
  for (const row of block.rows) {
    lines.push(renderRow(row));
  }
  lines.push('\\bottomrule');
  lines.push('\\end{tabular}');
  return lines.join('\n');
}

/** Render a captioned, labelled table float. */
export function renderTable(
  block: TableBlock,
  source: TableSource,
  options: TranspileOptions,
  caption?: string
): string {
  const title = caption ?? DEFAULT_CAPTIONS[source];
  return [
    '\\begin{table}[htbp]',
    '\\centering',
    `\\caption{${escapeLatex(title)}}`,
    `\\label{${makeLabel('tab', title, options.labelMaxLength, 'table')}}`,
    renderTabular(block),
    '\\end{table}',
  ].join('\n');
}

/**
 * Convert pipe lines to a table float.
 * Returns an empty string when the lines do not form a table.
 */
export function convertTableLines(
  lines: readonly string[],
  source: TableSource,
  options: TranspileOptions,
  caption?: string
): string {
  const block = parseTableBlock(lines);
  if (!block) return '';
  return renderTable(block, source, options, caption);
}

function isInlineTableStart(lines: readonly string[], index: number): boolean {
  const header = lines[index];
  const separator = lines[index + 1];
  const firstRow = lines[index + 2];
  if (header === undefined || separator === undefined || firstRow === undefined) return false;
  return (
    isTableRow(header) &&
    !isSeparatorRow(header) &&
    isSeparatorRow(separator) &&
    isTableRow(firstRow) &&
    !isSeparatorRow(firstRow)
  );
}

/** Replace every inline pipe table in the text with a table float. */
export function convertInlineTables(text: string, options: TranspileOptions): string {
  const lines = text.split('\n');
  const output: string[] = [];

  let i = 0;
  while (i < lines.length) {
    if (!isInlineTableStart(lines, i)) {
      output.push(lines[i] ?? '');
      i++;
      continue;
    }

    let end = i + 2;
    while (end < lines.length && isTableRow(lines[end] ?? '')) end++;
    output.push(convertTableLines(lines.slice(i, end), 'inline', options));
    i = end;
  }

  return output.join('\n');
}
