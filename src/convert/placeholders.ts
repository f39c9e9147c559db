/**
 * Placeholder tag expansion: `[FIGURE ...]`, `[TABLE ...]`, `[CHART ...]`.
 *
 * Each tag reads its metadata (`Caption:`, `Description:`, `Type:`) from a
 * bounded window of the text that follows it. The window ends early at the
 * next placeholder tag. No image file is ever referenced: figures and charts
 * render as framed boxes.
 */

import type { TranspileOptions } from '../types.js';
import { escapeLatex } from './escape.js';
import { makeLabel } from './labels.js';
import { convertTableLines, isTableRow } from './tables.js';
import type { PlaceholderKind, PlaceholderMetadata, PlaceholderTag } from './types.js';

const PLACEHOLDER_TAG_REGEX = /\[(FIGURE|TABLE|CHART)([^\]\n]*)\]/g;
const METADATA_LINE_REGEX = /^[ \t]*(Caption|Description|Type):[ \t]*(.*?)[ \t]*$/;
const RESIDUAL_METADATA_REGEX = /^[ \t]*(?:Caption|Description|Type|Data):.*(?:\r?\n|$)/gm;

const MARKER_KINDS: Record<string, PlaceholderKind> = {
  FIGURE: 'figure',
  TABLE: 'table',
  CHART: 'chart',
};

const DEFAULT_CAPTIONS: Record<PlaceholderKind, string> = {
  figure: 'Figure',
  table: 'Table',
  chart: 'Chart',
};

const DEFAULT_DESCRIPTION = 'Placeholder figure';
const DEFAULT_TABLE_DESCRIPTION = 'Placeholder table';
const DEFAULT_CHART_TYPE = 'line';

/** A table found inside a placeholder window, as offsets into the window. */
interface WindowTable {
  start: number;
  end: number;
  lines: string[];
}

/** Find every placeholder tag, in document order. */
export function findPlaceholderTags(text: string): PlaceholderTag[] {
  const tags: PlaceholderTag[] = [];
  for (const match of text.matchAll(PLACEHOLDER_TAG_REGEX)) {
    const kind = MARKER_KINDS[match[1] ?? ''];
    if (!kind || match.index === undefined) continue;

    const tag: PlaceholderTag = { kind, start: match.index, end: match.index + match[0].length };
    const label = (match[2] ?? '').replace(/^[\s:-]+/, '').trim();
    if (label) tag.inlineLabel = label;
    tags.push(tag);
  }
  return tags;
}

/**
 * Read the first `Caption:`, `Description:` and `Type:` lines of the
 * metadata block that follows a tag.
 *
 * The window's first line is the rest of the tag's own line. The block may
 * start after blank lines, may hold pipe rows, and ends at the first blank
 * or prose line after it.
 */
export function extractPlaceholderMetadata(window: string): PlaceholderMetadata {
  const metadata: PlaceholderMetadata = {};
  let inBlock = false;

  for (const [i, line] of window.split('\n').entries()) {
    const match = METADATA_LINE_REGEX.exec(line);
    if (!match) {
      if (i === 0) continue;
      if (isTableRow(line)) {
        inBlock = true;
        continue;
      }
      if (line.trim() === '' && !inBlock) continue;
      break;
    }

    inBlock = true;
    const value = match[2];
    if (!value) continue;
    switch (match[1]) {
      case 'Caption':
        metadata.caption ??= value;
        break;
      case 'Description':
        metadata.description ??= value;
        break;
      case 'Type':
        metadata.type ??= value;
        break;
    }
  }
  return metadata;
}

/** Drop a trailing line that the window cut short. */
function completeLines(window: string, complete: boolean): string {
  return complete ? window : window.slice(0, window.lastIndexOf('\n') + 1);
}

/**
 * Locate the first run of pipe rows in a window.
 * The window's last line only counts when `complete` is set, since a window
 * cut mid-line could otherwise yield a truncated row.
 */
function findWindowTable(window: string, complete: boolean): WindowTable | undefined {
  const lines = window.split('\n');
  let offset = 0;
  let table: WindowTable | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const isLast = i === lines.length - 1;
    const usable = isTableRow(line) && (complete || !isLast);

    if (usable) {
      table ??= { start: offset, end: offset, lines: [] };
      table.lines.push(line);
      table.end = Math.min(offset + line.length + 1, window.length);
    } else if (table) {
      break;
    }
    offset += line.length + 1;
  }

  return table;
}

function placeholderBox(content: string): string {
  return `\\fbox{\\parbox{0.8\\textwidth}{\\centering\\vspace{2em}${content}\\vspace{2em}}}`;
}

function captionOf(tag: PlaceholderTag, metadata: PlaceholderMetadata): string {
  return metadata.caption ?? tag.inlineLabel ?? DEFAULT_CAPTIONS[tag.kind];
}

function renderFigure(
  tag: PlaceholderTag,
  metadata: PlaceholderMetadata,
  options: TranspileOptions
): string {
  const caption = captionOf(tag, metadata);
  const description = escapeLatex(metadata.description ?? DEFAULT_DESCRIPTION);
  const content =
    tag.kind === 'chart'
      ? `\\textbf{${escapeLatex(metadata.type ?? DEFAULT_CHART_TYPE)} chart}\\\\[1em]\\textit{${description}}`
      : `\\textit{${description}}`;

  return [
    '\\begin{figure}[htbp]',
    '\\centering',
    placeholderBox(content),
    `\\caption{${escapeLatex(caption)}}`,
    `\\label{${makeLabel('fig', caption, options.labelMaxLength, tag.kind)}}`,
    '\\end{figure}',
  ].join('\n');
}

function renderEmptyTable(
  tag: PlaceholderTag,
  metadata: PlaceholderMetadata,
  options: TranspileOptions
): string {
  const caption = captionOf(tag, metadata);
  const description = escapeLatex(metadata.description ?? DEFAULT_TABLE_DESCRIPTION);
  return [
    '\\begin{table}[htbp]',
    '\\centering',
    `\\caption{${escapeLatex(caption)}}`,
    `\\label{${makeLabel('tab', caption, options.labelMaxLength, 'table')}}`,
    placeholderBox(`\\textit{${description}}`),
    '\\end{table}',
  ].join('\n');
}

/**
 * Replace placeholder tags with figure, table and chart floats.
 * Pipe rows consumed by a `[TABLE]` are removed from the text; metadata lines
 * are left for {@link stripMetadataLines}.
 */
export function expandPlaceholders(text: string, options: TranspileOptions): string {
  const tags = findPlaceholderTags(text);
  if (tags.length === 0) return text;

  const parts: string[] = [];
  let cursor = 0;

  tags.forEach((tag, i) => {
    const segmentEnd = tags[i + 1]?.start ?? text.length;
    const windowEnd = Math.min(tag.end + options.placeholderWindow, segmentEnd);
    const window = text.slice(tag.end, windowEnd);
    const complete = windowEnd === segmentEnd;
    const metadata = extractPlaceholderMetadata(completeLines(window, complete));

    parts.push(text.slice(cursor, tag.start));
    cursor = tag.end;

    if (tag.kind !== 'table') {
      parts.push(renderFigure(tag, metadata, options));
      return;
    }

    const table = findWindowTable(window, complete);
    const rendered = table
      ? convertTableLines(table.lines, 'placeholder', options, captionOf(tag, metadata))
      : '';
    if (!table || !rendered) {
      parts.push(renderEmptyTable(tag, metadata, options));
      return;
    }

    parts.push(rendered);
    parts.push(text.slice(tag.end, tag.end + table.start));
    cursor = tag.end + table.end;
  });

  parts.push(text.slice(cursor));
  return parts.join('');
}

/** Remove standalone `Caption:`, `Description:`, `Type:` and `Data:` lines. */
export function stripMetadataLines(text: string): string {
  return text.replace(RESIDUAL_METADATA_REGEX, '');
}
