/**
 * Bullet and numbered list wrapping.
 *
 * Each list kind is one full line scan driven by a small state machine
 * (`outside`, inside a list of that kind, or inside an emitted `tabular`).
 * Every transition yields the lines to emit and the next state; end of input
 * is a transition too, so an open list is always closed.
 */

import { ListBalanceError } from '../errors.js';
import { escapeLatex } from './escape.js';
import type { ListKind, ListState } from './types.js';

interface ListSyntax {
  environment: string;
  /** Returns the item text, or undefined when the line is not an item. */
  matchItem: (trimmed: string) => string | undefined;
}

const NUMBERED_ITEM_REGEX = /^\d+\. /;
const TABULAR_BEGIN = '\\begin{tabular}';
const TABULAR_END = '\\end{tabular}';

const LIST_SYNTAX: Record<ListKind, ListSyntax> = {
  bullet: {
    environment: 'itemize',
    matchItem: (trimmed) => (trimmed.startsWith('- ') ? trimmed.slice(2) : undefined),
  },
  numbered: {
    environment: 'enumerate',
    matchItem: (trimmed) =>
      NUMBERED_ITEM_REGEX.test(trimmed) ? trimmed.replace(NUMBERED_ITEM_REGEX, '') : undefined,
  },
};

interface Transition {
  state: ListState;
  emit: string[];
  /** Whether `emit` starts a new environment */
  opens: boolean;
  /** Whether `emit` ends the open environment */
  closes: boolean;
}

/** Advance the scan by one line, or by end of input when `line` is undefined. */
export function stepListScan(state: ListState, kind: ListKind, line: string | undefined): Transition {
  if (state === 'tabular') {
    const inside = line !== undefined && line.trim() !== TABULAR_END;
    return {
      state: inside ? 'tabular' : 'outside',
      emit: line === undefined ? [] : [line],
      opens: false,
      closes: false,
    };
  }

  const { environment, matchItem } = LIST_SYNTAX[kind];
  const item = line === undefined ? undefined : matchItem(line.trim());

  if (item !== undefined) {
    const opens = state !== kind;
    const emit = opens ? [`\\begin{${environment}}`] : [];
    emit.push(`  \\item ${escapeLatex(item)}`);
    return { state: kind, emit, opens, closes: false };
  }

  const closes = state === kind;
  const emit = closes ? [`\\end{${environment}}`] : [];
  if (line === undefined) return { state: 'outside', emit, opens: false, closes };

  emit.push(line);
  const next = line.trimStart().startsWith(TABULAR_BEGIN) ? 'tabular' : 'outside';
  return { state: next, emit, opens: false, closes };
}

/** Whether a line is a bullet or numbered item. */
export function isListItem(line: string): boolean {
  const trimmed = line.trim();
  return Object.values(LIST_SYNTAX).some((syntax) => syntax.matchItem(trimmed) !== undefined);
}

/**
 * Wrap every maximal run of `kind` items in its environment.
 * Item text is escaped; other lines, including the rows of an emitted
 * `tabular`, pass through untouched.
 */
export function wrapListRuns(text: string, kind: ListKind): string {
  const { environment } = LIST_SYNTAX[kind];
  const output: string[] = [];
  let state: ListState = 'outside';
  let opened = 0;
  let closed = 0;

  for (const line of [...text.split('\n'), undefined]) {
    const transition = stepListScan(state, kind, line);
    if (transition.opens) opened++;
    if (transition.closes) closed++;
    output.push(...transition.emit);
    state = transition.state;
  }

  if (opened !== closed || state !== 'outside') {
    throw new ListBalanceError(environment, opened, closed);
  }
  return output.join('\n');
}

export function convertBulletLists(text: string): string {
  return wrapListRuns(text, 'bullet');
}

export function convertNumberedLists(text: string): string {
  return wrapListRuns(text, 'numbered');
}
