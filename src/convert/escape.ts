/**
 * LaTeX special-character escaping for plain-text spans.
 */

const LATEX_SPECIALS: Record<string, string> = {
  '&': '\\&',
  '%': '\\%',
  $: '\\$',
  '#': '\\#',
  _: '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}',
};

const SPECIALS_REGEX = /[&%$#_{}~^]/g;

/** Commands the transpiler emits before any escaping happens. */
const EMITTED_COMMANDS = ['\\textbf', '\\textit', '\\cite', '\\ref'];

/**
 * Whether text already carries transpiler-emitted LaTeX.
 * Substring check only: a plain-text mention of "\cite" also counts.
 */
export function containsEmittedLatex(text: string): boolean {
  return text.includes('\\') && EMITTED_COMMANDS.some((cmd) => text.includes(cmd));
}

/**
 * Escape `& % $ # _ { } ~ ^` for LaTeX.
 *
 * Text that already contains emitted commands is returned unchanged, so
 * escaping never corrupts `\textbf{...}` or `\cite{...}` produced by an
 * earlier pass. Replacement is single-pass: the braces of
 * `\textasciitilde{}` are never escaped again.
 */
export function escapeLatex(text: string): string {
  if (containsEmittedLatex(text)) return text;
  return text.replace(SPECIALS_REGEX, (ch) => LATEX_SPECIALS[ch] ?? ch);
}
