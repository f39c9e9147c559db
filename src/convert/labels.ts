/**
 * \label generation for floats.
 */

import anyAscii from 'any-ascii';

/**
 * Slugify a caption for use in a \label: transliterate to ASCII, lower-case,
 * drop everything but [a-z0-9], cap the length.
 * Falls back to `fallback` when nothing survives.
 */
export function slugifyCaption(caption: string, maxLength: number, fallback: string): string {
  const slug = anyAscii(caption)
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '')
    .slice(0, maxLength);
  return slug || fallback;
}

/** Build a prefixed label, e.g. `fig:systemoverview`. */
export function makeLabel(
  prefix: 'fig' | 'tab',
  caption: string,
  maxLength: number,
  fallback: string
): string {
  return `${prefix}:${slugifyCaption(caption, maxLength, fallback)}`;
}
