/**
 * Output path resolution for converted documents.
 */

import { join } from 'node:path';

/** Filename of the transpiled LaTeX body. */
export const BODY_FILENAME = 'body.tex';

/** Filename of the synthesized bibliography. */
export const BIBLIOGRAPHY_FILENAME = 'references.bib';

/** Get the LaTeX body path inside an output directory. */
export function getBodyPath(outDir: string): string {
  return join(outDir, BODY_FILENAME);
}

/** Get the bibliography path inside an output directory. */
export function getBibliographyPath(outDir: string): string {
  return join(outDir, BIBLIOGRAPHY_FILENAME);
}
