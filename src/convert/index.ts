/**
 * Conversion orchestrator for markdown files.
 *
 * Ties together UTF-8 decoding, the transpiler and the bibliography
 * synthesizer with file I/O.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { formatBibliography, synthesizeBibliography } from "../bibliography.js";
import { EncodingError } from "../errors.js";
import { getBibliographyPath, getBodyPath } from "../paths.js";
import type { TranspileOptions } from "../types.js";
import { transpileMarkdown } from "./transpiler.js";

export interface ConvertResult {
  success: boolean;
  error?: string;
  bodyPath?: string;
  bibliographyPath?: string;
  citations?: number;
  bibliographyEntries?: number;
}

/**
 * Decode markdown bytes as strict UTF-8.
 * Throws {@link EncodingError} instead of substituting replacement characters.
 */
export function decodeMarkdown(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new EncodingError("Input is not valid UTF-8", { cause: err });
  }
}

/**
 * Convert a markdown file to LaTeX.
 *
 * Writes `body.tex` and `references.bib` into `outDir` (created if missing).
 */
export async function convertMarkdownFileToLatex(
  mdPath: string,
  outDir: string,
  options: Partial<TranspileOptions> = {}
): Promise<ConvertResult> {
  try {
    const markdown = decodeMarkdown(await readFile(mdPath));

    const { body, citationKeys } = transpileMarkdown(markdown, options);
    const entries = synthesizeBibliography(citationKeys);

    await mkdir(outDir, { recursive: true });
    const bodyPath = getBodyPath(outDir);
    const bibliographyPath = getBibliographyPath(outDir);
    await writeFile(bodyPath, `${body}\n`, "utf-8");
    await writeFile(bibliographyPath, `${formatBibliography(entries)}\n`, "utf-8");

    const result: ConvertResult = { success: true };
    result.bodyPath = bodyPath;
    result.bibliographyPath = bibliographyPath;
    result.citations = citationKeys.length;
    result.bibliographyEntries = entries.length;
    return result;
  } catch (err) {
    const result: ConvertResult = { success: false };
    result.error = err instanceof Error ? err.message : String(err);
    return result;
  }
}
