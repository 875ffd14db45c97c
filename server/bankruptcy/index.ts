/**
 * Bankruptcy schedule extraction.
 *
 * Entry points for callers holding PDF bytes; everything below works on layout
 * pages and can be driven without pdfjs.
 */

import "./layout/polyfills";

import type { BankruptcyExtraction, FormId, FormPayloads, FormResult } from "@shared/schema";
import { assertProcessable, extractAll, extractForm } from "./extract-all";
import { NotProcessableError } from "./errors";
import type { ExtractionContext } from "./isolator";
import { openLayoutDocument, openLayoutFile } from "./layout/pdf-source";

export interface ExtractOptions {
  /** Directory for the composed per-form PDFs. */
  tmpDir?: string;
}

async function withContext<T>(
  bytes: Uint8Array,
  options: ExtractOptions,
  run: (context: ExtractionContext) => Promise<T>,
): Promise<T> {
  const layout = await openLayoutDocument(bytes);
  try {
    return await run({ source: { bytes, layout }, loadLayout: openLayoutFile, tmpDir: options.tmpDir });
  } finally {
    await layout.close();
  }
}

/** All four forms, or null for a document without a text layer. */
export async function extractFromPdf(
  bytes: Uint8Array,
  options: ExtractOptions = {},
): Promise<BankruptcyExtraction | null> {
  return withContext(bytes, options, extractAll);
}

/** One form, or null for a document without a text layer. */
export async function extractFormFromPdf<K extends FormId>(
  form: K,
  bytes: Uint8Array,
  options: ExtractOptions = {},
): Promise<FormResult<FormPayloads[K]> | null> {
  return withContext(bytes, options, async (context) => {
    try {
      await assertProcessable(context.source.layout);
    } catch (error) {
      if (error instanceof NotProcessableError) return null;
      throw error;
    }
    return extractForm(form, context);
  });
}

