/**
 * Document isolation: locate the pages of one form inside a filing and stack
 * them into a single tall page, so every later step works on one coordinate
 * space.
 */

import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { PDFDocument } from "pdf-lib";

import type { FormTitle } from "@shared/schema";
import { createLogger } from "../logger";
import { TITLE_WINDOW } from "./constants";
import { DocumentNotFoundError } from "./errors";
import type { LayoutPage } from "./layout/layout-page";
import type { LayoutDocument, LayoutLoader } from "./layout/pdf-source";

const log = createLogger("isolator");

/** A filing as uploaded: its bytes and a layout view over them. */
export interface SourceDocument {
  bytes: Uint8Array;
  layout: LayoutDocument;
}

export interface ExtractionContext {
  source: SourceDocument;
  /** Opens the composed single-page PDF. */
  loadLayout: LayoutLoader;
  /** Parent directory for the composed PDF; the OS temp dir when unset. */
  tmpDir?: string;
}

export interface FindOptions {
  /** Also require the word "page" in the trailing text (the footer's page counter). */
  requirePageToken?: boolean;
}

/** Whether a page's trailing text carries the form title. */
export function pageMatchesForm(text: string, title: FormTitle, options: FindOptions = {}): boolean {
  const tail = text.slice(-TITLE_WINDOW);
  if (!tail.includes(title)) return false;
  return !options.requirePageToken || tail.toLowerCase().includes("page");
}

/** Zero-based indices of the pages belonging to a form, in document order. */
export async function findFormPages(
  document: LayoutDocument,
  title: FormTitle,
  options: FindOptions = {},
): Promise<number[]> {
  const matches: number[] = [];
  for (let index = 0; index < document.pageCount; index++) {
    const page = await document.getPage(index);
    if (pageMatchesForm(page.extractText(), title, options)) {
      matches.push(index);
    }
  }
  return matches;
}

/**
 * Compose the canonical page: a lone page is copied as is; otherwise every page
 * from the first to the last match is drawn onto one canvas, top to bottom.
 */
export async function composeCanonicalPage(bytes: Uint8Array, indices: readonly number[]): Promise<Uint8Array> {
  const first = Math.min(...indices);
  const last = Math.max(...indices);
  const source = await PDFDocument.load(bytes);
  const target = await PDFDocument.create();

  if (first === last) {
    const [copy] = await target.copyPages(source, [first]);
    target.addPage(copy);
    return target.save();
  }

  const pages = source.getPages().slice(first, last + 1);
  const { width, height } = pages[0].getSize();
  const canvas = target.addPage([width, height * pages.length]);
  const embedded = await target.embedPages(pages);

  embedded.forEach((page, offset) => {
    canvas.drawPage(page, { x: 0, y: height * (pages.length - 1 - offset) });
  });

  return target.save();
}

/**
 * Isolate one form and hand its canonical page to `use`. The composed PDF lives
 * in a private temp directory for the duration of the call only.
 */
export async function withIsolatedForm<T>(
  context: ExtractionContext,
  title: FormTitle,
  use: (page: LayoutPage) => Promise<T> | T,
): Promise<T> {
  const indices = await findFormPages(context.source.layout, title, { requirePageToken: true });
  if (indices.length === 0) {
    throw new DocumentNotFoundError(title);
  }

  log.info("Isolated form", {
    form: title,
    pages: indices.length,
    first: indices[0] + 1,
    last: indices[indices.length - 1] + 1,
  });

  const bytes = await composeCanonicalPage(context.source.bytes, indices);
  const dir = await mkdtemp(join(context.tmpDir ?? tmpdir(), "form-"));

  try {
    const file = join(dir, "canonical.pdf");
    await writeFile(file, bytes);

    const document = await context.loadLayout(file);
    try {
      return await use(await document.getPage(0));
    } finally {
      await document.close();
    }
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
