/**
 * Layout extraction backed by pdfjs-dist.
 *
 * NOTE: ./polyfills must be loaded before this module (the server entry point
 * imports it first).
 */

import { readFile } from "fs/promises";
// Use legacy build for Node.js compatibility
import * as pdfjsLib from "pdfjs-dist/legacy/build/pdf.mjs";

import { createLogger } from "../../logger";
import { LayoutPage } from "./layout-page";
import { interpretOperatorList, type FontInfo, type OperatorList } from "./operator-list";

const log = createLogger("pdf-source");

export interface LayoutDocument {
  readonly pageCount: number;
  getPage(index: number): Promise<LayoutPage>;
  close(): Promise<void>;
}

export type LayoutLoader = (path: string) => Promise<LayoutDocument>;

/** Store of resolved page resources (fonts) kept by pdfjs on each page. */
interface ObjectStore {
  has(id: string): boolean;
  get(id: string, callback?: (data: unknown) => void): unknown;
}

function toFontInfo(data: unknown): FontInfo {
  const font = typeof data === "object" && data !== null ? data : {};
  const name = "name" in font && typeof font.name === "string" ? font.name : "";
  const descent = "descent" in font && typeof font.descent === "number" ? font.descent : 0;
  const matrix = "fontMatrix" in font && Array.isArray(font.fontMatrix) ? font.fontMatrix : [];
  const widthScale = typeof matrix[0] === "number" ? matrix[0] : 0.001;
  return { name, descent, widthScale };
}

function resolveObject(store: ObjectStore, id: string): Promise<unknown> {
  if (store.has(id)) return Promise.resolve(store.get(id));
  return new Promise((resolve) => store.get(id, resolve));
}

async function loadFonts(store: ObjectStore, list: OperatorList): Promise<Map<string, FontInfo>> {
  const names = new Set<string>();
  for (let i = 0; i < list.fnArray.length; i++) {
    const args = list.argsArray[i];
    if (list.fnArray[i] === pdfjsLib.OPS.setFont && Array.isArray(args) && typeof args[0] === "string") {
      names.add(args[0]);
    }
  }

  const fonts = new Map<string, FontInfo>();
  for (const name of names) {
    fonts.set(name, toFontInfo(await resolveObject(store, name)));
  }
  return fonts;
}

/**
 * Open a PDF for layout extraction. The bytes are copied: pdfjs detaches the
 * buffer it is given.
 */
export async function openLayoutDocument(data: Uint8Array): Promise<LayoutDocument> {
  const doc = await pdfjsLib.getDocument({
    data: new Uint8Array(data),
    disableFontFace: true,
    useSystemFonts: false,
    isEvalSupported: false,
    verbosity: pdfjsLib.VerbosityLevel.ERRORS,
  }).promise;

  log.debug("Opened PDF", { totalPages: doc.numPages });

  return {
    pageCount: doc.numPages,

    async getPage(index: number): Promise<LayoutPage> {
      const page = await doc.getPage(index + 1);
      const [x0, y0, x1, y1] = page.view;
      const operatorList = await page.getOperatorList();
      const store: ObjectStore = page.commonObjs;
      const fonts = await loadFonts(store, operatorList);

      const objects = interpretOperatorList(operatorList, {
        ops: pdfjsLib.OPS,
        view: [x0, y0, x1, y1],
        fonts,
      });
      page.cleanup();

      return new LayoutPage([0, 0, x1 - x0, y1 - y0], objects);
    },

    async close(): Promise<void> {
      await doc.destroy();
    },
  };
}

export const openLayoutFile: LayoutLoader = async (path) => openLayoutDocument(await readFile(path));
