/**
 * Builders for hand-made layout pages. Glyphs are 5pt wide and as tall as their
 * font size; rule lines have no height.
 */

import { LayoutPage } from "../../bankruptcy/layout/layout-page";
import type { LayoutDocument } from "../../bankruptcy/layout/pdf-source";
import type { Color, Glyph, LayoutObject, RuleLine } from "../../bankruptcy/types";

export const GLYPH_WIDTH = 5;

export interface GlyphOptions {
  size?: number;
  fontName?: string;
  color?: Color;
}

export function glyph(char: string, x0: number, top: number, options: GlyphOptions = {}): Glyph {
  const { size = 9, fontName = "Helvetica", color = [0, 0, 0] } = options;
  return {
    kind: "char",
    text: char,
    x0,
    x1: x0 + GLYPH_WIDTH,
    top,
    bottom: top + size,
    width: GLYPH_WIDTH,
    height: size,
    size,
    fontName,
    strokingColor: color,
    nonStrokingColor: color,
  };
}

/** One glyph per character, side by side from `x0`. */
export function text(value: string, x0: number, top: number, options: GlyphOptions = {}): Glyph[] {
  return Array.from(value, (char, index) => glyph(char, x0 + index * GLYPH_WIDTH, top, options));
}

/** Boilerplate label in the forms' Arial. */
export function label(value: string, x0: number, top: number): Glyph[] {
  return text(value, x0, top, { fontName: "ArialMT", size: 7 });
}

export function rule(x0: number, x1: number, top: number, lineWidth = 0.5): RuleLine {
  return { kind: "line", x0, x1, top, bottom: top, width: x1 - x0, height: 0, lineWidth };
}

export const CHECKED = "n";
export const UNCHECKED = "o";

/** A schedule checkbox followed directly by its label. */
export function box(mark: string, caption: string, x0: number, top: number): Glyph[] {
  return [glyph(mark, x0, top, { fontName: "Wingdings" }), ...text(caption, x0 + GLYPH_WIDTH + 1, top)];
}

export function page(objects: readonly (LayoutObject | readonly LayoutObject[])[], width = 612, height = 792): LayoutPage {
  return new LayoutPage([0, 0, width, height], objects.flat());
}

/** Footer line the form finder looks for: the title and the page counter. */
export function footer(title: string, top = 770): Glyph[] {
  return text(`${title} Schedule page 1 of 1`, 36, top, { fontName: "ArialMT", size: 7 });
}

export function documentOf(pages: readonly LayoutPage[]): LayoutDocument {
  return {
    pageCount: pages.length,
    async getPage(index: number): Promise<LayoutPage> {
      const found = pages[index];
      if (!found) throw new Error(`No page ${index}`);
      return found;
    },
    async close(): Promise<void> {},
  };
}
