import type { BBox, Glyph, LayoutObject, LayoutPredicate, LayoutRect, RuleLine, Word } from "../types";

export interface TextOptions {
  /** Horizontal gap (points) beyond which a space is inserted between glyphs. */
  xTolerance?: number;
  /** Vertical distance (points) within which glyph tops share a line. */
  yTolerance?: number;
}

const DEFAULT_TOLERANCE = 3;

/**
 * Group values into chains: a value joins the current group when it lies within
 * `tolerance` of the previous value.
 */
export function clusterValues(values: number[], tolerance: number): number[][] {
  const sorted = [...new Set(values)].sort((a, b) => a - b);
  if (sorted.length === 0) return [];

  const groups: number[][] = [];
  let current = [sorted[0]];
  let last = sorted[0];

  for (const value of sorted.slice(1)) {
    if (value <= last + tolerance) {
      current.push(value);
    } else {
      groups.push(current);
      current = [value];
    }
    last = value;
  }
  groups.push(current);

  return groups;
}

/** Cluster glyphs into visual lines by their `top`, keeping content order inside each line. */
function clusterByTop<T extends { top: number }>(items: readonly T[], tolerance: number): T[][] {
  const clusterOf = new Map<number, number>();
  clusterValues(items.map((item) => item.top), tolerance).forEach((group, index) => {
    for (const value of group) clusterOf.set(value, index);
  });

  const lines: T[][] = [];
  for (const item of items) {
    const index = clusterOf.get(item.top) ?? 0;
    (lines[index] ??= []).push(item);
  }
  return lines.filter((line) => line.length > 0);
}

function collateLine(glyphs: Glyph[], xTolerance: number): string {
  let text = "";
  let lastX1: number | undefined;

  for (const glyph of [...glyphs].sort((a, b) => a.x0 - b.x0)) {
    if (lastX1 !== undefined && glyph.x0 > lastX1 + xTolerance) {
      text += " ";
    }
    lastX1 = glyph.x1;
    text += glyph.text;
  }
  return text;
}

function lineWords(glyphs: Glyph[], xTolerance: number): Word[] {
  const words: Glyph[][] = [];
  let current: Glyph[] = [];

  for (const glyph of [...glyphs].sort((a, b) => a.x0 - b.x0)) {
    if (glyph.text.trim() === "") {
      if (current.length > 0) {
        words.push(current);
        current = [];
      }
      continue;
    }
    const last = current.at(-1);
    if (last && glyph.x0 > last.x1 + xTolerance) {
      words.push(current);
      current = [];
    }
    current.push(glyph);
  }
  if (current.length > 0) words.push(current);

  return words.map((chars) => ({
    text: chars.map((c) => c.text).join(""),
    x0: Math.min(...chars.map((c) => c.x0)),
    x1: Math.max(...chars.map((c) => c.x1)),
    top: Math.min(...chars.map((c) => c.top)),
    bottom: Math.max(...chars.map((c) => c.bottom)),
  }));
}

/**
 * Clip an object to a box. Objects that merely touch the box along one edge are
 * kept (a rule line lying exactly on a crop edge belongs to the crop); objects
 * meeting it at a single point are not.
 */
function clip<T extends LayoutObject>(obj: T, [x0, top, x1, bottom]: BBox): T | null {
  const left = Math.max(obj.x0, x0);
  const right = Math.min(obj.x1, x1);
  const upper = Math.max(obj.top, top);
  const lower = Math.min(obj.bottom, bottom);
  const width = right - left;
  const height = lower - upper;

  if (width < 0 || height < 0 || width + height <= 0) return null;

  return { ...obj, x0: left, x1: right, top: upper, bottom: lower, width, height };
}

/**
 * Immutable view over the glyphs, rule lines and rectangles of one page (or of a
 * region of one). Every operation returns a new view.
 */
export class LayoutPage {
  readonly bbox: BBox;
  readonly objects: readonly LayoutObject[];

  constructor(bbox: BBox, objects: readonly LayoutObject[]) {
    this.bbox = bbox;
    this.objects = objects;
  }

  get width(): number {
    return this.bbox[2] - this.bbox[0];
  }

  get height(): number {
    return this.bbox[3] - this.bbox[1];
  }

  get glyphs(): Glyph[] {
    return this.objects.filter((obj): obj is Glyph => obj.kind === "char");
  }

  get lines(): RuleLine[] {
    return this.objects.filter((obj): obj is RuleLine => obj.kind === "line");
  }

  get rects(): LayoutRect[] {
    return this.objects.filter((obj): obj is LayoutRect => obj.kind === "rect");
  }

  crop(bbox: BBox): LayoutPage {
    const kept: LayoutObject[] = [];
    for (const obj of this.objects) {
      const clipped = clip(obj, bbox);
      if (clipped) kept.push(clipped);
    }
    return new LayoutPage(bbox, kept);
  }

  filter(predicate: LayoutPredicate): LayoutPage {
    return new LayoutPage(this.bbox, this.objects.filter(predicate));
  }

  mapGlyphs(transform: (glyph: Glyph) => Glyph): LayoutPage {
    return new LayoutPage(
      this.bbox,
      this.objects.map((obj) => (obj.kind === "char" ? transform(obj) : obj)),
    );
  }

  /** Text of the page, one line per cluster of glyph tops. Empty when there are no glyphs. */
  extractText(options: TextOptions = {}): string {
    const xTolerance = options.xTolerance ?? DEFAULT_TOLERANCE;
    const yTolerance = options.yTolerance ?? DEFAULT_TOLERANCE;

    return clusterByTop(this.glyphs, yTolerance)
      .map((line) => collateLine(line, xTolerance))
      .join("\n");
  }

  extractWords(options: TextOptions = {}): Word[] {
    const xTolerance = options.xTolerance ?? DEFAULT_TOLERANCE;
    const yTolerance = options.yTolerance ?? DEFAULT_TOLERANCE;

    return clusterByTop(this.glyphs, yTolerance).flatMap((line) => lineWords(line, xTolerance));
  }
}
