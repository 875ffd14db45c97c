/**
 * Geometry shared by every layout object. Coordinates are PDF points with the
 * origin at the top-left corner of the page: `top` grows downwards.
 */
export interface Box {
  x0: number;
  x1: number;
  top: number;
  bottom: number;
}

/** `[x0, top, x1, bottom]` */
export type BBox = readonly [number, number, number, number];

/** RGB components in the 0..1 range. */
export type Color = readonly [number, number, number];

interface LayoutObjectBase extends Box {
  width: number;
  height: number;
}

export interface Glyph extends LayoutObjectBase {
  kind: "char";
  text: string;
  fontName: string;
  size: number;
  strokingColor: Color;
  nonStrokingColor: Color;
}

/** A straight stroked segment: table borders, field underlines, separators. */
export interface RuleLine extends LayoutObjectBase {
  kind: "line";
  lineWidth: number;
}

export interface LayoutRect extends LayoutObjectBase {
  kind: "rect";
  lineWidth: number;
}

export type LayoutObject = Glyph | RuleLine | LayoutRect;

export type LayoutPredicate = (obj: LayoutObject) => boolean;

export interface Word extends Box {
  text: string;
}
