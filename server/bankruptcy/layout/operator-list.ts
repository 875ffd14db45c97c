/**
 * Interpreter for pdfjs operator lists.
 *
 * Replays the graphics and text state of a page's operator list and produces the
 * positioned glyphs, rule lines and rectangles the extractor works from. Kept free
 * of any pdfjs import: the operator codes and resolved fonts are passed in, so the
 * interpreter can be driven by hand-built operator lists.
 */

import type { Color, Glyph, LayoutObject, LayoutRect, RuleLine } from "../types";

export type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];
const BLACK: Color = [0, 0, 0];

/** Operator codes used by the interpreter (a subset of pdfjs `OPS`). */
export interface OpsTable {
  save: number;
  restore: number;
  transform: number;
  setLineWidth: number;
  paintFormXObjectBegin: number;
  paintFormXObjectEnd: number;
  beginText: number;
  setFont: number;
  setTextMatrix: number;
  moveText: number;
  setLeadingMoveText: number;
  nextLine: number;
  setLeading: number;
  setCharSpacing: number;
  setWordSpacing: number;
  setHScale: number;
  setTextRise: number;
  showText: number;
  setFillRGBColor: number;
  setStrokeRGBColor: number;
  constructPath: number;
  moveTo: number;
  lineTo: number;
  curveTo: number;
  curveTo2: number;
  curveTo3: number;
  closePath: number;
  rectangle: number;
  stroke: number;
  closeStroke: number;
  fill: number;
  eoFill: number;
  fillStroke: number;
  eoFillStroke: number;
  closeFillStroke: number;
  closeEOFillStroke: number;
  endPath: number;
}

export interface OperatorList {
  fnArray: ArrayLike<number>;
  argsArray: ReadonlyArray<unknown>;
}

export interface FontInfo {
  name: string;
  /** Descent as a fraction of the font size (negative below the baseline). */
  descent: number;
  /** Horizontal glyph-space to text-space scale, `fontMatrix[0]`. */
  widthScale: number;
}

const UNKNOWN_FONT: FontInfo = { name: "", descent: 0, widthScale: 0.001 };

export interface InterpretOptions {
  ops: OpsTable;
  /** Page view box `[x0, y0, x1, y1]` in PDF user space. */
  view: readonly [number, number, number, number];
  /** Fonts keyed by the name used in `setFont`. */
  fonts: ReadonlyMap<string, FontInfo>;
}

interface GraphicsState {
  ctm: Matrix;
  fillColor: Color;
  strokeColor: Color;
  lineWidth: number;
  font: FontInfo;
  fontSize: number;
  textMatrix: Matrix;
  lineX: number;
  lineY: number;
  x: number;
  y: number;
  leading: number;
  charSpacing: number;
  wordSpacing: number;
  hScale: number;
  rise: number;
}

interface Subpath {
  points: Array<[number, number]>;
  closed: boolean;
  rect: boolean;
  curved?: boolean;
}

interface ShownGlyph {
  unicode: string;
  width: number;
  isSpace?: boolean;
}

export function multiply(m1: Matrix, m2: Matrix): Matrix {
  return [
    m1[0] * m2[0] + m1[2] * m2[1],
    m1[1] * m2[0] + m1[3] * m2[1],
    m1[0] * m2[2] + m1[2] * m2[3],
    m1[1] * m2[2] + m1[3] * m2[3],
    m1[0] * m2[4] + m1[2] * m2[5] + m1[4],
    m1[1] * m2[4] + m1[3] * m2[5] + m1[5],
  ];
}

export function applyMatrix(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

function isArrayLike(value: unknown): value is ArrayLike<unknown> {
  return typeof value === "object" && value !== null && "length" in value && typeof value.length === "number";
}

function toNumbers(value: unknown): number[] {
  if (!isArrayLike(value)) return [];
  return Array.from(value, (item) => (typeof item === "number" ? item : Number.NaN));
}

function toMatrix(values: number[]): Matrix | null {
  if (values.length < 6 || values.slice(0, 6).some((v) => !Number.isFinite(v))) return null;
  return [values[0], values[1], values[2], values[3], values[4], values[5]];
}

function isShownGlyph(value: unknown): value is ShownGlyph {
  return (
    typeof value === "object" &&
    value !== null &&
    "unicode" in value &&
    typeof value.unicode === "string" &&
    "width" in value &&
    typeof value.width === "number" &&
    (!("isSpace" in value) || typeof value.isSpace === "boolean")
  );
}

/**
 * Colour operands arrive either as 0-255 components or as a `#rrggbb` string,
 * depending on the pdfjs release.
 */
export function readColor(args: unknown): Color | null {
  const first = isArrayLike(args) && args.length > 0 ? args[0] : args;
  if (typeof first === "string") {
    const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(first);
    if (!match) return null;
    return [parseInt(match[1], 16) / 255, parseInt(match[2], 16) / 255, parseInt(match[3], 16) / 255];
  }

  const values = toNumbers(isArrayLike(first) ? first : args);
  if (values.length < 3 || values.slice(0, 3).some((v) => !Number.isFinite(v))) return null;
  const scale = values.slice(0, 3).some((v) => v > 1) ? 255 : 1;
  return [values[0] / scale, values[1] / scale, values[2] / scale];
}

function bounds(points: Array<[number, number]>, view: InterpretOptions["view"]) {
  const xs = points.map(([x]) => x - view[0]);
  const tops = points.map(([, y]) => view[3] - y);
  const x0 = Math.min(...xs);
  const x1 = Math.max(...xs);
  const top = Math.min(...tops);
  const bottom = Math.max(...tops);
  return { x0, x1, top, bottom, width: x1 - x0, height: bottom - top };
}

function isAxisAlignedBox(points: Array<[number, number]>): boolean {
  const corners = points.length === 5 && points[0][0] === points[4][0] && points[0][1] === points[4][1]
    ? points.slice(0, 4)
    : points;
  if (corners.length !== 4) return false;

  return corners.every(([x, y], i) => {
    const [nx, ny] = corners[(i + 1) % 4];
    return x === nx || y === ny;
  });
}

/**
 * Replay an operator list and return its layout objects in content order.
 */
export function interpretOperatorList(list: OperatorList, options: InterpretOptions): LayoutObject[] {
  const { ops, view, fonts } = options;
  const objects: LayoutObject[] = [];
  const stack: GraphicsState[] = [];
  let path: Subpath[] = [];

  let state: GraphicsState = {
    ctm: [...IDENTITY],
    fillColor: BLACK,
    strokeColor: BLACK,
    lineWidth: 1,
    font: UNKNOWN_FONT,
    fontSize: 0,
    textMatrix: [...IDENTITY],
    lineX: 0,
    lineY: 0,
    x: 0,
    y: 0,
    leading: 0,
    charSpacing: 0,
    wordSpacing: 0,
    hScale: 1,
    rise: 0,
  };

  const save = () => stack.push({ ...state, ctm: [...state.ctm], textMatrix: [...state.textMatrix] });
  const restore = () => {
    const previous = stack.pop();
    if (previous) state = previous;
  };

  const moveText = (dx: number, dy: number) => {
    state.lineX += dx;
    state.lineY += dy;
    state.x = state.lineX;
    state.y = state.lineY;
  };

  const currentSubpath = (): Subpath | undefined => path.at(-1);

  const addPoint = (x: number, y: number) => {
    const point = applyMatrix(state.ctm, x, y);
    const subpath = currentSubpath();
    if (!subpath || subpath.closed || subpath.rect) {
      path.push({ points: [point], closed: false, rect: false });
    } else {
      subpath.points.push(point);
    }
  };

  // Curves never form rule lines; only the end point is kept.
  const addCurve = (x: number, y: number) => {
    addPoint(x, y);
    const subpath = currentSubpath();
    if (subpath) subpath.curved = true;
  };

  const constructPath = (args: unknown) => {
    if (!isArrayLike(args)) return;
    const pathOps = toNumbers(args[0]);
    const coords = toNumbers(args[1]);
    let j = 0;

    for (const op of pathOps) {
      if (op === ops.moveTo) {
        path.push({ points: [applyMatrix(state.ctm, coords[j], coords[j + 1])], closed: false, rect: false });
        j += 2;
      } else if (op === ops.lineTo) {
        addPoint(coords[j], coords[j + 1]);
        j += 2;
      } else if (op === ops.curveTo) {
        addCurve(coords[j + 4], coords[j + 5]);
        j += 6;
      } else if (op === ops.curveTo2 || op === ops.curveTo3) {
        addCurve(coords[j + 2], coords[j + 3]);
        j += 4;
      } else if (op === ops.closePath) {
        const subpath = currentSubpath();
        if (subpath) subpath.closed = true;
      } else if (op === ops.rectangle) {
        const [x, y, w, h] = coords.slice(j, j + 4);
        path.push({
          points: [
            applyMatrix(state.ctm, x, y),
            applyMatrix(state.ctm, x + w, y),
            applyMatrix(state.ctm, x + w, y + h),
            applyMatrix(state.ctm, x, y + h),
          ],
          closed: true,
          rect: true,
        });
        j += 4;
      }
    }
  };

  const paintPath = () => {
    for (const subpath of path) {
      const box = bounds(subpath.points, view);
      if (subpath.points.length === 2 && !subpath.closed && !subpath.curved) {
        const line: RuleLine = { kind: "line", ...box, lineWidth: state.lineWidth };
        objects.push(line);
      } else if (subpath.rect || (subpath.closed && isAxisAlignedBox(subpath.points))) {
        const rect: LayoutRect = { kind: "rect", ...box, lineWidth: state.lineWidth };
        objects.push(rect);
      }
    }
    path = [];
  };

  const showText = (args: unknown) => {
    const shown = isArrayLike(args) ? args[0] : undefined;
    if (!isArrayLike(shown) || state.fontSize === 0) return;

    const { font, fontSize, hScale, charSpacing, wordSpacing } = state;
    const matrix = multiply(state.ctm, state.textMatrix);
    const baseline = state.y + state.rise;
    const descent = font.descent * fontSize;
    let x = 0;

    for (const entry of Array.from(shown)) {
      if (typeof entry === "number") {
        x -= (entry * fontSize) / 1000;
        continue;
      }
      if (!isShownGlyph(entry)) continue;

      const advance = entry.width * fontSize * font.widthScale;
      const left = state.x + x * hScale;
      const right = left + advance * hScale;
      const box = bounds(
        [
          applyMatrix(matrix, left, baseline + descent),
          applyMatrix(matrix, right, baseline + descent),
          applyMatrix(matrix, left, baseline + descent + fontSize),
          applyMatrix(matrix, right, baseline + descent + fontSize),
        ],
        view,
      );

      const glyph: Glyph = {
        kind: "char",
        ...box,
        text: entry.unicode,
        fontName: font.name,
        size: box.height,
        strokingColor: state.strokeColor,
        nonStrokingColor: state.fillColor,
      };
      objects.push(glyph);

      const spacing = (entry.isSpace ? wordSpacing : 0) + charSpacing;
      x += advance + spacing;
    }

    state.x += x * hScale;
  };

  for (let i = 0; i < list.fnArray.length; i++) {
    const fn = list.fnArray[i];
    const args = list.argsArray[i];
    const values = toNumbers(args);

    switch (fn) {
      case ops.save:
        save();
        break;
      case ops.restore:
        restore();
        break;
      case ops.transform: {
        const m = toMatrix(values);
        if (m) state.ctm = multiply(state.ctm, m);
        break;
      }
      case ops.paintFormXObjectBegin: {
        save();
        const m = isArrayLike(args) ? toMatrix(toNumbers(args[0])) : null;
        if (m) state.ctm = multiply(state.ctm, m);
        break;
      }
      case ops.paintFormXObjectEnd:
        restore();
        break;
      case ops.setLineWidth:
        state.lineWidth = values[0] ?? state.lineWidth;
        break;
      case ops.setFillRGBColor:
        state.fillColor = readColor(args) ?? state.fillColor;
        break;
      case ops.setStrokeRGBColor:
        state.strokeColor = readColor(args) ?? state.strokeColor;
        break;
      case ops.beginText:
        state.textMatrix = [...IDENTITY];
        state.x = state.lineX = 0;
        state.y = state.lineY = 0;
        break;
      case ops.setFont: {
        const name = isArrayLike(args) && typeof args[0] === "string" ? args[0] : "";
        state.font = fonts.get(name) ?? UNKNOWN_FONT;
        state.fontSize = Math.abs(values[1] ?? 0);
        break;
      }
      case ops.setTextMatrix: {
        const m = toMatrix(values) ?? (isArrayLike(args) ? toMatrix(toNumbers(args[0])) : null);
        if (m) {
          state.textMatrix = m;
          state.x = state.lineX = 0;
          state.y = state.lineY = 0;
        }
        break;
      }
      case ops.moveText:
        moveText(values[0], values[1]);
        break;
      case ops.setLeadingMoveText:
        state.leading = values[1];
        moveText(values[0], values[1]);
        break;
      case ops.nextLine:
        moveText(0, state.leading);
        break;
      case ops.setLeading:
        state.leading = -values[0];
        break;
      case ops.setCharSpacing:
        state.charSpacing = values[0];
        break;
      case ops.setWordSpacing:
        state.wordSpacing = values[0];
        break;
      case ops.setHScale:
        state.hScale = values[0] / 100;
        break;
      case ops.setTextRise:
        state.rise = values[0];
        break;
      case ops.showText:
        showText(args);
        break;
      case ops.constructPath:
        constructPath(args);
        break;
      case ops.stroke:
      case ops.closeStroke:
      case ops.fill:
      case ops.eoFill:
      case ops.fillStroke:
      case ops.eoFillStroke:
      case ops.closeFillStroke:
      case ops.closeEOFillStroke:
        paintPath();
        break;
      case ops.endPath:
        path = [];
        break;
    }
  }

  return objects;
}
