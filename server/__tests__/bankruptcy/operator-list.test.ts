import { describe, it, expect } from "vitest";
import {
  interpretOperatorList,
  multiply,
  readColor,
  type FontInfo,
  type OpsTable,
  type OperatorList,
} from "../../bankruptcy/layout/operator-list";
import type { Glyph, RuleLine } from "../../bankruptcy/types";

// Operator codes are arbitrary here; the interpreter only compares them.
const OPS: OpsTable = {
  save: 1,
  restore: 2,
  transform: 3,
  setLineWidth: 4,
  paintFormXObjectBegin: 5,
  paintFormXObjectEnd: 6,
  beginText: 7,
  setFont: 8,
  setTextMatrix: 9,
  moveText: 10,
  setLeadingMoveText: 11,
  nextLine: 12,
  setLeading: 13,
  setCharSpacing: 14,
  setWordSpacing: 15,
  setHScale: 16,
  setTextRise: 17,
  showText: 18,
  setFillRGBColor: 19,
  setStrokeRGBColor: 20,
  constructPath: 21,
  moveTo: 22,
  lineTo: 23,
  curveTo: 24,
  curveTo2: 25,
  curveTo3: 26,
  closePath: 27,
  rectangle: 28,
  stroke: 29,
  closeStroke: 30,
  fill: 31,
  eoFill: 32,
  fillStroke: 33,
  eoFillStroke: 34,
  closeFillStroke: 35,
  closeEOFillStroke: 36,
  endPath: 37,
};

const fonts = new Map<string, FontInfo>([["F1", { name: "Helvetica", descent: -0.2, widthScale: 0.001 }]]);

type Step = [keyof OpsTable, unknown];

function run(steps: Step[]) {
  const list: OperatorList = {
    fnArray: steps.map(([name]) => OPS[name]),
    argsArray: steps.map(([, args]) => args),
  };
  return interpretOperatorList(list, { ops: OPS, view: [0, 0, 612, 792], fonts });
}

const isLine = (obj: { kind: string }): obj is RuleLine => obj.kind === "line";
const isGlyph = (obj: { kind: string }): obj is Glyph => obj.kind === "char";

describe("Operator list interpreter", () => {
  // ==========================================================================
  // Paths
  // ==========================================================================
  describe("paths", () => {
    it("should turn a stroked two-point subpath into a rule line in top-down coordinates", () => {
      const objects = run([
        ["setLineWidth", [0.5]],
        ["constructPath", [[OPS.moveTo, OPS.lineTo], [50, 692, 250, 692]]],
        ["stroke", null],
      ]);

      expect(objects).toEqual([
        { kind: "line", x0: 50, x1: 250, top: 100, bottom: 100, width: 200, height: 0, lineWidth: 0.5 },
      ]);
    });

    it("should turn a rectangle into a rect object", () => {
      const objects = run([
        ["constructPath", [[OPS.rectangle], [10, 700, 20, 20]]],
        ["fill", null],
      ]);

      expect(objects).toEqual([
        { kind: "rect", x0: 10, x1: 30, top: 72, bottom: 92, width: 20, height: 20, lineWidth: 1 },
      ]);
    });

    it("should discard a path ended without painting", () => {
      const objects = run([
        ["constructPath", [[OPS.moveTo, OPS.lineTo], [0, 0, 100, 0]]],
        ["endPath", null],
        ["stroke", null],
      ]);
      expect(objects).toEqual([]);
    });

    it("should not report curves as rule lines", () => {
      const objects = run([
        ["constructPath", [[OPS.moveTo, OPS.curveTo], [0, 0, 10, 10, 20, 10, 30, 0]]],
        ["stroke", null],
      ]);
      expect(objects).toEqual([]);
    });

    it("should apply the transformation matrix and restore it afterwards", () => {
      const objects = run([
        ["save", null],
        ["transform", [1, 0, 0, 1, 10, 0]],
        ["constructPath", [[OPS.moveTo, OPS.lineTo], [0, 692, 100, 692]]],
        ["stroke", null],
        ["restore", null],
        ["constructPath", [[OPS.moveTo, OPS.lineTo], [0, 592, 100, 592]]],
        ["stroke", null],
      ]);

      const lines = objects.filter(isLine);
      expect(lines.map((line) => [line.x0, line.x1, line.top])).toEqual([
        [10, 110, 100],
        [0, 100, 200],
      ]);
    });

    it("should place form XObject content through the form matrix", () => {
      const objects = run([
        ["paintFormXObjectBegin", [[1, 0, 0, 1, 0, -100], null]],
        ["constructPath", [[OPS.moveTo, OPS.lineTo], [0, 692, 50, 692]]],
        ["stroke", null],
        ["paintFormXObjectEnd", null],
      ]);
      expect(objects.filter(isLine)[0].top).toBe(200);
    });
  });

  // ==========================================================================
  // Text
  // ==========================================================================
  describe("text", () => {
    it("should position glyphs from the text matrix, font size and advance widths", () => {
      const objects = run([
        ["beginText", null],
        ["setFont", ["F1", 9]],
        ["setTextMatrix", [1, 0, 0, 1, 100, 700]],
        ["showText", [[{ unicode: "A", width: 500 }, { unicode: "B", width: 500 }]]],
      ]);

      const glyphs = objects.filter(isGlyph);
      expect(glyphs.map((g) => g.text)).toEqual(["A", "B"]);
      expect(glyphs[0].fontName).toBe("Helvetica");
      expect(glyphs[0].x0).toBeCloseTo(100);
      expect(glyphs[0].x1).toBeCloseTo(104.5);
      expect(glyphs[1].x0).toBeCloseTo(104.5);
      expect(glyphs[0].top).toBeCloseTo(84.8);
      expect(glyphs[0].bottom).toBeCloseTo(93.8);
      expect(glyphs[0].size).toBeCloseTo(9);
    });

    it("should move by kerning adjustments between glyphs", () => {
      const objects = run([
        ["beginText", null],
        ["setFont", ["F1", 9]],
        ["setTextMatrix", [1, 0, 0, 1, 100, 700]],
        ["showText", [[{ unicode: "A", width: 500 }, -500, { unicode: "B", width: 500 }]]],
      ]);
      expect(objects.filter(isGlyph)[1].x0).toBeCloseTo(109);
    });

    it("should continue after the previous show and follow line moves", () => {
      const objects = run([
        ["beginText", null],
        ["setFont", ["F1", 10]],
        ["moveText", [50, 700]],
        ["showText", [[{ unicode: "a", width: 500 }]]],
        ["showText", [[{ unicode: "b", width: 500 }]]],
        ["setLeading", [12]],
        ["nextLine", null],
        ["showText", [[{ unicode: "c", width: 500 }]]],
      ]);

      const [a, b, c] = objects.filter(isGlyph);
      expect(a.x0).toBeCloseTo(50);
      expect(b.x0).toBeCloseTo(55);
      expect(c.x0).toBeCloseTo(50);
      expect(c.top - a.top).toBeCloseTo(12);
    });

    it("should record the fill colour as the glyph colour", () => {
      const objects = run([
        ["setFillRGBColor", ["#ffffff"]],
        ["beginText", null],
        ["setFont", ["F1", 9]],
        ["showText", [[{ unicode: "1", width: 500 }]]],
      ]);
      expect(objects.filter(isGlyph)[0].nonStrokingColor).toEqual([1, 1, 1]);
    });

    it("should skip text shown before a font is set", () => {
      expect(run([["showText", [[{ unicode: "x", width: 500 }]]]])).toEqual([]);
    });
  });

  // ==========================================================================
  // Helpers
  // ==========================================================================
  describe("readColor", () => {
    it("should read hex strings and byte or unit components", () => {
      expect(readColor(["#ff0000"])).toEqual([1, 0, 0]);
      expect(readColor([255, 0, 0])).toEqual([1, 0, 0]);
      expect(readColor([0.5, 0.5, 0.5])).toEqual([0.5, 0.5, 0.5]);
    });

    it("should reject operands that are not colours", () => {
      expect(readColor(["blue"])).toBeNull();
      expect(readColor([1, 2])).toBeNull();
    });
  });

  describe("multiply", () => {
    it("should compose translations", () => {
      expect(multiply([1, 0, 0, 1, 10, 20], [1, 0, 0, 1, 5, 5])).toEqual([1, 0, 0, 1, 15, 25]);
    });
  });
});
