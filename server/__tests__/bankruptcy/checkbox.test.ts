import { describe, it, expect } from "vitest";
import {
  INLINE_TOKENS,
  classifyScheduleBox,
  classifySummaryBox,
  decodeCheckboxes,
  withCheckboxTokens,
} from "../../bankruptcy/checkbox";
import { CHECKED, UNCHECKED, box, glyph, page, text } from "../fixtures/layout";

const wingdings = (char: string) => glyph(char, 60, 100, { fontName: "Wingdings" });

describe("Checkboxes", () => {
  // ==========================================================================
  // Classification
  // ==========================================================================
  describe("classifyScheduleBox", () => {
    it("should read filled squares as checked and outlines as unchecked", () => {
      expect(classifyScheduleBox(wingdings("n"))).toBe("checked");
      expect(classifyScheduleBox(wingdings("\uf06e"))).toBe("checked");
      expect(classifyScheduleBox(wingdings("o"))).toBe("unchecked");
      expect(classifyScheduleBox(wingdings("(cid:134)"))).toBe("unchecked");
    });

    it("should ignore glyphs that are not checkboxes", () => {
      expect(classifyScheduleBox(glyph("n", 60, 100))).toBeNull();
      expect(classifyScheduleBox(wingdings("x"))).toBeNull();
    });
  });

  describe("classifySummaryBox", () => {
    it("should read the check mark as checked and any other box as unchecked", () => {
      expect(classifySummaryBox(wingdings("2"))).toBe("checked");
      expect(classifySummaryBox(wingdings("\uf06e"))).toBe("checked");
      expect(classifySummaryBox(wingdings("q"))).toBe("unchecked");
      expect(classifySummaryBox(glyph("2", 60, 100))).toBeNull();
    });
  });

  describe("withCheckboxTokens", () => {
    it("should replace box glyphs with tokens on a copy of the page", () => {
      const source = page([wingdings("n"), glyph("o", 70, 100, { fontName: "Wingdings" })]);
      const tokenised = withCheckboxTokens(source, classifyScheduleBox, INLINE_TOKENS);
      expect(tokenised.extractText()).toBe("[√] []");
      expect(source.glyphs[0].text).toBe("n");
    });
  });

  // ==========================================================================
  // Decoding
  // ==========================================================================
  describe("decodeCheckboxes", () => {
    it("should sort checked labels into their categories", () => {
      const region = page([
        box(CHECKED, "Debtor 1 only", 60, 100),
        box(UNCHECKED, "Debtor 2 only", 60, 120),
        box(CHECKED, "Contingent", 60, 160),
        box(UNCHECKED, "Disputed", 60, 180),
        box(CHECKED, "No", 60, 200),
        box(UNCHECKED, "Yes", 60, 220),
        box(CHECKED, "Check if this claim relates to a community debt", 60, 240),
        box(CHECKED, "Student loans", 60, 260),
      ]);

      expect(decodeCheckboxes(region)).toEqual({
        readable: true,
        boxes: {
          debtor: ["Debtor 1 only"],
          community: ["Check if this claim relates to a community debt"],
          offset: ["No"],
          info: ["Contingent"],
          claim_type: ["Student loans"],
          property: [],
        },
      });
    });

    it("should decode the same region identically every time", () => {
      const region = page([
        box(CHECKED, "Debtor 2 only", 60, 100),
        box(UNCHECKED, "Disputed", 60, 120),
        box(CHECKED, "Yes", 60, 140),
      ]);
      const before = region.extractText();

      const first = decodeCheckboxes(region);
      expect(decodeCheckboxes(region)).toEqual(first);
      expect(region.extractText()).toBe(before);
    });

    it("should collapse an other-claim label to its option name", () => {
      const region = page([box(CHECKED, "Other. Specify", 60, 100), box(UNCHECKED, "Taxes", 60, 120)]);
      const read = decodeCheckboxes(region);
      expect(read.readable && read.boxes.claim_type).toEqual(["Other. Specify"]);
    });

    it("should report property types that were checked", () => {
      const region = page([box(CHECKED, "Single-family home", 60, 100), box(UNCHECKED, "Land", 60, 120)]);
      const read = decodeCheckboxes(region);
      expect(read.readable && read.boxes.property).toEqual(["Single-family home"]);
    });

    it("should be unreadable when no empty box decodes", () => {
      expect(decodeCheckboxes(page([box(CHECKED, "Debtor 1 only", 60, 100)]))).toEqual({ readable: false });
      expect(decodeCheckboxes(page([text("No boxes here", 60, 100)]))).toEqual({ readable: false });
    });

    it("should fill empty categories from looser tolerances", () => {
      const region = page([
        glyph(CHECKED, 60, 100, { fontName: "Wingdings" }),
        text("Debtor 1 only", 66, 104),
        box(UNCHECKED, "Disputed", 60, 140),
      ]);

      const strict = decodeCheckboxes(region, [3]);
      const loose = decodeCheckboxes(region, [3, 4]);
      expect(strict.readable && strict.boxes.debtor).toEqual([]);
      expect(loose.readable && loose.boxes.debtor).toEqual(["Debtor 1 only"]);
    });
  });
});
