/**
 * Checkbox glyph normalisation and decoding.
 *
 * The forms draw checkboxes as Wingdings glyphs. Normalisation rewrites those
 * glyphs into textual tokens on a copy of the page; decoding reads the tokenised
 * text back into the option categories a creditor or property section carries.
 */

import { CHECKBOX_TOLERANCES } from "./constants";
import { isCheckboxGlyph } from "./filters";
import type { LayoutPage } from "./layout/layout-page";
import { createLogger } from "../logger";
import type { Glyph } from "./types";

const log = createLogger("checkbox");

export type CheckboxMark = "checked" | "unchecked";

export type CheckboxClassifier = (glyph: Glyph) => CheckboxMark | null;

export interface CheckboxTokens {
  checked: string;
  unchecked: string;
}

/** Tokens used when reading boxes with their labels: each box starts its own line. */
export const LINE_TOKENS: CheckboxTokens = { checked: "\n[√] ", unchecked: "\n[] " };

/** Tokens used when boxes are read inline with other content. */
export const INLINE_TOKENS: CheckboxTokens = { checked: "[√]", unchecked: "[]" };

const CHECKED_CODES = ["cid:132", "\uf06e", "n"];
const UNCHECKED_CODES = ["cid:134", "\uf06f", "o"];

/** Schedules draw a filled square (`n`) for checked boxes and an outline (`o`) otherwise. */
export const classifyScheduleBox: CheckboxClassifier = (glyph) => {
  if (!isCheckboxGlyph(glyph)) return null;
  if (CHECKED_CODES.some((code) => glyph.text.includes(code))) return "checked";
  if (UNCHECKED_CODES.some((code) => glyph.text.includes(code))) return "unchecked";
  return null;
};

/** The summary form uses a check mark glyph; any other Wingdings glyph is an empty box. */
export const classifySummaryBox: CheckboxClassifier = (glyph) => {
  if (!isCheckboxGlyph(glyph)) return null;
  return glyph.text.includes("2") || glyph.text === "\uf06e" ? "checked" : "unchecked";
};

/** Copy of `page` with every classified checkbox glyph replaced by its token. */
export function withCheckboxTokens(
  page: LayoutPage,
  classify: CheckboxClassifier,
  tokens: CheckboxTokens,
): LayoutPage {
  return page.mapGlyphs((glyph) => {
    const mark = classify(glyph);
    return mark ? { ...glyph, text: tokens[mark] } : glyph;
  });
}

// ============================================================================
// Decoding
// ============================================================================

export const propertyTypes = [
  "Single-family home",
  "Duplex or multi-unit building",
  "Condominium or cooperative",
  "Manufactured or mobile home",
  "Land",
  "Investment property",
  "Timeshare",
  "Other",
] as const;

const COMMUNITY_TERMS = ["community", "see instructions", "claim relates"];
const INFO_TERMS = ["contingent", "unliquidated", "disputed"];
const CLAIM_TYPE_TERMS = [
  "domestic",
  "taxes",
  "death",
  "specify",
  "loans",
  "obligations",
  "pension",
  "including",
  "judgment",
  "statutory",
  "agreement",
];

const NONPRIORITY_HEADING = "Type of NONPRIORITY unsecured claim:";

export interface CheckboxSet {
  debtor: string[];
  community: string[];
  offset: string[];
  info: string[];
  claim_type: string[];
  property: string[];
}

export type CheckboxRead = { readable: true; boxes: CheckboxSet } | { readable: false };

export type CheckboxCategory = keyof CheckboxSet;

const categories: CheckboxCategory[] = ["debtor", "community", "offset", "info", "claim_type", "property"];

/** Label of a box line: everything after the token. */
function boxLabel(line: string): string {
  const space = line.indexOf(" ");
  return space === -1 ? "" : line.slice(space + 1).trim();
}

const containsAny = (text: string, terms: readonly string[]): boolean => terms.some((term) => text.includes(term));

function classifyBoxLines(boxLines: string[]): CheckboxSet {
  const checked = boxLines.filter((line) => line.includes("√"));
  const labelsWhere = (test: (line: string) => boolean) => checked.filter(test).map(boxLabel);

  const propertyLabels = labelsWhere((line) => containsAny(line, propertyTypes));
  let claimType = labelsWhere((line) => containsAny(line.toLowerCase(), CLAIM_TYPE_TERMS));
  if (claimType.length > 0 && claimType[0].includes("Specify")) {
    claimType = ["Other. Specify"];
  }

  return {
    debtor: labelsWhere((line) => line.toLowerCase().includes("debtor")),
    community: labelsWhere((line) => containsAny(line.toLowerCase(), COMMUNITY_TERMS)),
    offset: labelsWhere((line) => line.includes("No") || line.includes("Yes")).filter((label) =>
      /^(Yes|No)$/.test(label),
    ),
    info: labelsWhere((line) => containsAny(line.toLowerCase(), INFO_TERMS)),
    claim_type: claimType,
    property: propertyTypes.filter((type) => propertyLabels.some((label) => label.includes(type))),
  };
}

/**
 * Decode the checkboxes of a region.
 *
 * The region is read once per vertical tolerance; a pass that finds no empty box
 * at all means the glyphs did not decode, and the whole region is unreadable.
 * Later (looser) passes only fill categories the earlier passes left empty.
 */
export function decodeCheckboxes(
  region: LayoutPage,
  tolerances: readonly number[] = CHECKBOX_TOLERANCES,
): CheckboxRead {
  const tokenised = withCheckboxTokens(region, classifyScheduleBox, LINE_TOKENS);
  let boxes: CheckboxSet | undefined;

  for (const yTolerance of tolerances) {
    const text = tokenised.extractText({ yTolerance }).replaceAll(NONPRIORITY_HEADING, "");
    if (!text.includes("[]")) {
      log.debug("No unchecked boxes found; region unreadable", { yTolerance });
      return { readable: false };
    }

    const boxLines = text
      .split(/\r?\n/)
      .filter((line) => line.includes("["))
      .map((line) => line.replaceAll("  ", " "));
    const pass = classifyBoxLines(boxLines);

    if (!boxes) {
      boxes = pass;
      continue;
    }
    for (const category of categories) {
      if (boxes[category].length === 0 && pass[category].length > 0) {
        boxes[category] = pass[category];
      }
    }
  }

  return boxes ? { readable: true, boxes } : { readable: false };
}
