/**
 * Predicates over layout objects. Each is a pure function of one object; checkbox
 * glyphs are rewritten beforehand by ./checkbox, never here.
 */

import {
  AB_BOILERPLATE_FONTS,
  CHECKBOX_FONT,
  FONT_ARIAL,
  INPUT_FONT_MAX,
  INPUT_FONT_MIN,
  LEFT_MARGIN_X,
  MIN_RULE_WIDTH,
} from "./constants";
import type { Glyph, LayoutObject } from "./types";

const KEY_START = /^[0-9.]/;

const isGlyph = (obj: LayoutObject): obj is Glyph => obj.kind === "char";

const isInputSize = (glyph: Glyph): boolean => glyph.size > INPUT_FONT_MIN && glyph.size < INPUT_FONT_MAX;

const isWhite = (glyph: Glyph): boolean => glyph.nonStrokingColor.every((component) => component >= 0.99);

/** Item numbers ("2.1", "4.") printed in the left margin. */
const isMarginKey = (glyph: Glyph): boolean => glyph.x0 < LEFT_MARGIN_X && KEY_START.test(glyph.text);

export const isCheckboxGlyph = (obj: LayoutObject): boolean =>
  isGlyph(obj) && obj.fontName.includes(CHECKBOX_FONT);

/** Lines at least 10pt wide. */
export function lineFilter(obj: LayoutObject): boolean {
  return obj.width >= MIN_RULE_WIDTH;
}

/** Field underlines in the value column of the summary form. */
export function summaryLineFilter(obj: LayoutObject): boolean {
  return obj.width >= 20 && obj.top >= 60 && obj.x0 >= 360;
}

/** Left-margin item numbers and filled-in 9pt values (boilerplate Arial excluded). */
export function keysAndInputText(obj: LayoutObject): boolean {
  if (!isGlyph(obj)) return false;
  if (isMarginKey(obj)) return true;
  return isInputSize(obj) && obj.fontName !== FONT_ARIAL;
}

/** 9pt digits and dots: item numbers printed inside a section. */
export function justTextFilter(obj: LayoutObject): boolean {
  return isGlyph(obj) && isInputSize(obj) && KEY_START.test(obj.text);
}

/** Left-margin item numbers only. */
export function keyFilter(obj: LayoutObject): boolean {
  return isGlyph(obj) && isMarginKey(obj);
}

/** White (hidden) index text and margin keys below the page header. */
export function whiteTextAndLeftSide(obj: LayoutObject): boolean {
  if (!isGlyph(obj) || obj.top <= 100) return false;
  return isWhite(obj) || isMarginKey(obj);
}

/** Content of Schedule A/B once checkbox glyphs have been normalised. */
export function scheduleAbContentFilter(obj: LayoutObject): boolean {
  if (!isGlyph(obj)) return false;
  if (isWhite(obj) || isMarginKey(obj) || isCheckboxGlyph(obj)) return true;
  if (AB_BOILERPLATE_FONTS.includes(obj.fontName)) return false;
  return isInputSize(obj);
}

/** Only the checkbox glyphs of the summary form. */
export function summaryBoxFilter(obj: LayoutObject): boolean {
  return isCheckboxGlyph(obj);
}

/** Underlines that are neither decoration nor the two margin rules of the creditor tables. */
export function removeMarginLines(obj: LayoutObject): boolean {
  if (obj.width < MIN_RULE_WIDTH) return false;
  if (obj.x0 > 70 && obj.x0 < 75) return false;
  return !(obj.x0 > 435 && obj.x0 < 445);
}

export function widthBetween(obj: LayoutObject, min: number, max: number): boolean {
  return obj.width > min && obj.width < max;
}
