/** Layout constants of the official bankruptcy forms (points unless noted). */

/** Characters of trailing page text searched for a form's title. */
export const TITLE_WINDOW = 300;

/** Minimum first-page text length for a document to count as digitized. */
export const MIN_DIGITAL_TEXT = 100;

/** Input text on the forms is set at 9pt; the band admits rounding. */
export const INPUT_FONT_MIN = 8.5;
export const INPUT_FONT_MAX = 9.1;

/** Glyphs left of this x are item numbers in the left margin. */
export const LEFT_MARGIN_X = 50;

/** Lines narrower than this are decoration, not field underlines. */
export const MIN_RULE_WIDTH = 10;

/** Rule lines spanning the page. */
export const FULL_WIDTH_RULE = 530;

/** Widths (exclusive) of the rules that open a new part of a schedule. */
export const PART_RULE_MIN = 498;
export const PART_RULE_MAX = 510;

export const CHECKBOX_TOLERANCES = [3, 4, 5] as const;

export const FONT_ARIAL = "ArialMT";

/** Fonts carrying form boilerplate rather than filled-in values on Schedule A/B. */
export const AB_BOILERPLATE_FONTS = ["ArialMT", "Arial-ItalicMT", "WQPAYT+LiberationSans"];

export const CHECKBOX_FONT = "Wingdings";
