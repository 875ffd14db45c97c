import { keysAndInputText } from "./filters";
import type { LayoutPage } from "./layout/layout-page";
import type { BBox, Box, RuleLine } from "./types";

export interface ReadOptions {
  /** Extend the box left of the anchor's start. */
  left?: number;
  /** Height of the box above the anchor. */
  up?: number;
  /** Extend the box below the anchor. */
  down?: number;
  /** Extend the box past the anchor's end. */
  right?: number;
  /** Stop the box at the nearest other rule line above the anchor. */
  adjust?: boolean;
}

/**
 * Box above an anchor line, where the form prints the value that belongs on it.
 */
export function fieldBox(anchor: Box, options: ReadOptions = {}): BBox {
  const { left = 0, up = 20, down = 0, right = 0 } = options;
  return [Math.trunc(anchor.x0) - left, Math.trunc(anchor.top) - up, anchor.x1 + right, anchor.top + down];
}

/** Top of the nearest rule line above `anchor` within `region`, if any. */
export function nearestRuleAbove(region: LayoutPage, anchor: Box): number | undefined {
  const tops = region.lines.map((line) => line.top).filter((top) => top < anchor.top);
  return tops.length > 0 ? Math.max(...tops) : undefined;
}

/**
 * Read the text filled in above an anchor rule line. Returns "" when the box holds
 * no value glyphs.
 */
export function readAnchoredField(page: LayoutPage, anchor: RuleLine, options: ReadOptions = {}): string {
  const box = fieldBox(anchor, options);
  let region = page.crop(box);

  if (options.adjust) {
    const stop = nearestRuleAbove(region, anchor);
    if (stop !== undefined) {
      region = page.crop([box[0], stop, box[2], box[3]]);
    }
  }

  return region.filter(keysAndInputText).extractText();
}
