import { PART_RULE_MAX, PART_RULE_MIN } from "./constants";
import { widthBetween } from "./filters";
import type { RuleLine } from "./types";

/** Vertical extent of one creditor entry, between its first and last marker lines. */
export interface EntrySpan {
  top: number;
  bottom: number;
}

export interface PartBand {
  min: number;
  max: number;
}

/**
 * State of a top-to-bottom walk over a form's rule lines.
 *
 * `part` counts the part-boundary rules seen so far (0 before the first part).
 * The marker buffer holds the lines a part's parser has collected since its last
 * emitted entry; it is cleared whenever a new part begins.
 */
export class SectionScanner {
  private readonly band: PartBand;
  private currentPart = 0;
  private markers: RuleLine[] = [];

  constructor(band: PartBand = { min: PART_RULE_MIN, max: PART_RULE_MAX }) {
    this.band = band;
  }

  get part(): number {
    return this.currentPart;
  }

  get buffered(): readonly RuleLine[] {
    return this.markers;
  }

  /** Advance over one line; returns the part the line belongs to. */
  observe(line: RuleLine): number {
    if (widthBetween(line, this.band.min, this.band.max)) {
      this.currentPart += 1;
      this.markers = [];
    }
    return this.currentPart;
  }

  /**
   * Feed a left-margin marker of a creditor table. Every entry is bracketed by
   * three markers; the middle one is discarded and the span between the first and
   * the last is returned. A wide rule arriving while no entry is open is the
   * table's header rule and is skipped.
   */
  collectEntry(line: RuleLine, headerWidth = 20): EntrySpan | null {
    if (this.markers.length === 0 && line.width > headerWidth) return null;

    this.markers.push(line);
    if (this.markers.length !== 3) return null;

    const [first, , last] = this.markers;
    this.markers = [];
    return { top: first.top, bottom: last.top };
  }

  push(line: RuleLine): number {
    this.markers.push(line);
    return this.markers.length;
  }

  /** Hand over and clear the buffered markers. */
  flush(): RuleLine[] {
    const markers = this.markers;
    this.markers = [];
    return markers;
  }
}

/**
 * Collects a fixed number of positional values (a flat section such as the
 * statistics block) and ignores anything after the list is complete.
 */
export class FlatFieldCollector {
  private readonly limit: number;
  private readonly values: string[] = [];

  constructor(limit: number) {
    this.limit = limit;
  }

  get complete(): boolean {
    return this.values.length >= this.limit;
  }

  add(value: string): boolean {
    if (this.complete) return false;
    this.values.push(value);
    return true;
  }

  get fields(): readonly string[] {
    return this.values;
  }
}
