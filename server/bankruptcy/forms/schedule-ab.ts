/**
 * Schedule A/B: property (Official Form 106A/B).
 *
 * Parts 1 and 2 (real estate, vehicles and other conveyances) are laid out as
 * underlined fields and read geometrically. Parts 3 to 8 are free text with item
 * numbers and are read from the page's content text.
 */

import {
  formTitles,
  type AbTotals,
  type PropertyEntry,
  type PropertyLineItem,
  type ScheduleAbResult,
} from "@shared/schema";
import { createLogger } from "../../logger";
import {
  assembleAbTotals,
  assembleLineItem,
  assembleOtherProperty,
  assembleRealEstate,
  assembleVehicle,
} from "../assemblers";
import { INLINE_TOKENS, classifyScheduleBox, decodeCheckboxes, withCheckboxTokens } from "../checkbox";
import { FULL_WIDTH_RULE, MIN_RULE_WIDTH } from "../constants";
import { readAnchoredField } from "../field-reader";
import { scheduleAbContentFilter, whiteTextAndLeftSide } from "../filters";
import { withIsolatedForm, type ExtractionContext } from "../isolator";
import type { LayoutPage } from "../layout/layout-page";
import { rulesTopDown, tryAssemble } from "./support";

const log = createLogger("form-106ab");

export interface PropertySection {
  top: number;
  bottom: number;
  key: string;
}

const SECTION_PREFIXES = "P12345";

/**
 * Sections of parts 1 and 2. The form carries a hidden (white) index word such
 * as "1.1" or "3.2" at the top of each entry; an entry ends at the next
 * full-width rule.
 */
export function findPropertySections(page: LayoutPage): PropertySection[] {
  const rows = page
    .filter(whiteTextAndLeftSide)
    .extractWords()
    .filter((word) => word.text.length > 2 && SECTION_PREFIXES.includes(word.text[0]) && word.text[1] === ".")
    .map((word) => ({ top: Math.trunc(word.top), key: word.text }));
  if (rows.length === 0) return [];

  const bottoms = rulesTopDown(page, (obj) => obj.width > FULL_WIDTH_RULE)
    .filter((line) => line.top > rows[0].top)
    .map((line) => Math.trunc(line.top))
    .slice(0, rows.length);

  return bottoms.map((bottom, index) => ({ top: rows[index].top, bottom, key: rows[index].key }));
}

export function readPropertySection(page: LayoutPage, section: PropertySection): PropertyEntry | null {
  const region = page.crop([0, section.top, page.width, section.bottom]);
  const fields = region.lines
    .filter((line) => line.width >= MIN_RULE_WIDTH)
    .map((line) => readAnchoredField(page, line, { adjust: true, up: 100 }));
  const boxes = decodeCheckboxes(region);
  const meta = { form: "106A/B", key: section.key };

  if (section.key.startsWith("1.")) {
    return tryAssemble(() => assembleRealEstate(section.key, fields, boxes), meta);
  }
  if (section.key.startsWith("3.")) {
    return tryAssemble(() => assembleVehicle(section.key, fields, boxes), meta);
  }
  if (section.key.startsWith("4.")) {
    return tryAssemble(() => assembleOtherProperty(section.key, fields, boxes), meta);
  }
  return null;
}

const PART_HEADER = /^Part \d:/;
const ITEM_ROW = /^\d{1,2}\. ?|^5/;
const FIRST_ITEM_PART = 3;
const LAST_ITEM_PART = 7;
const TOTALS_PART = 8;

/** The debtor names printed under the form heading: one row, or two when the second is not form content. */
export function readAbDebtors(rows: readonly string[]): string[] {
  const debtors: string[] = [];
  if (rows[1]) debtors.push(rows[1]);
  const second = rows[2];
  if (second && !second.includes("[") && !/^\d/.test(second)) debtors.push(second);
  return debtors;
}

interface ItemScan {
  part: number;
  key: string | null;
  section: string | null;
  rows: string[];
  partEight: string[];
}

export interface ItemizedProperty {
  debtors: string[];
  items: PropertyLineItem[];
  totals: AbTotals | null;
}

/** Parts 3 to 8 of the form, read from its content rows. */
export function readItemizedProperty(page: LayoutPage): ItemizedProperty {
  const text = withCheckboxTokens(page, classifyScheduleBox, INLINE_TOKENS)
    .filter(scheduleAbContentFilter)
    .extractText();
  const allRows = text.split(/\r?\n/);
  const debtors = readAbDebtors(allRows);
  const rows = allRows.filter((row) => !debtors.some((debtor) => row.includes(debtor)));

  const items: PropertyLineItem[] = [];
  let totals: AbTotals | null = null;
  const scan: ItemScan = { part: 0, key: null, section: null, rows: [], partEight: [] };

  for (const row of rows.slice(1)) {
    if (PART_HEADER.test(row)) {
      scan.part += 1;
      continue;
    }

    if (scan.part >= FIRST_ITEM_PART && scan.part <= LAST_ITEM_PART) {
      if (!ITEM_ROW.test(row)) {
        scan.rows.push(row);
        continue;
      }
      if (scan.section === row) continue;

      if (row.includes("54. ")) {
        items.push({ key: "54.", text: row.split(" ")[1] });
      }

      if (scan.key !== null) {
        const content = scan.rows.filter((entry) => !entry.includes("["));
        if (content.length > 0) {
          // Item 24 prints a lone "2" when nothing is declared under it.
          if (scan.key === "24." && content.length === 1 && content[0] === "2") {
            scan.rows = [];
            continue;
          }
          items.push(assembleLineItem(scan.key, content));
        }
        scan.rows = [];
        scan.section = row;
      }
      scan.key = row;
    }

    if (scan.part === TOTALS_PART) {
      scan.partEight.push(row);
      if (row.includes("63. ")) {
        totals = tryAssemble(() => assembleAbTotals(scan.partEight), { form: "106A/B", part: TOTALS_PART });
      }
    }
  }

  return { debtors, items, totals };
}

export function readScheduleAb(page: LayoutPage): ScheduleAbResult {
  const entries: PropertyEntry[] = [];
  for (const section of findPropertySections(page)) {
    const entry = readPropertySection(page, section);
    if (entry) entries.push(entry);
  }

  const { debtors, items, totals } = readItemizedProperty(page);
  log.info("Schedule A/B read", { entries: entries.length, items: items.length, totals: totals !== null });

  return { cars_land_and_crafts: entries, debtors, other_property: items, totals };
}

export async function extractScheduleAb(context: ExtractionContext): Promise<ScheduleAbResult> {
  return withIsolatedForm(context, formTitles.a_b, readScheduleAb);
}
