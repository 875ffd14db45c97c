/**
 * Schedule E/F: creditors who have unsecured claims (Official Form 106E/F).
 *
 * Part 1 lists priority claims (items 2.x), part 2 nonpriority claims (items
 * 4.x), part 3 additional notice parties and part 4 the claim totals.
 */

import {
  formTitles,
  statisticsFields,
  type OtherCreditor,
  type ScheduleEfResult,
  type UnsecuredCreditor,
} from "@shared/schema";
import { createLogger } from "../../logger";
import { NONPRIORITY_FIELDS, PRIORITY_FIELDS, assembleStatistics, assembleUnsecuredCreditor, isPriorityKey } from "../assemblers";
import { decodeCheckboxes } from "../checkbox";
import { FULL_WIDTH_RULE, LEFT_MARGIN_X } from "../constants";
import { readAnchoredField } from "../field-reader";
import { justTextFilter, keyFilter, keysAndInputText, removeMarginLines, widthBetween } from "../filters";
import { withIsolatedForm, type ExtractionContext } from "../isolator";
import type { LayoutPage } from "../layout/layout-page";
import { FlatFieldCollector, SectionScanner, type EntrySpan } from "../segmentation";
import type { RuleLine } from "../types";
import { attachOtherCreditor, rulesTopDown, tryAssemble } from "./support";

const log = createLogger("form-106ef");

const PRIORITY_PART = 1;
const NONPRIORITY_PART = 2;
const NOTICE_PART = 3;
const TOTALS_PART = 4;

/** Field cap of an entry: the rows after it belong to the form, not the creditor. */
function fieldCap(key: string): number {
  if (isPriorityKey(key)) return PRIORITY_FIELDS;
  if (key.includes("4.")) return NONPRIORITY_FIELDS;
  return Number.POSITIVE_INFINITY;
}

/**
 * Read one creditor entry. Fields start at the underline whose value is the
 * entry's own item number and are read top to bottom from there.
 */
export function parseUnsecuredCreditor(page: LayoutPage, span: EntrySpan): UnsecuredCreditor | null {
  const context = page.crop([0, Math.max(100, span.top - 500), page.width, span.bottom]);
  const section = context.crop([0, span.top, page.width, span.bottom]);
  const key = section.filter(keyFilter).extractText().replaceAll("\n", "");
  if (!key) {
    log.debug("Entry without item number", span);
    return null;
  }

  const boxes = decodeCheckboxes(section);
  const cap = fieldCap(key);
  const fields: string[] = [];

  for (const line of rulesTopDown(section, removeMarginLines)) {
    if (fields.length === 0 && line.width > 20) continue;

    const value = readAnchoredField(context, line, { adjust: true, up: 100 });
    if (fields.length === 0 && value.replaceAll("\n", "") !== key) continue;
    if (fields.length >= cap) break;
    fields.push(value);
  }

  if (fields.length === 0) return null;
  return tryAssemble(() => assembleUnsecuredCreditor(fields, boxes, key), { form: "106E/F", key });
}

/** Part 3 entry between two markers: the creditor item it refers to, a name/address, an account. */
export function readNoticeParty(page: LayoutPage, start: RuleLine, stop: RuleLine): OtherCreditor {
  const key = page.crop([start.x0, start.top - 20, start.x1, start.top]).filter(justTextFilter).extractText();
  const address = page
    .crop([0, start.top - 20, start.x0 - 20, stop.top])
    .filter(keysAndInputText)
    .extractText();
  const acct = page
    .crop([start.x1 + 150, start.top + 20, page.width, stop.top])
    .filter(keysAndInputText)
    .extractText();

  return { key, address, acct };
}

export function readScheduleEf(page: LayoutPage): ScheduleEfResult {
  const lines = rulesTopDown(page);
  const [first, second] = lines;
  const debtor1 = first ? readAnchoredField(page, first, { adjust: true, up: 30 }) : "";
  const debtor2 = second ? readAnchoredField(page, second, { adjust: true, up: 30 }) : "";

  const scanner = new SectionScanner();
  const totals = new FlatFieldCollector(statisticsFields.length);
  const creditors: UnsecuredCreditor[] = [];

  for (const line of lines) {
    const part = scanner.observe(line);

    if (part === TOTALS_PART) {
      if (line.width < 110) totals.add(readAnchoredField(page, line, { up: 10 }));
    } else if (part === NOTICE_PART) {
      if (widthBetween(line, 10, 20) || line.width > FULL_WIDTH_RULE) {
        if (scanner.push(line) === 2) {
          const [start, stop] = scanner.flush();
          attachOtherCreditor(creditors, readNoticeParty(page, start, stop));
        }
      }
    } else if ((part === PRIORITY_PART || part === NONPRIORITY_PART) && line.x0 < LEFT_MARGIN_X) {
      const span = scanner.collectEntry(line);
      const creditor = span ? parseUnsecuredCreditor(page, span) : null;
      if (creditor) creditors.push(creditor);
    }
  }

  log.info("Schedule E/F read", { creditors: creditors.length, totals: totals.fields.length });

  const result: ScheduleEfResult = { debtor1, debtor2, creditors };
  if (totals.complete) {
    result.statistics = assembleStatistics(totals.fields);
  }
  return result;
}

export async function extractScheduleEf(context: ExtractionContext): Promise<ScheduleEfResult> {
  return withIsolatedForm(context, formTitles.e_f, readScheduleEf);
}
