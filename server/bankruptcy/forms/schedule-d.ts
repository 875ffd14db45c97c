/**
 * Schedule D: creditors who have claims secured by property (Official Form 106D).
 */

import { formTitles, type OtherCreditor, type ScheduleDResult, type SecuredCreditor } from "@shared/schema";
import { createLogger } from "../../logger";
import { assembleSecuredCreditor } from "../assemblers";
import { decodeCheckboxes } from "../checkbox";
import { FULL_WIDTH_RULE, LEFT_MARGIN_X } from "../constants";
import { keyFilter, keysAndInputText, removeMarginLines, widthBetween } from "../filters";
import { withIsolatedForm, type ExtractionContext } from "../isolator";
import type { LayoutPage } from "../layout/layout-page";
import { SectionScanner, type EntrySpan } from "../segmentation";
import type { RuleLine } from "../types";
import { attachOtherCreditor, rulesTopDown, tryAssemble } from "./support";

const log = createLogger("form-106d");

const CREDITOR_PART = 1;
const NOTICE_PART = 2;

/** Notice-party blocks have at least this many markers, closing rule included. */
export const NOTICE_MARKERS = 5;

/**
 * Read the field above a table underline. Most fields run from the nearest rule
 * above; the property description (field 6) starts 20pt higher and the claim
 * type (field 8) is a fixed 50pt band.
 */
function readSecuredField(context: LayoutPage, line: RuleLine, index: number): string {
  const top = Math.trunc(line.top);
  let region = context.crop([line.x0, top - 200, line.x1, top]);
  const above = region.lines.map((rule) => rule.top).filter((ruleTop) => Math.trunc(ruleTop) !== top);

  if (above.length > 0) {
    const nearest = Math.max(...above);
    if (index === 6) {
      region = context.crop([line.x0, nearest - 20, line.x1, top]);
    } else if (index === 8) {
      region = context.crop([line.x0, top - 50, line.x1, top]);
    } else {
      region = context.crop([line.x0, nearest, line.x1, line.top]);
    }
  }

  return region.filter(keysAndInputText).extractText();
}

export function parseSecuredCreditor(page: LayoutPage, span: EntrySpan): SecuredCreditor | null {
  const context = page.crop([0, Math.max(100, span.top - 500), page.width, span.bottom]);
  const section = context.crop([0, span.top, page.width, span.bottom]);
  const key = section.filter(keyFilter).extractText();
  if (!key) {
    log.debug("Entry without item number", span);
    return null;
  }

  const boxes = decodeCheckboxes(section);
  const fields: string[] = [];

  for (const line of rulesTopDown(section, removeMarginLines)) {
    if (fields.length === 0 && line.width > 20) continue;

    const value = readSecuredField(context, line, fields.length);
    if (fields.length > 0 || value === key) fields.push(value);
  }

  if (fields.length === 0) return null;
  return tryAssemble(() => assembleSecuredCreditor(fields, boxes), { form: "106D", key });
}

/**
 * Part 2 block, closed by a full-width rule. The item number sits above the
 * third marker from the end; with more than the minimum markers it is printed
 * 12pt higher.
 */
export function readNoticeParty(page: LayoutPage, markers: readonly RuleLine[]): OtherCreditor {
  const lift = markers.length === NOTICE_MARKERS ? 0 : 12;
  const first = markers[0];
  const second = markers[1];
  const keyLine = markers[markers.length - 3];
  const last = markers[markers.length - 1];

  const read = (x0: number, top: number, x1: number, bottom: number) =>
    page.crop([x0, top, x1, bottom]).filter(keysAndInputText).extractText();

  return {
    key: read(keyLine.x0, first.top - lift, keyLine.x1, keyLine.top).trim(),
    address: read(0, first.top, Math.trunc(last.x1) * 0.35, last.top),
    acct: read(second.x0, second.top - 12, second.x1, second.top),
  };
}

export function readScheduleD(page: LayoutPage): ScheduleDResult {
  const scanner = new SectionScanner();
  const creditors: SecuredCreditor[] = [];

  for (const line of rulesTopDown(page)) {
    const part = scanner.observe(line);

    if (part === NOTICE_PART) {
      if (widthBetween(line, 5, 120) || line.width > FULL_WIDTH_RULE) scanner.push(line);
      if (line.width > FULL_WIDTH_RULE) {
        const markers = scanner.flush();
        if (markers.length >= NOTICE_MARKERS) {
          attachOtherCreditor(creditors, readNoticeParty(page, markers));
        } else if (markers.length > 1) {
          log.debug("Discarding short notice block", { markers: markers.length, top: line.top });
        }
      }
    } else if (part === CREDITOR_PART && line.x0 < LEFT_MARGIN_X) {
      const span = scanner.collectEntry(line);
      const creditor = span ? parseSecuredCreditor(page, span) : null;
      if (creditor) creditors.push(creditor);
    }
  }

  log.info("Schedule D read", { creditors: creditors.length });
  return { creditors };
}

export async function extractScheduleD(context: ExtractionContext): Promise<ScheduleDResult> {
  return withIsolatedForm(context, formTitles.d, readScheduleD);
}
