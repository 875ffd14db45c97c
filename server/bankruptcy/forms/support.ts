import type { OtherCreditor } from "@shared/schema";
import { createLogger } from "../../logger";
import { PartialRecordError } from "../errors";
import { lineFilter } from "../filters";
import type { LayoutPage } from "../layout/layout-page";
import type { LayoutPredicate, RuleLine } from "../types";

const log = createLogger("forms");

/** Rule lines of a page passing `predicate`, top to bottom (draw order among equal tops). */
export function rulesTopDown(page: LayoutPage, predicate: LayoutPredicate = lineFilter): RuleLine[] {
  return page.filter(predicate).lines.sort((a, b) => a.top - b.top);
}

/**
 * Run an assembler, turning a short field list into a skipped section. Any other
 * failure propagates to the form's containment boundary.
 */
export function tryAssemble<T>(build: () => T, section: Record<string, unknown>): T | null {
  try {
    return build();
  } catch (error) {
    if (error instanceof PartialRecordError) {
      log.warn("Skipping section with incomplete fields", { ...section, record: error.record, expected: error.expected, received: error.received });
      return null;
    }
    throw error;
  }
}

/** Attach an additional notice party to every creditor sharing its key. */
export function attachOtherCreditor(
  creditors: ReadonlyArray<{ key: string; other_creditors: OtherCreditor[] }>,
  party: OtherCreditor,
): number {
  let attached = 0;
  for (const creditor of creditors) {
    if (creditor.key === party.key) {
      creditor.other_creditors.push(party);
      attached += 1;
    }
  }
  if (attached === 0) {
    log.debug("Additional notice party matches no creditor", { key: party.key });
  }
  return attached;
}
