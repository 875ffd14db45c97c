import { formTitles, type SummaryResult } from "@shared/schema";
import { createLogger } from "../../logger";
import { assembleSummary } from "../assemblers";
import { INLINE_TOKENS, classifySummaryBox, withCheckboxTokens } from "../checkbox";
import { DocumentNotFoundError } from "../errors";
import { readAnchoredField } from "../field-reader";
import { summaryBoxFilter, summaryLineFilter } from "../filters";
import { findFormPages, type ExtractionContext } from "../isolator";
import type { LayoutPage } from "../layout/layout-page";

const log = createLogger("form-106sum");

export interface SummaryReading {
  inputs: string[];
  boxLines: string[];
}

/** Field values and checkbox lines of one summary page, in drawing order. */
export function readSummaryPage(page: LayoutPage): SummaryReading {
  const boxText = withCheckboxTokens(page, classifySummaryBox, INLINE_TOKENS)
    .filter(summaryBoxFilter)
    .extractText();

  const inputs = page
    .filter(summaryLineFilter)
    .lines.map((line) => readAnchoredField(page, line, { adjust: true, left: 5 }));

  return { inputs, boxLines: boxText ? boxText.split(/\r?\n/) : [] };
}

/**
 * Summary of assets and liabilities (Official Form 106Sum). Pages are read where
 * they are in the filing; the form is never merged.
 */
export async function extractSummary(context: ExtractionContext): Promise<SummaryResult> {
  const { layout } = context.source;
  const title = formTitles.sum;
  const indices = await findFormPages(layout, title);
  if (indices.length === 0) {
    throw new DocumentNotFoundError(title);
  }

  const inputs: string[] = [];
  const boxLines: string[] = [];
  for (const index of indices) {
    const reading = readSummaryPage(await layout.getPage(index));
    inputs.push(...reading.inputs);
    boxLines.push(...reading.boxLines);
  }

  log.debug("Summary fields read", { pages: indices.length, inputs: inputs.length, boxes: boxLines.length });
  return assembleSummary(inputs, boxLines);
}
