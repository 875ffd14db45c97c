import {
  FORM_FAILED,
  FORM_NOT_FOUND,
  isFormError,
  type BankruptcyExtraction,
  type FormId,
  type FormResult,
  type FormPayloads,
} from "@shared/schema";
import { createLogger } from "../logger";
import { MIN_DIGITAL_TEXT } from "./constants";
import { DocumentNotFoundError, NotProcessableError } from "./errors";
import { extractScheduleAb } from "./forms/schedule-ab";
import { extractScheduleD } from "./forms/schedule-d";
import { extractScheduleEf } from "./forms/schedule-ef";
import { extractSummary } from "./forms/summary";
import type { ExtractionContext } from "./isolator";
import type { LayoutDocument } from "./layout/pdf-source";

const log = createLogger("extract");

type FormExtractor<T> = (context: ExtractionContext) => Promise<T>;

export const formExtractors: { [K in FormId]: FormExtractor<FormPayloads[K]> } = {
  sum: extractSummary,
  a_b: extractScheduleAb,
  d: extractScheduleD,
  e_f: extractScheduleEf,
};

/** Throws `NotProcessableError` unless the first page has a text layer. */
export async function assertProcessable(document: LayoutDocument): Promise<void> {
  const first = document.pageCount > 0 ? await document.getPage(0) : null;
  const length = first ? first.extractText().length : 0;
  if (length < MIN_DIGITAL_TEXT) {
    throw new NotProcessableError(length);
  }
}

/**
 * Run one form's extraction inside its failure boundary: whatever goes wrong is
 * reported as that form's error sentinel.
 */
export async function extractForm<K extends FormId>(
  form: K,
  context: ExtractionContext,
): Promise<FormResult<FormPayloads[K]>> {
  try {
    return await formExtractors[form](context);
  } catch (error) {
    if (error instanceof DocumentNotFoundError) {
      log.info("Form not present", { form });
      return { error: FORM_NOT_FOUND };
    }
    log.error("Form extraction failed", {
      form,
      error: error instanceof Error ? error.message : String(error),
    });
    return { error: FORM_FAILED };
  }
}

/**
 * Extract all four forms from a filing. Returns null when the document is not
 * digitized.
 */
export async function extractAll(context: ExtractionContext): Promise<BankruptcyExtraction | null> {
  try {
    await assertProcessable(context.source.layout);
  } catch (error) {
    if (error instanceof NotProcessableError) {
      log.warn("Document is not processable", { textLength: error.textLength });
      return null;
    }
    throw error;
  }

  const ab = await extractForm("a_b", context);
  const d = await extractForm("d", context);
  const ef = await extractForm("e_f", context);
  const sum = await extractForm("sum", context);

  return {
    info: {
      debtor_1: isFormError(ef) ? null : ef.debtor1,
      debtor_2: isFormError(ef) ? null : ef.debtor2,
    },
    form_106_ab: ab,
    form_106_d: d,
    form_106_ef: ef,
    form_106_sum: sum,
  };
}
