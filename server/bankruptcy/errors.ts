/**
 * Failure taxonomy of the extraction engine.
 *
 * Only `NotProcessableError` escapes `extractAll`; the others are contained per
 * form and surface as `{ error }` sentinels.
 */

export type ExtractionErrorCode = "NOT_PROCESSABLE" | "DOCUMENT_NOT_FOUND" | "PARTIAL_RECORD";

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The upload has no usable text layer (most likely a scan). */
export class NotProcessableError extends ExtractionError {
  readonly textLength: number;

  constructor(textLength: number) {
    super("NOT_PROCESSABLE", `First page carries ${textLength} characters of text; document is not digitized`);
    this.textLength = textLength;
  }
}

/** No page of the document carries the requested form's title. */
export class DocumentNotFoundError extends ExtractionError {
  readonly formTitle: string;

  constructor(formTitle: string) {
    super("DOCUMENT_NOT_FOUND", `No page matches "${formTitle}"`);
    this.formTitle = formTitle;
  }
}

/** A record was assembled from fewer positional fields than its layout defines. */
export class PartialRecordError extends ExtractionError {
  readonly record: string;
  readonly expected: number;
  readonly received: number;

  constructor(record: string, expected: number, received: number) {
    super("PARTIAL_RECORD", `${record} needs ${expected} fields, got ${received}`);
    this.record = record;
    this.expected = expected;
    this.received = received;
  }
}
