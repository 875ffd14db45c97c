/**
 * Validation middleware for the extraction routes.
 */

import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { jsonError } from "../utils/response-helpers";

export const PDF_MAGIC = "%PDF";

/**
 * Validate that the uploaded file is a PDF.
 * Checks both extension and magic bytes.
 */
export function validatePdfFile(req: Request, res: Response, next: NextFunction): void {
  if (!req.file) {
    jsonError(res, "No file provided");
    return;
  }

  const filename = req.file.originalname;
  const ext = filename.toLowerCase().slice(filename.lastIndexOf("."));

  if (ext !== ".pdf") {
    jsonError(res, "This endpoint only accepts PDF files");
    return;
  }

  const header = req.file.buffer.subarray(0, 5).toString("ascii");
  if (!header.startsWith(PDF_MAGIC)) {
    jsonError(res, "Invalid PDF file: missing PDF header");
    return;
  }

  next();
}

/**
 * Format Zod validation errors into a user-friendly message.
 */
export function formatZodError(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
  return issues.join("; ");
}
