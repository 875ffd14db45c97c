/**
 * Response helper utilities for standardizing API responses.
 */

import type { Response } from "express";

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  message: string;
}

/**
 * Send a successful JSON response.
 *
 * @example
 * jsonSuccess(res, { filename, fromCache: false, result });
 */
export function jsonSuccess<T>(res: Response, data: T, status: number = 200): void {
  const body: ApiSuccess<T> = { success: true, data };
  res.status(status).json(body);
}

/**
 * Send an error JSON response.
 *
 * @example
 * jsonError(res, "Invalid file type");
 * jsonError(res, "Document has no text layer", 422);
 */
export function jsonError(res: Response, message: string, status: number = 400): void {
  const body: ApiFailure = { success: false, message };
  res.status(status).json(body);
}

export function jsonServerError(res: Response, message: string = "Internal server error"): void {
  jsonError(res, message, 500);
}
