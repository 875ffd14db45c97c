import type { Express, Request, Response, NextFunction } from "express";
import type { Server } from "http";
import multer, { MulterError } from "multer";
import { formIdSchema } from "@shared/schema";
import { extractFormFromPdf, extractFromPdf } from "./bankruptcy";
import { extractionCache } from "./cache";
import { createLogger } from "./logger";
import { formatZodError, validatePdfFile } from "./middleware/validation";
import { extractLimiter, generalLimiter } from "./rate-limit";
import { jsonError, jsonServerError, jsonSuccess } from "./utils/response-helpers";

const log = createLogger("routes");

const NOT_PROCESSABLE_MESSAGE = "Document has no text layer; scanned filings cannot be read.";

export interface RouteOptions {
  /** Upload size limit in megabytes (default 50). */
  maxUploadMb?: number;
  /** Parent directory for composed form PDFs. */
  tmpDir?: string;
}

const allowedMimeTypes = ["application/pdf"];

function createUpload(maxUploadMb: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadMb * 1024 * 1024,
    },
    fileFilter: (_req, file, cb) => {
      const ext = file.originalname.toLowerCase().slice(file.originalname.lastIndexOf("."));
      if (ext !== ".pdf") {
        cb(new Error("Invalid file type. Allowed types: PDF"));
        return;
      }
      if (!allowedMimeTypes.includes(file.mimetype)) {
        cb(new Error(`MIME type mismatch for .pdf file. Expected: application/pdf, got: ${file.mimetype}`));
        return;
      }
      cb(null, true);
    },
  });
}

export async function registerRoutes(httpServer: Server, app: Express, options: RouteOptions = {}): Promise<Server> {
  const maxUploadMb = options.maxUploadMb ?? 50;
  const upload = createUpload(maxUploadMb);
  const extractOptions = { tmpDir: options.tmpDir };

  function handleMulterError(err: Error, _req: Request, res: Response, next: NextFunction): void {
    if (err instanceof MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        jsonError(res, `File is too large. Maximum size is ${maxUploadMb}MB.`);
        return;
      }
      jsonError(res, err.message);
      return;
    }
    if (err) {
      jsonError(res, err.message);
      return;
    }
    next();
  }

  app.get("/api/v1/health", generalLimiter, (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      service: "bankruptcy-form-extractor",
      version: "1.0.0",
      timestamp: new Date().toISOString(),
    });
  });

  // Every form of a filing. Results are cached by content hash.
  app.post(
    "/api/v1/extract",
    extractLimiter,
    upload.single("file"),
    handleMulterError,
    validatePdfFile,
    async (req: Request, res: Response) => {
      const file = req.file;
      if (!file) {
        jsonError(res, "No file provided");
        return;
      }

      const cacheKey = extractionCache.getHash(file.buffer);
      const cached = extractionCache.get(cacheKey);
      if (cached) {
        log.info("Extraction served from cache", { filename: file.originalname });
        jsonSuccess(res, { filename: file.originalname, fromCache: true, result: cached });
        return;
      }

      try {
        const result = await extractFromPdf(new Uint8Array(file.buffer), extractOptions);
        if (result === null) {
          jsonError(res, NOT_PROCESSABLE_MESSAGE, 422);
          return;
        }

        extractionCache.set(cacheKey, result);
        jsonSuccess(res, { filename: file.originalname, fromCache: false, result });
      } catch (error) {
        log.error("Extraction failed", {
          filename: file.originalname,
          error: error instanceof Error ? error.message : String(error),
        });
        jsonServerError(res, "Failed to read PDF document");
      }
    },
  );

  // One form of a filing.
  app.post(
    "/api/v1/extract/:form",
    extractLimiter,
    upload.single("file"),
    handleMulterError,
    validatePdfFile,
    async (req: Request, res: Response) => {
      const form = formIdSchema.safeParse(req.params.form);
      if (!form.success) {
        jsonError(res, formatZodError(form.error));
        return;
      }

      const file = req.file;
      if (!file) {
        jsonError(res, "No file provided");
        return;
      }

      try {
        const result = await extractFormFromPdf(form.data, new Uint8Array(file.buffer), extractOptions);
        if (result === null) {
          jsonError(res, NOT_PROCESSABLE_MESSAGE, 422);
          return;
        }

        jsonSuccess(res, { filename: file.originalname, form: form.data, result });
      } catch (error) {
        log.error("Form extraction failed", {
          filename: file.originalname,
          form: form.data,
          error: error instanceof Error ? error.message : String(error),
        });
        jsonServerError(res, "Failed to read PDF document");
      }
    },
  );

  return httpServer;
}
