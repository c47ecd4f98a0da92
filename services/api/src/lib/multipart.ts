import { PayloadTooLargeError, ValidationError } from "@filedesk/core";
import type { Request, RequestHandler } from "express";
import multer from "multer";
import type { IncomingUpload } from "../dispatcher";

const MAX_FIELDS = 50;
const MAX_FIELD_BYTES = 1024 * 1024;

function declaredLength(req: Request): number | null {
  const header = req.headers["content-length"];
  if (!header) {
    return null;
  }
  const length = Number(header);
  return Number.isFinite(length) ? length : null;
}

/**
 * Buffer every multipart file in memory. `maxUploadBytes` bounds each file and
 * the request as a whole. multer and busboy errors are translated to the API's
 * own error types so the error handler renders them like any other.
 */
export function createMultipartParser(limits: { maxUploadBytes: number; maxFiles: number }): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: limits.maxUploadBytes,
      files: limits.maxFiles,
      fields: MAX_FIELDS,
      fieldSize: MAX_FIELD_BYTES
    }
  }).any();

  return (req, res, next) => {
    const length = declaredLength(req);
    if (length !== null && length > limits.maxUploadBytes) {
      next(new PayloadTooLargeError(limits.maxUploadBytes));
      return;
    }

    upload(req, res, (error?: unknown) => {
      if (!error) {
        // Chunked requests carry no Content-Length; the parsed total still counts.
        const total = uploadedFiles(req).reduce((sum, file) => sum + file.size, 0);
        next(total > limits.maxUploadBytes ? new PayloadTooLargeError(limits.maxUploadBytes) : undefined);
        return;
      }
      if (!(error instanceof multer.MulterError)) {
        // busboy reports truncated or unparseable bodies as plain errors.
        const detail = error instanceof Error ? error.message : String(error);
        next(new ValidationError(`Malformed upload: ${detail}`));
        return;
      }

      if (error.code === "LIMIT_FILE_SIZE") {
        next(new PayloadTooLargeError(limits.maxUploadBytes));
        return;
      }
      if (error.code === "LIMIT_FILE_COUNT") {
        next(new ValidationError(`At most ${limits.maxFiles} files may be uploaded`));
        return;
      }
      next(new ValidationError(`Malformed upload: ${error.message}`));
    });
  };
}

export function uploadedFiles(req: Request): IncomingUpload[] {
  return Array.isArray(req.files) ? req.files : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formFields(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}
