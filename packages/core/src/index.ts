export * from "./errors";
export * from "./page-ranges";
export * from "./content-type";

export const TOOL_CATEGORIES = ["image", "pdf", "video"] as const;
export type ToolCategory = (typeof TOOL_CATEGORIES)[number];

export const IMAGE_OPERATIONS = [
  "resize",
  "crop",
  "rotate",
  "enhance",
  "remove-background",
  "convert-format"
] as const;
export type ImageOperation = (typeof IMAGE_OPERATIONS)[number];

export const PDF_OPERATIONS = ["split", "merge", "rearrange", "extract-text", "convert-to-pdf"] as const;
export type PdfOperation = (typeof PDF_OPERATIONS)[number];

export const VIDEO_OPERATIONS = ["download", "extract-audio", "trim", "convert-format"] as const;
export type VideoOperation = (typeof VIDEO_OPERATIONS)[number];

export type OperationKey =
  | { category: "image"; operation: ImageOperation }
  | { category: "pdf"; operation: PdfOperation };

/** Older route names that resolve to a current operation. */
export const OPERATION_ALIASES: Readonly<Record<string, string>> = {
  "image/remove-bg": "remove-background",
  "image/convert": "convert-format"
};

export const TARGET_IMAGE_FORMATS = ["JPEG", "PNG", "WEBP", "BMP", "TIFF"] as const;
export type TargetImageFormat = (typeof TARGET_IMAGE_FORMATS)[number];

export const LOSSY_IMAGE_FORMATS: ReadonlySet<TargetImageFormat> = new Set(["JPEG", "WEBP"]);

export const UPLOAD_KINDS = ["image", "pdf", "image-or-pdf"] as const;
export type UploadKind = (typeof UPLOAD_KINDS)[number];

export const ALLOWED_IMAGE_EXTENSIONS = ["png", "jpg", "jpeg", "gif", "bmp", "tiff", "tif", "webp"] as const;
export const ALLOWED_PDF_EXTENSIONS = ["pdf"] as const;

export function allowedExtensionsFor(kind: UploadKind): readonly string[] {
  if (kind === "image") {
    return ALLOWED_IMAGE_EXTENSIONS;
  }
  if (kind === "pdf") {
    return ALLOWED_PDF_EXTENSIONS;
  }
  return [...ALLOWED_IMAGE_EXTENSIONS, ...ALLOWED_PDF_EXTENSIONS];
}

export type ToolResult = {
  success: boolean;
  message: string;
  outputUrl?: string;
  metadata?: Record<string, unknown>;
};

export type ResponseEnvelope = {
  success: boolean;
  message: string;
  output_url?: string;
  metadata?: Record<string, unknown>;
  code?: string;
};

/**
 * Check whether a string names one of the image operations.
 */
export function isImageOperation(value: string): value is ImageOperation {
  return (IMAGE_OPERATIONS as readonly string[]).includes(value);
}

/**
 * Check whether a string names one of the PDF operations.
 */
export function isPdfOperation(value: string): value is PdfOperation {
  return (PDF_OPERATIONS as readonly string[]).includes(value);
}

export function isVideoOperation(value: string): value is VideoOperation {
  return (VIDEO_OPERATIONS as readonly string[]).includes(value);
}

/**
 * Resolve a route's category and operation segments into a known operation key,
 * following legacy aliases.
 *
 * @returns The operation key, or `null` when the pair names no registered operation
 */
export function resolveOperationKey(category: string, operation: string): OperationKey | null {
  const resolved = OPERATION_ALIASES[`${category}/${operation}`] ?? operation;
  if (category === "image" && isImageOperation(resolved)) {
    return { category, operation: resolved };
  }
  if (category === "pdf" && isPdfOperation(resolved)) {
    return { category, operation: resolved };
  }
  return null;
}

/**
 * Parse a user-supplied target format name, case-insensitively. `JPG` and `TIF` are accepted spellings.
 */
export function parseTargetImageFormat(value: string): TargetImageFormat | null {
  const normalized = value.trim().toUpperCase();
  const canonical = normalized === "JPG" ? "JPEG" : normalized === "TIF" ? "TIFF" : normalized;
  return TARGET_IMAGE_FORMATS.find((format) => format === canonical) ?? null;
}

/**
 * Map a target format to the file extension its artifacts are stored under.
 */
export function formatToExtension(format: TargetImageFormat): string {
  if (format === "JPEG") {
    return "jpg";
  }
  return format.toLowerCase();
}

/**
 * Lower-cased extension of a filename without the dot, or an empty string.
 */
export function fileExtension(filename: string): string {
  const base = filename.split(/[\\/]/).pop() || "";
  const dot = base.lastIndexOf(".");
  if (dot <= 0 || dot === base.length - 1) {
    return "";
  }
  return base.slice(dot + 1).toLowerCase();
}

/**
 * Sanitizes a client-supplied filename for display: path segments are dropped,
 * reserved characters become underscores, and runs of underscores collapse.
 *
 * @returns The cleaned name truncated to 128 characters, or `"file"` when nothing remains
 */
export function toSafeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() || "";
  const safe = base
    // eslint-disable-next-line no-control-regex
    .replace(/[<>:"|?*\u0000-\u001f]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^[_.]+|_+$/g, "")
    .slice(0, 128);
  return safe || "file";
}

/**
 * Wrap an angle in degrees into the [-180, 180] display range.
 */
export function wrapAngle(angle: number): number {
  const wrapped = ((((angle + 180) % 360) + 360) % 360) - 180;
  return wrapped === -180 && angle > 0 ? 180 : wrapped;
}

/**
 * Strip file-system paths and anything after the first line from an error message
 * before it reaches a caller.
 */
export function sanitizeErrorMessage(message: string): string {
  const firstLine = message.split("\n")[0] || "";
  const withoutPaths = firstLine.replace(/(^|[\s'"(=])(?:[A-Za-z]:)?[\\/][^\s'"()]*/g, "$1<path>");
  return withoutPaths.trim().slice(0, 200) || "processing error";
}

/**
 * Maps an unknown failure raised by a tool into a caller-safe `{ code, message }` pair.
 *
 * @param action - Phrase describing what was attempted, e.g. `"resize image"`
 */
export function classifyProcessingError(error: unknown, action: string): { code: string; message: string } {
  if (error instanceof Error) {
    const detail = sanitizeErrorMessage(error.message || "processing error");
    if (/timeout|timed out/i.test(detail)) {
      return { code: "PROCESSING_TIMEOUT", message: `Failed to ${action}: ${detail}` };
    }
    return { code: "PROCESSING_FAILED", message: `Failed to ${action}: ${detail}` };
  }

  return { code: "PROCESSING_FAILED", message: `Failed to ${action}: unknown processing error.` };
}

/**
 * Format an event name and associated payload into a structured JSON log string.
 *
 * @param event - The event name or identifier
 * @param payload - Arbitrary data to include with the event
 * @returns A JSON string containing `ts` (ISO timestamp), `event`, and `payload`
 */
export function toStructuredLog(event: string, payload: Record<string, unknown>): string {
  return JSON.stringify({ ts: new Date().toISOString(), event, payload });
}
