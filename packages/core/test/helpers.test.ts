import { describe, expect, it } from "vitest";
import {
  ProcessingError,
  allowedExtensionsFor,
  classifyProcessingError,
  fileExtension,
  formatToExtension,
  parseTargetImageFormat,
  resolveOperationKey,
  sanitizeErrorMessage,
  toSafeFilename,
  toStructuredLog,
  wrapAngle
} from "../src";

describe("resolveOperationKey", () => {
  it("resolves registered operations", () => {
    expect(resolveOperationKey("image", "resize")).toEqual({ category: "image", operation: "resize" });
    expect(resolveOperationKey("pdf", "extract-text")).toEqual({ category: "pdf", operation: "extract-text" });
  });

  it("follows legacy aliases", () => {
    expect(resolveOperationKey("image", "remove-bg")).toEqual({ category: "image", operation: "remove-background" });
    expect(resolveOperationKey("image", "convert")).toEqual({ category: "image", operation: "convert-format" });
  });

  it("returns null for unknown pairs", () => {
    expect(resolveOperationKey("pdf", "resize")).toBeNull();
    expect(resolveOperationKey("video", "trim")).toBeNull();
    expect(resolveOperationKey("pdf", "convert")).toBeNull();
  });
});

describe("image formats", () => {
  it("parses format names case-insensitively with common spellings", () => {
    expect(parseTargetImageFormat("png")).toBe("PNG");
    expect(parseTargetImageFormat(" jpg ")).toBe("JPEG");
    expect(parseTargetImageFormat("Tif")).toBe("TIFF");
    expect(parseTargetImageFormat("gif")).toBeNull();
  });

  it("maps formats to extensions", () => {
    expect(formatToExtension("JPEG")).toBe("jpg");
    expect(formatToExtension("WEBP")).toBe("webp");
  });
});

describe("allowedExtensionsFor", () => {
  it("combines image and PDF extensions for mixed inputs", () => {
    expect(allowedExtensionsFor("pdf")).toEqual(["pdf"]);
    expect(allowedExtensionsFor("image-or-pdf")).toEqual(["png", "jpg", "jpeg", "gif", "bmp", "tiff", "tif", "webp", "pdf"]);
  });
});

describe("filenames", () => {
  it("extracts a lower-cased extension", () => {
    expect(fileExtension("Photo.JPG")).toBe("jpg");
    expect(fileExtension("archive.tar.gz")).toBe("gz");
    expect(fileExtension(".hidden")).toBe("");
    expect(fileExtension("noext")).toBe("");
  });

  it("sanitizes client filenames", () => {
    expect(toSafeFilename("../../etc/passwd")).toBe("passwd");
    expect(toSafeFilename("C:\\Users\\me\\report<1>.pdf")).toBe("report_1_.pdf");
    expect(toSafeFilename("__.hidden")).toBe("hidden");
    expect(toSafeFilename("???")).toBe("file");
  });
});

describe("wrapAngle", () => {
  it("wraps angles into [-180, 180]", () => {
    expect(wrapAngle(90)).toBe(90);
    expect(wrapAngle(270)).toBe(-90);
    expect(wrapAngle(-270)).toBe(90);
    expect(wrapAngle(180)).toBe(180);
    expect(wrapAngle(-180)).toBe(-180);
    expect(wrapAngle(720)).toBe(0);
  });
});

describe("error messages", () => {
  it("strips paths and extra lines", () => {
    expect(sanitizeErrorMessage("cannot open /srv/data/uploads/abc.png\n    at foo")).toBe("cannot open <path>");
    expect(sanitizeErrorMessage("bad file 'C:\\tmp\\x.pdf'")).toBe("bad file '<path>'");
  });

  it("classifies timeouts separately from other failures", () => {
    expect(classifyProcessingError(new Error("Timed out after 30000ms"), "remove background")).toEqual({
      code: "PROCESSING_TIMEOUT",
      message: "Failed to remove background: Timed out after 30000ms"
    });
    expect(classifyProcessingError(new Error("Input buffer contains unsupported image format"), "resize image")).toEqual({
      code: "PROCESSING_FAILED",
      message: "Failed to resize image: Input buffer contains unsupported image format"
    });
    expect(classifyProcessingError("boom", "split PDF")).toEqual({
      code: "PROCESSING_FAILED",
      message: "Failed to split PDF: unknown processing error."
    });
  });

  it("reports processing failures with status 200", () => {
    const error = new ProcessingError("Failed to merge PDFs: bad xref");
    expect(error.status).toBe(200);
    expect(error.code).toBe("PROCESSING_FAILED");
    expect(error).toBeInstanceOf(ProcessingError);
  });
});

describe("toStructuredLog", () => {
  it("serializes event and payload", () => {
    const parsed: unknown = JSON.parse(toStructuredLog("tool.executed", { operation: "resize" }));
    expect(parsed).toMatchObject({ event: "tool.executed", payload: { operation: "resize" } });
  });
});
