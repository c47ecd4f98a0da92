import { UnknownOperationError, ValidationError } from "@filedesk/core";
import { describe, expect, it } from "vitest";
import { createToolRegistry } from "../src/registry";
import { backgroundRemoveParamsSchema } from "../src/tools/image/background-remove";
import { resizeParamsSchema } from "../src/tools/image/resize";

const registry = createToolRegistry({ maxFiles: 5 });

function prepareError(category: string, operation: string, fields: Record<string, unknown>): unknown {
  try {
    registry.resolve(category, operation).prepare(fields);
  } catch (error) {
    return error;
  }
  return null;
}

describe("tool registry", () => {
  it("lists every image and PDF operation once", () => {
    expect(registry.list().map((operation) => `${operation.category}/${operation.name}`)).toEqual([
      "image/resize",
      "image/crop",
      "image/rotate",
      "image/enhance",
      "image/remove-background",
      "image/convert-format",
      "pdf/split",
      "pdf/merge",
      "pdf/rearrange",
      "pdf/extract-text",
      "pdf/convert-to-pdf"
    ]);
  });

  it("resolves legacy aliases to the current operation", () => {
    expect(registry.resolve("image", "remove-bg").name).toBe("remove-background");
    expect(registry.resolve("image", "convert").name).toBe("convert-format");
  });

  it("rejects unknown operations", () => {
    expect(() => registry.resolve("image", "blur")).toThrow(UnknownOperationError);
    expect(() => registry.resolve("audio", "trim")).toThrow("Unknown operation: audio/trim");
  });

  it("declares the inputs each operation takes", () => {
    expect(registry.resolve("pdf", "merge").inputs).toEqual({ field: "files", kind: "pdf", min: 2, max: 5 });
    expect(registry.resolve("pdf", "convert-to-pdf").inputs).toEqual({ field: "file", kind: "image-or-pdf", min: 1, max: 1 });
    expect(registry.resolve("image", "crop").inputs).toEqual({ field: "file", kind: "image", min: 1, max: 1 });
  });

  it("returns frozen entries", () => {
    expect(Object.isFrozen(registry.resolve("image", "resize"))).toBe(true);
  });
});

describe("operation parameters", () => {
  it("reports missing and malformed numbers by field name", () => {
    expect(prepareError("image", "resize", {})).toEqual(new ValidationError("width is required"));
    expect(prepareError("image", "resize", { width: "abc" })).toEqual(new ValidationError("width must be a number"));
    expect(prepareError("image", "resize", { width: "0" })).toEqual(new ValidationError("width must be greater than 0"));
    expect(prepareError("image", "crop", { x: "1.5", y: "0", width: "1", height: "1" })).toEqual(
      new ValidationError("x must be an integer")
    );
  });

  it("requires height when the aspect lock is off", () => {
    expect(prepareError("image", "resize", { width: "10", maintain_aspect: "false" })).toEqual(
      new ValidationError("height is required when maintain_aspect is false")
    );
    expect(prepareError("image", "resize", { width: "10", maintain_aspect: "maybe" })).toEqual(
      new ValidationError("maintain_aspect must be true or false")
    );
  });

  it("parses form strings into typed values", () => {
    expect(resizeParamsSchema.parse({ width: " 640 ", height: "", maintain_aspect: "on" })).toEqual({
      width: 640,
      height: undefined,
      maintain_aspect: true
    });
    expect(resizeParamsSchema.parse({ width: "8", height: "6", maintain_aspect: "0" })).toEqual({
      width: 8,
      height: 6,
      maintain_aspect: false
    });
    expect(resizeParamsSchema.parse({ width: ["10", "20"], height: "5" })).toEqual({
      width: 20,
      height: 5,
      maintain_aspect: true
    });
  });

  it("bounds enhancement factors", () => {
    expect(prepareError("image", "enhance", { brightness: "5" })).toEqual(
      new ValidationError("brightness must be between 0.1 and 3.0")
    );
    expect(prepareError("image", "enhance", { sharpness: "0.05" })).toEqual(
      new ValidationError("sharpness must be between 0.1 and 3.0")
    );
    expect(prepareError("image", "enhance", {})).toBeNull();
  });

  it("validates conversion targets", () => {
    expect(prepareError("image", "convert-format", {})).toEqual(new ValidationError("target_format is required"));
    expect(prepareError("image", "convert-format", { target_format: "gif" })).toEqual(
      new ValidationError("target_format must be one of JPEG, PNG, WEBP, BMP, TIFF")
    );
    expect(prepareError("image", "convert-format", { target_format: "webp", quality: "101" })).toEqual(
      new ValidationError("quality must be between 1 and 100")
    );
    expect(prepareError("image", "convert-format", { target_format: "jpg" })).toBeNull();
  });

  it("decodes JSON fields", () => {
    expect(prepareError("pdf", "rearrange", {})).toEqual(new ValidationError("page_order is required"));
    expect(prepareError("pdf", "rearrange", { page_order: "[1," })).toEqual(
      new ValidationError("page_order must be valid JSON")
    );
    expect(prepareError("pdf", "rearrange", { page_order: "[1, 2.5]" })).toEqual(
      new ValidationError("page_order must be an array of 1-based integers")
    );
    expect(prepareError("pdf", "merge", { order: "[0, \"a\"]" })).toEqual(
      new ValidationError("order must be an array of integers")
    );
    expect(prepareError("pdf", "merge", { order: "[1, 0]" })).toBeNull();
  });

  it("accepts foreground points as pairs or objects", () => {
    expect(backgroundRemoveParamsSchema.parse({ foreground_points: "[[1.4, 2], {\"x\": 3, \"y\": 4.6}]" })).toEqual({
      points: [
        { x: 1, y: 2 },
        { x: 3, y: 5 }
      ]
    });
    expect(backgroundRemoveParamsSchema.parse({})).toEqual({ points: [] });
    expect(prepareError("image", "remove-background", { points: "[[1, \"a\"]]" })).toEqual(
      new ValidationError("points.0: Invalid input")
    );
  });
});
