import { describe, expect, it } from "vitest";
import { detectContentKind, isImageContentKind } from "../src";

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

describe("detectContentKind", () => {
  it("recognizes image signatures", () => {
    expect(detectContentKind(bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00))).toBe("png");
    expect(detectContentKind(bytes(0xff, 0xd8, 0xff, 0xe0))).toBe("jpeg");
    expect(detectContentKind(Buffer.from("GIF89a-rest"))).toBe("gif");
    expect(detectContentKind(Buffer.from("RIFF\u0000\u0000\u0000\u0000WEBPVP8 "))).toBe("webp");
    expect(detectContentKind(bytes(0x49, 0x49, 0x2a, 0x00, 0x08))).toBe("tiff");
    expect(detectContentKind(bytes(0x4d, 0x4d, 0x00, 0x2a, 0x00))).toBe("tiff");
  });

  it("requires a full BMP file header", () => {
    expect(detectContentKind(Buffer.concat([Buffer.from("BM"), Buffer.alloc(24)]))).toBe("bmp");
    expect(detectContentKind(Buffer.from("BM short"))).toBeNull();
  });

  it("finds a PDF header inside the first kilobyte", () => {
    expect(detectContentKind(Buffer.from("%PDF-1.7\n"))).toBe("pdf");
    expect(detectContentKind(Buffer.concat([Buffer.alloc(100, 0x20), Buffer.from("%PDF-1.4")]))).toBe("pdf");
    expect(detectContentKind(Buffer.concat([Buffer.alloc(1100, 0x20), Buffer.from("%PDF-1.4")]))).toBeNull();
  });

  it("returns null for unknown or empty content", () => {
    expect(detectContentKind(Buffer.from("plain text"))).toBeNull();
    expect(detectContentKind(new Uint8Array(0))).toBeNull();
  });
});

describe("isImageContentKind", () => {
  it("separates image kinds from PDF", () => {
    expect(isImageContentKind("webp")).toBe(true);
    expect(isImageContentKind("pdf")).toBe(false);
    expect(isImageContentKind(null)).toBe(false);
  });
});
