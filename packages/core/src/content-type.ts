export const IMAGE_CONTENT_KINDS = ["png", "jpeg", "gif", "webp", "bmp", "tiff"] as const;
export type ImageContentKind = (typeof IMAGE_CONTENT_KINDS)[number];

export type ContentKind = ImageContentKind | "pdf";

const PDF_HEADER_SCAN_BYTES = 1024;

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) {
    return false;
  }
  return signature.every((value, index) => bytes[offset + index] === value);
}

function asciiAt(bytes: Uint8Array, text: string, offset = 0): boolean {
  return startsWith(
    bytes,
    [...text].map((char) => char.charCodeAt(0)),
    offset
  );
}

/**
 * Identify a file's type from its leading magic bytes.
 *
 * @returns The detected kind, or `null` when the bytes match no supported signature
 */
export function detectContentKind(bytes: Uint8Array): ContentKind | null {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return "png";
  }
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) {
    return "jpeg";
  }
  if (asciiAt(bytes, "GIF87a") || asciiAt(bytes, "GIF89a")) {
    return "gif";
  }
  if (asciiAt(bytes, "RIFF") && asciiAt(bytes, "WEBP", 8)) {
    return "webp";
  }
  if (asciiAt(bytes, "BM") && bytes.length >= 26) {
    return "bmp";
  }
  if (startsWith(bytes, [0x49, 0x49, 0x2a, 0x00]) || startsWith(bytes, [0x4d, 0x4d, 0x00, 0x2a])) {
    return "tiff";
  }

  // PDF readers accept the header anywhere in the first kilobyte.
  const head = Buffer.from(bytes.subarray(0, PDF_HEADER_SCAN_BYTES));
  if (head.includes("%PDF-")) {
    return "pdf";
  }

  return null;
}

export function isImageContentKind(kind: ContentKind | null): kind is ImageContentKind {
  return kind !== null && (IMAGE_CONTENT_KINDS as readonly string[]).includes(kind);
}
