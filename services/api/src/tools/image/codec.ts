import { readFile } from "node:fs/promises";
import {
  ValidationError,
  formatToExtension,
  isImageContentKind,
  type ImageContentKind,
  type TargetImageFormat
} from "@filedesk/core";
import sharp from "sharp";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { bmpToPng, pngToBmp } from "./magick";

export type RawImage = {
  data: Buffer;
  info: {
    width: number;
    height: number;
    channels: 1 | 2 | 3 | 4;
  };
};

export type DecodedImage = RawImage & {
  kind: ImageContentKind;
};

export const WHITE = { r: 255, g: 255, b: 255, alpha: 1 } as const;
const DEFAULT_QUALITY = 95;

/**
 * Decode any supported image into raw pixels, applying EXIF orientation. Every
 * image tool starts from this form.
 */
export async function decodeImage(bytes: Buffer, kind: ImageContentKind): Promise<DecodedImage> {
  // sharp has no BMP loader; ImageMagick hands it over as PNG.
  const source = kind === "bmp" ? await bmpToPng(bytes) : bytes;
  const { data, info } = await sharp(source).rotate().toColourspace("srgb").raw().toBuffer({ resolveWithObject: true });
  return {
    data,
    info: { width: info.width, height: info.height, channels: info.channels },
    kind
  };
}

export async function readScratchImage(file: ScratchFile): Promise<DecodedImage> {
  if (!isImageContentKind(file.kind)) {
    throw new ValidationError("An image file is required");
  }
  return decodeImage(await readFile(file.path), file.kind);
}

export function pipelineOf(image: RawImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.info.width, height: image.info.height, channels: image.info.channels }
  });
}

export async function toRaw(pipeline: sharp.Sharp): Promise<RawImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return { data, info: { width: info.width, height: info.height, channels: info.channels } };
}

/**
 * Output format for a tool that keeps the input's format. GIF is written as PNG.
 */
export function preservedFormat(kind: ImageContentKind): TargetImageFormat {
  switch (kind) {
    case "jpeg":
      return "JPEG";
    case "webp":
      return "WEBP";
    case "bmp":
      return "BMP";
    case "tiff":
      return "TIFF";
    default:
      return "PNG";
  }
}

/**
 * Encode a pipeline into the target format. JPEG and BMP carry no alpha, so
 * transparency is flattened onto white first.
 *
 * @param options.quality - 1-100, used by JPEG and WEBP only
 */
export async function encodeImage(
  pipeline: sharp.Sharp,
  format: TargetImageFormat,
  options: { quality?: number } = {}
): Promise<Buffer> {
  const quality = options.quality ?? DEFAULT_QUALITY;

  if (format === "JPEG") {
    return pipeline.flatten({ background: WHITE }).jpeg({ quality }).toBuffer();
  }
  if (format === "WEBP") {
    return pipeline.webp({ quality }).toBuffer();
  }
  if (format === "TIFF") {
    // sharp defaults TIFF to JPEG compression.
    return pipeline.tiff({ compression: "lzw" }).toBuffer();
  }
  if (format === "BMP") {
    return pngToBmp(await pipeline.flatten({ background: WHITE }).png().toBuffer());
  }
  return pipeline.png().toBuffer();
}

/**
 * Encode and store a pipeline's result, returning the public URL of the artifact.
 */
export async function storeImage(
  context: ToolContext,
  pipeline: sharp.Sharp,
  format: TargetImageFormat,
  options: { quality?: number } = {}
): Promise<string> {
  const bytes = await encodeImage(pipeline, format, options);
  const artifactId = await context.outputStore.put(bytes, formatToExtension(format));
  return context.outputStore.urlFor(artifactId);
}

export function sizeOf(image: RawImage): [number, number] {
  return [image.info.width, image.info.height];
}
