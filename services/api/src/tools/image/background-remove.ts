import { ProcessingError, type ToolResult } from "@filedesk/core";
import sharp from "sharp";
import { z } from "zod";
import { formJson } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { pipelineOf, readScratchImage, toRaw } from "./codec";

const MAX_POINTS = 100;

export type Point = { x: number; y: number };

const pointSchema = z
  .union([z.tuple([z.number(), z.number()]), z.object({ x: z.number(), y: z.number() })])
  .transform((value): Point => {
    const [x, y] = Array.isArray(value) ? value : [value.x, value.y];
    return { x: Math.round(x), y: Math.round(y) };
  });

function pointsField(label: string) {
  return formJson(
    label,
    z
      .array(pointSchema, { invalid_type_error: `${label} must be an array of [x, y] points` })
      .max(MAX_POINTS, `${label} accepts at most ${MAX_POINTS} points`)
      .optional()
  );
}

export const backgroundRemoveParamsSchema = z
  .object({
    points: pointsField("points"),
    foreground_points: pointsField("foreground_points")
  })
  .transform((value) => ({ points: value.points ?? value.foreground_points ?? [] }));

export type BackgroundRemoveParams = z.infer<typeof backgroundRemoveParamsSchema>;

/**
 * Resize a mask to the source size with nearest-neighbour sampling and binarize it.
 */
async function normalizeMask(mask: Buffer, width: number, height: number): Promise<Uint8Array> {
  const { data, info } = await sharp(mask)
    .removeAlpha()
    .toColourspace("b-w")
    .resize({ width, height, fit: "fill", kernel: "nearest" })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const binary = new Uint8Array(width * height);
  for (let index = 0; index < binary.length; index += 1) {
    binary[index] = (data[index * info.channels] ?? 0) > 127 ? 1 : 0;
  }
  return binary;
}

function containsAnyPoint(mask: Uint8Array, points: Point[], width: number, height: number): boolean {
  return points.some(
    (point) => point.x >= 0 && point.y >= 0 && point.x < width && point.y < height && mask[point.y * width + point.x] === 1
  );
}

/**
 * Combine instance masks into one alpha plane. Without points every instance is
 * foreground; with points only instances under at least one point are.
 */
export function combineMasks(
  masks: Uint8Array[],
  points: Point[],
  width: number,
  height: number
): { alpha: Buffer; selected: number } {
  const alpha = Buffer.alloc(width * height);
  let selected = 0;

  for (const mask of masks) {
    if (points.length > 0 && !containsAnyPoint(mask, points, width, height)) {
      continue;
    }
    selected += 1;
    for (let index = 0; index < alpha.length; index += 1) {
      if (mask[index] === 1) {
        alpha[index] = 255;
      }
    }
  }

  return { alpha, selected };
}

/**
 * Cut the detected foreground out of an image. The result is always a PNG whose
 * alpha channel is the combined segmentation mask.
 */
export async function runBackgroundRemove(
  file: ScratchFile,
  params: BackgroundRemoveParams,
  context: ToolContext
): Promise<ToolResult> {
  const image = await readScratchImage(file);
  const { width, height } = image.info;

  const masks = await context.segmentation.segment({
    bytes: await pipelineOf(image).png().toBuffer(),
    contentType: "image/png"
  });
  if (masks.length === 0) {
    throw new ProcessingError("No objects detected for segmentation");
  }

  const normalized = await Promise.all(masks.map((mask) => normalizeMask(mask, width, height)));
  const { alpha, selected } = combineMasks(normalized, params.points, width, height);

  // The source alpha, if any, is replaced by the mask.
  const rgb = await toRaw(pipelineOf(image).removeAlpha());
  const bytes = await sharp(rgb.data, { raw: { width, height, channels: rgb.info.channels } })
    .joinChannel(alpha, { raw: { width, height, channels: 1 } })
    .png()
    .toBuffer();
  const artifactId = await context.outputStore.put(bytes, "png");

  return {
    success: true,
    message: "Background removed successfully",
    outputUrl: context.outputStore.urlFor(artifactId),
    metadata: {
      segments_detected: masks.length,
      segments_selected: selected,
      foreground_points_used: params.points.length > 0
    }
  };
}
