import type { ToolResult } from "@filedesk/core";
import { z } from "zod";
import { formBoolean, formNumber, integerField } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { pipelineOf, preservedFormat, readScratchImage, sizeOf, storeImage } from "./codec";

export const resizeParamsSchema = z
  .object({
    width: formNumber(integerField("width").positive("width must be greater than 0")),
    height: formNumber(integerField("height").positive("height must be greater than 0").optional()),
    maintain_aspect: formBoolean("maintain_aspect", true)
  })
  .superRefine((value, ctx) => {
    if (!value.maintain_aspect && value.height === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["height"],
        message: "height is required when maintain_aspect is false"
      });
    }
  });

export type ResizeParams = z.infer<typeof resizeParamsSchema>;

/**
 * Target size for a resize. With the aspect lock the requested height is ignored
 * and derived from the width.
 */
export function resizeTarget(source: { width: number; height: number }, params: ResizeParams): [number, number] {
  if (params.maintain_aspect || params.height === undefined) {
    const aspect = source.width / source.height;
    return [params.width, Math.max(1, Math.round(params.width / aspect))];
  }
  return [params.width, params.height];
}

/**
 * Resize an uploaded image to exact dimensions, keeping its format.
 */
export async function runResize(file: ScratchFile, params: ResizeParams, context: ToolContext): Promise<ToolResult> {
  const image = await readScratchImage(file);
  const [width, height] = resizeTarget(image.info, params);

  const outputUrl = await storeImage(
    context,
    pipelineOf(image).resize({ width, height, fit: "fill" }),
    preservedFormat(image.kind)
  );

  return {
    success: true,
    message: `Image resized to ${width}x${height}`,
    outputUrl,
    metadata: {
      original_size: sizeOf(image),
      new_size: [width, height]
    }
  };
}
