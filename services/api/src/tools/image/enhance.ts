import type { ToolResult } from "@filedesk/core";
import { z } from "zod";
import { formNumber, numberField } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { pipelineOf, preservedFormat, readScratchImage, storeImage } from "./codec";

const MIN_FACTOR = 0.1;
const MAX_FACTOR = 3;

function enhanceFactor(label: string) {
  const outOfRange = `${label} must be between ${MIN_FACTOR} and ${MAX_FACTOR.toFixed(1)}`;
  return formNumber(numberField(label).min(MIN_FACTOR, outOfRange).max(MAX_FACTOR, outOfRange).default(1));
}

export const enhanceParamsSchema = z.object({
  brightness: enhanceFactor("brightness"),
  contrast: enhanceFactor("contrast"),
  saturation: enhanceFactor("saturation"),
  sharpness: enhanceFactor("sharpness")
});

export type EnhanceParams = z.infer<typeof enhanceParamsSchema>;

/**
 * Apply brightness, contrast, saturation and sharpness factors. A factor of 1 leaves
 * that property untouched; below 1 weakens it and above 1 strengthens it.
 */
export async function runEnhance(file: ScratchFile, params: EnhanceParams, context: ToolContext): Promise<ToolResult> {
  const image = await readScratchImage(file);
  let pipeline = pipelineOf(image);

  if (params.brightness !== 1 || params.saturation !== 1) {
    pipeline = pipeline.modulate({ brightness: params.brightness, saturation: params.saturation });
  }
  if (params.contrast !== 1) {
    // Scale around mid-grey.
    pipeline = pipeline.linear(params.contrast, 128 * (1 - params.contrast));
  }
  if (params.sharpness > 1) {
    pipeline = pipeline.sharpen({ sigma: Math.max(0.3, params.sharpness - 1) });
  } else if (params.sharpness < 1) {
    pipeline = pipeline.blur(0.3 + (1 - params.sharpness) * 2);
  }

  const outputUrl = await storeImage(context, pipeline, preservedFormat(image.kind));

  return {
    success: true,
    message: "Image enhanced successfully",
    outputUrl,
    metadata: {
      adjustments: {
        brightness: params.brightness,
        contrast: params.contrast,
        saturation: params.saturation,
        sharpness: params.sharpness
      }
    }
  };
}
