import { ValidationError, type ToolResult } from "@filedesk/core";
import { z } from "zod";
import { formNumber, integerField } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { pipelineOf, preservedFormat, readScratchImage, sizeOf, storeImage } from "./codec";

export const cropParamsSchema = z.object({
  x: formNumber(integerField("x").min(0, "x must be 0 or greater")),
  y: formNumber(integerField("y").min(0, "y must be 0 or greater")),
  width: formNumber(integerField("width").positive("width must be greater than 0")),
  height: formNumber(integerField("height").positive("height must be greater than 0"))
});

export type CropParams = z.infer<typeof cropParamsSchema>;

export async function runCrop(file: ScratchFile, params: CropParams, context: ToolContext): Promise<ToolResult> {
  const image = await readScratchImage(file);
  const { width: sourceWidth, height: sourceHeight } = image.info;

  if (params.x + params.width > sourceWidth || params.y + params.height > sourceHeight) {
    throw new ValidationError(
      `Crop area ${params.width}x${params.height} at (${params.x}, ${params.y}) exceeds image bounds ${sourceWidth}x${sourceHeight}`
    );
  }

  const outputUrl = await storeImage(
    context,
    pipelineOf(image).extract({ left: params.x, top: params.y, width: params.width, height: params.height }),
    preservedFormat(image.kind)
  );

  return {
    success: true,
    message: `Image cropped to ${params.width}x${params.height}`,
    outputUrl,
    metadata: {
      crop_area: { x: params.x, y: params.y, width: params.width, height: params.height },
      original_size: sizeOf(image)
    }
  };
}
