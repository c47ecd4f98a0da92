import {
  LOSSY_IMAGE_FORMATS,
  TARGET_IMAGE_FORMATS,
  parseTargetImageFormat,
  type ToolResult
} from "@filedesk/core";
import { z } from "zod";
import { formNumber, formString, integerField } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { pipelineOf, readScratchImage, storeImage } from "./codec";

export const convertParamsSchema = z.object({
  target_format: formString(
    z.string({ required_error: "target_format is required" }).transform((value, ctx) => {
      const format = parseTargetImageFormat(value);
      if (!format) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `target_format must be one of ${TARGET_IMAGE_FORMATS.join(", ")}`
        });
        return z.NEVER;
      }
      return format;
    })
  ),
  quality: formNumber(
    integerField("quality").min(1, "quality must be between 1 and 100").max(100, "quality must be between 1 and 100").default(95)
  )
});

export type ConvertParams = z.infer<typeof convertParamsSchema>;

export async function runConvert(file: ScratchFile, params: ConvertParams, context: ToolContext): Promise<ToolResult> {
  const image = await readScratchImage(file);
  const format = params.target_format;
  const lossy = LOSSY_IMAGE_FORMATS.has(format);

  const outputUrl = await storeImage(context, pipelineOf(image), format, { quality: params.quality });

  return {
    success: true,
    message: `Image converted to ${format}`,
    outputUrl,
    metadata: {
      original_format: file.extension.toUpperCase(),
      target_format: format,
      quality: lossy ? params.quality : null
    }
  };
}
