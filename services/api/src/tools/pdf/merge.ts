import { ValidationError, type ToolResult } from "@filedesk/core";
import { z } from "zod";
import { formJson } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { assemblePages, readPdf, storePdf } from "./document";

const ORDER_MESSAGE = "order must be an array of integers";

export const mergeParamsSchema = z.object({
  order: formJson(
    "order",
    z
      .array(z.number({ invalid_type_error: ORDER_MESSAGE }).int(ORDER_MESSAGE), { invalid_type_error: ORDER_MESSAGE })
      .optional()
  )
});

export type MergeParams = z.infer<typeof mergeParamsSchema>;

/**
 * Concatenate PDFs. `order` lists 0-based indices into the uploaded files and
 * may repeat or omit files; without it the upload order is used.
 */
export async function runMerge(files: ScratchFile[], params: MergeParams, context: ToolContext): Promise<ToolResult> {
  const order = params.order ?? files.map((_, index) => index);
  const selected = order.map((index) => {
    const file = files[index];
    if (!file) {
      throw new ValidationError(`order index out of range: ${index}`);
    }
    return file;
  });
  if (selected.length === 0) {
    throw new ValidationError("order must select at least one file");
  }

  const sources = await Promise.all(selected.map((file) => readPdf(file)));

  const bytes = await assemblePages(
    sources.map((source) => ({
      source: source.document,
      pageIndices: source.document.getPageIndices()
    }))
  );
  const totalPages = sources.reduce((sum, source) => sum + source.totalPages, 0);

  return {
    success: true,
    message: "PDFs merged successfully",
    outputUrl: await storePdf(context, bytes),
    metadata: {
      files: selected.map((file) => file.originalName),
      total_pages: totalPages
    }
  };
}
