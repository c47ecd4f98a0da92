import { ValidationError, isFullPermutation, type ToolResult } from "@filedesk/core";
import { z } from "zod";
import { formJson } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { assemblePages, readPdf, storePdf } from "./document";

const PAGE_ORDER_MESSAGE = "page_order must be an array of 1-based integers";

export const rearrangeParamsSchema = z.object({
  page_order: formJson(
    "page_order",
    z
      .array(z.number({ invalid_type_error: PAGE_ORDER_MESSAGE }).int(PAGE_ORDER_MESSAGE), {
        required_error: "page_order is required",
        invalid_type_error: PAGE_ORDER_MESSAGE
      })
      .min(1, "page_order is required")
  )
});

export type RearrangeParams = z.infer<typeof rearrangeParamsSchema>;

export async function runRearrange(file: ScratchFile, params: RearrangeParams, context: ToolContext): Promise<ToolResult> {
  const { document, totalPages } = await readPdf(file);
  const order = params.page_order;

  if (order.some((page) => page < 1 || page > totalPages)) {
    throw new ValidationError("page_order contains out-of-bounds indices");
  }
  if (!isFullPermutation(order, totalPages)) {
    throw new ValidationError("page_order must be a permutation of all pages");
  }

  const bytes = await assemblePages([{ source: document, pageIndices: order.map((page) => page - 1) }]);

  return {
    success: true,
    message: "PDF pages rearranged successfully",
    outputUrl: await storePdf(context, bytes),
    metadata: {
      page_order: order,
      total_pages: totalPages
    }
  };
}
