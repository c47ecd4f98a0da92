import { parsePageRanges, type ToolResult } from "@filedesk/core";
import { z } from "zod";
import { formString } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { assemblePages, readPdf, storePdf } from "./document";

export const splitParamsSchema = z.object({
  pages: formString(z.string().optional())
});

export type SplitParams = z.infer<typeof splitParamsSchema>;

/**
 * Write each selected page as its own single-page PDF, in selection order.
 */
export async function runSplit(file: ScratchFile, params: SplitParams, context: ToolContext): Promise<ToolResult> {
  const { document, totalPages } = await readPdf(file);
  const indices = parsePageRanges(params.pages, totalPages);

  // Render everything before storing so a failure leaves no partial set behind.
  const rendered: Array<{ page: number; bytes: Uint8Array }> = [];
  for (const index of indices) {
    rendered.push({ page: index + 1, bytes: await assemblePages([{ source: document, pageIndices: [index] }]) });
  }

  const outputs: Array<{ page: number; output_url: string }> = [];
  for (const entry of rendered) {
    outputs.push({ page: entry.page, output_url: await storePdf(context, entry.bytes) });
  }

  return {
    success: true,
    message: "PDF split successfully",
    outputUrl: outputs.length === 1 ? outputs[0]?.output_url : undefined,
    metadata: {
      outputs,
      total_pages: totalPages
    }
  };
}
