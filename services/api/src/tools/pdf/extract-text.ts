import { parsePageRanges, type ToolResult } from "@filedesk/core";
import { PDFParse } from "pdf-parse";
import { z } from "zod";
import { formString } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { readPdf } from "./document";

export const extractTextParamsSchema = z.object({
  pages: formString(z.string().optional())
});

export type ExtractTextParams = z.infer<typeof extractTextParamsSchema>;

/**
 * Read the text layer of every page, keyed by 1-based page number.
 */
export async function readPageTexts(bytes: Uint8Array): Promise<Map<number, string>> {
  // The parser may take ownership of the buffer it is given.
  const parser = new PDFParse({ data: new Uint8Array(bytes) });
  try {
    const result = await parser.getText();
    return new Map(result.pages.map((page) => [page.num, page.text.trim()]));
  } finally {
    await parser.destroy();
  }
}

export function formatPageTexts(pages: Array<{ page: number; text: string }>): string {
  return pages.map(({ page, text }) => `--- Page ${page} ---\n${text}`).join("\n\n");
}

export async function runExtractText(file: ScratchFile, params: ExtractTextParams, context: ToolContext): Promise<ToolResult> {
  const { bytes, totalPages } = await readPdf(file);
  const indices = parsePageRanges(params.pages, totalPages);

  const texts = await readPageTexts(bytes);
  const pages = indices.map((index) => ({ page: index + 1, text: texts.get(index + 1) ?? "" }));
  const combined = formatPageTexts(pages);

  const artifactId = await context.outputStore.put(Buffer.from(combined, "utf8"), "txt");

  return {
    success: true,
    message: "Text extracted successfully",
    outputUrl: context.outputStore.urlFor(artifactId),
    metadata: {
      text: combined,
      pages_extracted: pages.map(({ page }) => page),
      total_pages: totalPages
    }
  };
}
