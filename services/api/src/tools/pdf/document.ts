import { readFile } from "node:fs/promises";
import { ValidationError } from "@filedesk/core";
import { PDFDocument } from "pdf-lib";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";

export async function readPdf(file: ScratchFile): Promise<{ bytes: Buffer; document: PDFDocument; totalPages: number }> {
  if (file.kind !== "pdf") {
    throw new ValidationError("A PDF file is required");
  }

  const bytes = await readFile(file.path);
  const document = await PDFDocument.load(bytes);
  const totalPages = document.getPageCount();
  if (totalPages === 0) {
    throw new ValidationError("PDF has no pages");
  }
  return { bytes, document, totalPages };
}

/**
 * Build a new document from pages of one or more sources, in the order given.
 */
export async function assemblePages(selections: Array<{ source: PDFDocument; pageIndices: number[] }>): Promise<Uint8Array> {
  const output = await PDFDocument.create();
  for (const selection of selections) {
    const pages = await output.copyPages(selection.source, selection.pageIndices);
    for (const page of pages) {
      output.addPage(page);
    }
  }
  return output.save();
}

export async function storePdf(context: ToolContext, bytes: Uint8Array): Promise<string> {
  const artifactId = await context.outputStore.put(bytes, "pdf");
  return context.outputStore.urlFor(artifactId);
}
