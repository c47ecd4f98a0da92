import type { ToolResult } from "@filedesk/core";
import { PDFDocument } from "pdf-lib";
import { z } from "zod";
import type { ScratchFile } from "../../services/upload-validator";
import { WHITE, pipelineOf, readScratchImage } from "../image/codec";
import type { ToolContext } from "../types";
import { readPdf, storePdf } from "./document";

export const IMAGE_PDF_DPI = 150;
const POINTS_PER_INCH = 72;

export const convertToPdfParamsSchema = z.object({});

export type ConvertToPdfParams = z.infer<typeof convertToPdfParamsSchema>;

/**
 * Place an image on a single page sized to the image at 150 dpi.
 */
async function imageToPdf(file: ScratchFile): Promise<Uint8Array> {
  const image = await readScratchImage(file);
  const png = await pipelineOf(image).flatten({ background: WHITE }).png().toBuffer();

  const document = await PDFDocument.create();
  const embedded = await document.embedPng(png);
  const width = (image.info.width * POINTS_PER_INCH) / IMAGE_PDF_DPI;
  const height = (image.info.height * POINTS_PER_INCH) / IMAGE_PDF_DPI;
  const page = document.addPage([width, height]);
  page.drawImage(embedded, { x: 0, y: 0, width, height });
  return document.save();
}

export async function runConvertToPdf(
  file: ScratchFile,
  _params: ConvertToPdfParams,
  context: ToolContext
): Promise<ToolResult> {
  if (file.kind === "pdf") {
    // Loading checks the document is readable before it is copied as-is.
    const { bytes } = await readPdf(file);
    return {
      success: true,
      message: "File was already PDF; copied",
      outputUrl: await storePdf(context, bytes),
      metadata: { source_format: "pdf" }
    };
  }

  return {
    success: true,
    message: "Converted to PDF successfully",
    outputUrl: await storePdf(context, await imageToPdf(file)),
    metadata: { source_format: file.extension }
  };
}
