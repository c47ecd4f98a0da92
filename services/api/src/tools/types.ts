import type { ToolResult } from "@filedesk/core";
import type { SegmentationModel } from "../providers/segmentation-provider";
import type { OutputStore } from "../services/output-store";
import type { ScratchFile } from "../services/upload-validator";

export type ToolContext = {
  outputStore: OutputStore;
  segmentation: Pick<SegmentationModel, "segment">;
};

export type SingleFileTool<P> = (file: ScratchFile, params: P, context: ToolContext) => Promise<ToolResult>;

export type MultiFileTool<P> = (files: ScratchFile[], params: P, context: ToolContext) => Promise<ToolResult>;
