import {
  AppError,
  EmptyUploadError,
  ProcessingError,
  UnknownOperationError,
  ValidationError,
  classifyProcessingError,
  resolveOperationKey,
  type ImageOperation,
  type PdfOperation,
  type ToolCategory,
  type ToolResult,
  type UploadKind
} from "@filedesk/core";
import type { z } from "zod";
import { describeFirstIssue } from "./lib/form-fields";
import { formatErrorForLog, logError, logInfo } from "./lib/log";
import type { ScratchFile } from "./services/upload-validator";
import { backgroundRemoveParamsSchema, runBackgroundRemove } from "./tools/image/background-remove";
import { convertParamsSchema, runConvert } from "./tools/image/convert";
import { cropParamsSchema, runCrop } from "./tools/image/crop";
import { enhanceParamsSchema, runEnhance } from "./tools/image/enhance";
import { resizeParamsSchema, runResize } from "./tools/image/resize";
import { rotateParamsSchema, runRotate } from "./tools/image/rotate";
import { convertToPdfParamsSchema, runConvertToPdf } from "./tools/pdf/convert-to-pdf";
import { extractTextParamsSchema, runExtractText } from "./tools/pdf/extract-text";
import { mergeParamsSchema, runMerge } from "./tools/pdf/merge";
import { rearrangeParamsSchema, runRearrange } from "./tools/pdf/rearrange";
import { runSplit, splitParamsSchema } from "./tools/pdf/split";
import type { MultiFileTool, SingleFileTool, ToolContext } from "./tools/types";

export type OperationInputs = {
  /** Multipart field the uploads arrive under. */
  field: "file" | "files";
  kind: UploadKind;
  min: number;
  max: number;
};

export type PreparedOperation = {
  execute(files: ScratchFile[], context: ToolContext): Promise<ToolResult>;
};

export type RegisteredOperation = {
  category: ToolCategory;
  name: string;
  /** Phrase used in failure messages, e.g. "resize image". */
  action: string;
  inputs: OperationInputs;
  prepare(fields: Record<string, unknown>): PreparedOperation;
};

export interface ToolRegistry {
  resolve(category: string, operation: string): RegisteredOperation;
  list(): RegisteredOperation[];
}

const SINGLE_IMAGE: OperationInputs = { field: "file", kind: "image", min: 1, max: 1 };
const SINGLE_PDF: OperationInputs = { field: "file", kind: "pdf", min: 1, max: 1 };

function singleFile<P>(tool: SingleFileTool<P>): MultiFileTool<P> {
  return async (files, params, context) => {
    const [file] = files;
    if (!file) {
      throw new EmptyUploadError();
    }
    return tool(file, params, context);
  };
}

function toProcessingError(error: unknown, action: string): ProcessingError {
  if (error instanceof ProcessingError) {
    return error;
  }
  const classified = classifyProcessingError(error, action);
  return new ProcessingError(classified.message, classified.code);
}

function defineOperation<S extends z.ZodTypeAny>(definition: {
  category: ToolCategory;
  name: string;
  action: string;
  inputs: OperationInputs;
  schema: S;
  run: MultiFileTool<z.output<S>>;
}): RegisteredOperation {
  const { schema, run, ...descriptor } = definition;

  return {
    ...descriptor,
    prepare(fields) {
      const parsed = schema.safeParse(fields);
      if (!parsed.success) {
        throw new ValidationError(describeFirstIssue(parsed.error));
      }
      const params: z.output<S> = parsed.data;

      return {
        async execute(files, context) {
          const startedAt = Date.now();
          try {
            const result = await run(files, params, context);
            logInfo("tool.executed", {
              category: descriptor.category,
              operation: descriptor.name,
              files: files.length,
              durationMs: Date.now() - startedAt
            });
            return result;
          } catch (error) {
            // Caller mistakes surface as-is; anything else is a processing failure.
            if (error instanceof AppError && !(error instanceof ProcessingError)) {
              throw error;
            }
            const failure = toProcessingError(error, descriptor.action);
            logError("tool.failed", {
              category: descriptor.category,
              operation: descriptor.name,
              code: failure.code,
              durationMs: Date.now() - startedAt,
              error: formatErrorForLog(error)
            });
            throw failure;
          }
        }
      };
    }
  };
}

function imageOperations(): { [K in ImageOperation]: RegisteredOperation } {
  return {
    resize: defineOperation({
      category: "image",
      name: "resize",
      action: "resize image",
      inputs: SINGLE_IMAGE,
      schema: resizeParamsSchema,
      run: singleFile(runResize)
    }),
    crop: defineOperation({
      category: "image",
      name: "crop",
      action: "crop image",
      inputs: SINGLE_IMAGE,
      schema: cropParamsSchema,
      run: singleFile(runCrop)
    }),
    rotate: defineOperation({
      category: "image",
      name: "rotate",
      action: "rotate image",
      inputs: SINGLE_IMAGE,
      schema: rotateParamsSchema,
      run: singleFile(runRotate)
    }),
    enhance: defineOperation({
      category: "image",
      name: "enhance",
      action: "enhance image",
      inputs: SINGLE_IMAGE,
      schema: enhanceParamsSchema,
      run: singleFile(runEnhance)
    }),
    "remove-background": defineOperation({
      category: "image",
      name: "remove-background",
      action: "remove background",
      inputs: SINGLE_IMAGE,
      schema: backgroundRemoveParamsSchema,
      run: singleFile(runBackgroundRemove)
    }),
    "convert-format": defineOperation({
      category: "image",
      name: "convert-format",
      action: "convert image format",
      inputs: SINGLE_IMAGE,
      schema: convertParamsSchema,
      run: singleFile(runConvert)
    })
  };
}

function pdfOperations(maxFiles: number): { [K in PdfOperation]: RegisteredOperation } {
  return {
    split: defineOperation({
      category: "pdf",
      name: "split",
      action: "split PDF",
      inputs: SINGLE_PDF,
      schema: splitParamsSchema,
      run: singleFile(runSplit)
    }),
    merge: defineOperation({
      category: "pdf",
      name: "merge",
      action: "merge PDFs",
      inputs: { field: "files", kind: "pdf", min: 2, max: maxFiles },
      schema: mergeParamsSchema,
      run: runMerge
    }),
    rearrange: defineOperation({
      category: "pdf",
      name: "rearrange",
      action: "rearrange PDF",
      inputs: SINGLE_PDF,
      schema: rearrangeParamsSchema,
      run: singleFile(runRearrange)
    }),
    "extract-text": defineOperation({
      category: "pdf",
      name: "extract-text",
      action: "extract text",
      inputs: SINGLE_PDF,
      schema: extractTextParamsSchema,
      run: singleFile(runExtractText)
    }),
    "convert-to-pdf": defineOperation({
      category: "pdf",
      name: "convert-to-pdf",
      action: "convert to PDF",
      inputs: { field: "file", kind: "image-or-pdf", min: 1, max: 1 },
      schema: convertToPdfParamsSchema,
      run: singleFile(runConvertToPdf)
    })
  };
}

/**
 * Build the fixed table of operations. The registry never changes after creation.
 *
 * @param options.maxFiles - Upper bound on uploads for multi-file operations
 */
export function createToolRegistry(options: { maxFiles: number }): ToolRegistry {
  const entries = new Map<string, RegisteredOperation>();
  for (const operation of [...Object.values(imageOperations()), ...Object.values(pdfOperations(options.maxFiles))]) {
    entries.set(`${operation.category}/${operation.name}`, Object.freeze(operation));
  }

  return {
    resolve(category, operation) {
      const key = resolveOperationKey(category, operation);
      const entry = key ? entries.get(`${key.category}/${key.operation}`) : undefined;
      if (!entry) {
        throw new UnknownOperationError(category, operation);
      }
      return entry;
    },
    list() {
      return [...entries.values()];
    }
  };
}
