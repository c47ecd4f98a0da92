import { EmptyUploadError, ValidationError, type ResponseEnvelope, type ToolResult } from "@filedesk/core";
import type { OperationInputs, ToolRegistry } from "./registry";
import type { UploadValidator, UploadedFile } from "./services/upload-validator";
import type { ToolContext } from "./tools/types";

export type IncomingUpload = UploadedFile & {
  fieldname: string;
};

export function toResponseEnvelope(result: ToolResult): ResponseEnvelope {
  return {
    success: result.success,
    message: result.message,
    ...(result.outputUrl ? { output_url: result.outputUrl } : {}),
    ...(result.metadata ? { metadata: result.metadata } : {})
  };
}

function selectUploads(uploads: IncomingUpload[], inputs: OperationInputs): IncomingUpload[] {
  const fieldNames = inputs.field === "files" ? ["files", "files[]"] : ["file"];
  const selected = uploads.filter((upload) => fieldNames.includes(upload.fieldname));

  if (selected.length === 0) {
    throw new EmptyUploadError(inputs.field === "files" ? "No files provided" : "No file provided");
  }
  if (selected.length < inputs.min) {
    throw new ValidationError(`At least ${inputs.min} files are required`);
  }
  if (selected.length > inputs.max) {
    throw new ValidationError(inputs.max === 1 ? "Only one file may be uploaded" : `At most ${inputs.max} files may be uploaded`);
  }
  return selected;
}

/**
 * Run one tool request end to end: resolve the operation, validate parameters
 * and uploads, execute, and remove the scratch copies whatever the outcome.
 */
export async function dispatchOperation(input: {
  registry: ToolRegistry;
  validator: Pick<UploadValidator, "validateAll" | "discard">;
  context: ToolContext;
  category: string;
  operation: string;
  fields: Record<string, unknown>;
  uploads: IncomingUpload[];
}): Promise<ResponseEnvelope> {
  const operation = input.registry.resolve(input.category, input.operation);
  const prepared = operation.prepare(input.fields);
  const uploads = selectUploads(input.uploads, operation.inputs);

  const scratch = await input.validator.validateAll(uploads, operation.inputs.kind);
  try {
    const result = await prepared.execute(scratch, input.context);
    return toResponseEnvelope(result);
  } finally {
    await input.validator.discard(scratch);
  }
}
