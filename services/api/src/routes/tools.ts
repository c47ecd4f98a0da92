import type { Router } from "express";
import type { ApiConfig } from "../config";
import { dispatchOperation } from "../dispatcher";
import { asyncHandler } from "../lib/async-handler";
import { createMultipartParser, formFields, uploadedFiles } from "../lib/multipart";
import type { ToolRegistry } from "../registry";
import type { UploadValidator } from "../services/upload-validator";
import type { ToolContext } from "../tools/types";

/**
 * Registers `POST /api/:category/:operation`, the single entry point for every
 * image and PDF tool. Uploads and form fields are parsed from multipart form data,
 * then handed to the dispatcher; its envelope is returned with status 200.
 *
 * @param router - Express router on which to mount the route.
 * @param deps - Dependency bag.
 * @param deps.registry - Operation table used to resolve the route segments.
 * @param deps.validator - Checks uploads and owns their scratch copies.
 * @param deps.context - Output store and segmentation handle passed to each tool.
 */
export function registerToolRoutes(
  router: Router,
  deps: {
    config: ApiConfig;
    registry: ToolRegistry;
    validator: UploadValidator;
    context: ToolContext;
  }
): void {
  const parseMultipart = createMultipartParser({
    maxUploadBytes: deps.config.maxUploadBytes,
    maxFiles: deps.config.maxFilesPerRequest
  });

  router.post(
    "/api/:category/:operation",
    parseMultipart,
    asyncHandler(async (req, res) => {
      const envelope = await dispatchOperation({
        registry: deps.registry,
        validator: deps.validator,
        context: deps.context,
        category: req.params.category,
        operation: req.params.operation,
        fields: formFields(req),
        uploads: uploadedFiles(req)
      });
      res.status(200).json(envelope);
    })
  );
}
