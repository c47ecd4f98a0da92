import { readFile } from "node:fs/promises";
import { NotFoundError } from "@filedesk/core";
import express, { type Router } from "express";
import sharp from "sharp";
import type { ApiConfig } from "../config";
import { asyncHandler } from "../lib/async-handler";
import type { ArtifactInfo, OutputStore } from "../services/output-store";
import { bmpSize } from "../tools/image/magick";

const RASTER_EXTENSIONS = new Set(["png", "jpg", "jpeg", "gif", "webp", "tiff", "tif"]);

type ImageDimensions = {
  width: number;
  height: number;
  format: string;
};

async function readImageDimensions(info: ArtifactInfo): Promise<ImageDimensions | null> {
  if (info.extension === "bmp") {
    return { ...(await bmpSize(await readFile(info.path))), format: "bmp" };
  }
  if (!RASTER_EXTENSIONS.has(info.extension)) {
    return null;
  }

  const metadata = await sharp(info.path).metadata();
  if (!metadata.width || !metadata.height || !metadata.format) {
    return null;
  }
  return { width: metadata.width, height: metadata.height, format: metadata.format };
}

/**
 * Serves stored artifacts under the configured URL prefix and exposes
 * `GET /api/image/info/:artifactId` describing one of them.
 */
export function registerOutputRoutes(
  router: Router,
  deps: {
    config: ApiConfig;
    outputStore: OutputStore;
  }
): void {
  router.use(
    deps.config.outputUrlPrefix,
    express.static(deps.config.outputDir, {
      index: false,
      dotfiles: "deny",
      fallthrough: true,
      immutable: true,
      maxAge: "1h"
    })
  );

  router.get(
    "/api/image/info/:artifactId",
    asyncHandler(async (req, res) => {
      const info = await deps.outputStore.describe(req.params.artifactId);
      if (!info) {
        throw new NotFoundError("Output file");
      }

      const dimensions = await readImageDimensions(info);
      res.json({
        filename: info.artifactId,
        size: info.size,
        extension: `.${info.extension}`,
        created: info.createdAt.toISOString(),
        modified: info.modifiedAt.toISOString(),
        ...(dimensions ?? {})
      });
    })
  );
}
