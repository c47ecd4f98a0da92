import { wrapAngle, type ToolResult } from "@filedesk/core";
import { z } from "zod";
import { formBoolean, formNumber, numberField } from "../../lib/form-fields";
import type { ScratchFile } from "../../services/upload-validator";
import type { ToolContext } from "../types";
import { WHITE, pipelineOf, preservedFormat, readScratchImage, sizeOf, storeImage, toRaw, type RawImage } from "./codec";

export const rotateParamsSchema = z.object({
  angle: formNumber(numberField("angle")),
  expand: formBoolean("expand", true)
});

export type RotateParams = z.infer<typeof rotateParamsSchema>;

// Center `image` on a width x height canvas, padding with white or cropping as needed.
async function fitCentered(image: RawImage, width: number, height: number): Promise<RawImage> {
  let current = image;
  const padX = Math.max(0, width - current.info.width);
  const padY = Math.max(0, height - current.info.height);
  if (padX > 0 || padY > 0) {
    current = await toRaw(
      pipelineOf(current).extend({
        left: Math.floor(padX / 2),
        right: padX - Math.floor(padX / 2),
        top: Math.floor(padY / 2),
        bottom: padY - Math.floor(padY / 2),
        background: WHITE
      })
    );
  }

  if (current.info.width === width && current.info.height === height) {
    return current;
  }

  return toRaw(
    pipelineOf(current).extract({
      left: Math.floor((current.info.width - width) / 2),
      top: Math.floor((current.info.height - height) / 2),
      width,
      height
    })
  );
}

/**
 * Rotate an image clockwise by any angle. With `expand` the canvas grows to hold
 * the whole rotated image; without it the source dimensions are kept.
 */
export async function runRotate(file: ScratchFile, params: RotateParams, context: ToolContext): Promise<ToolResult> {
  const image = await readScratchImage(file);
  const { width, height } = image.info;

  let rotated: RawImage = image;
  if (params.angle % 360 !== 0) {
    rotated = await toRaw(pipelineOf(image).rotate(params.angle, { background: WHITE }));
    if (!params.expand) {
      rotated = await fitCentered(rotated, width, height);
    }
  }

  const outputUrl = await storeImage(context, pipelineOf(rotated), preservedFormat(image.kind));

  return {
    success: true,
    message: `Image rotated by ${params.angle} degrees`,
    outputUrl,
    metadata: {
      rotation_angle: params.angle,
      display_angle: wrapAngle(params.angle),
      expanded: params.expand,
      original_size: sizeOf(image),
      new_size: sizeOf(rotated)
    }
  };
}
