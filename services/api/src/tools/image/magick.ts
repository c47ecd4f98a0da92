import { readFile } from "node:fs/promises";
import { ImageMagick, MagickFormat, initializeImageMagick } from "@imagemagick/magick-wasm";

let magickReady: Promise<void> | null = null;

/**
 * Load the ImageMagick wasm module once. A failed load is retried on the next call.
 */
export async function ensureMagick(): Promise<void> {
  if (!magickReady) {
    magickReady = (async () => {
      const wasm = await readFile(require.resolve("@imagemagick/magick-wasm/magick.wasm"));
      await initializeImageMagick(new Uint8Array(wasm));
    })();
    magickReady.catch(() => {
      magickReady = null;
    });
  }
  await magickReady;
}

/**
 * Decode BMP bytes (any bit depth, palette or RLE) into a PNG sharp can read.
 */
export async function bmpToPng(bytes: Uint8Array): Promise<Buffer> {
  await ensureMagick();
  return ImageMagick.read(bytes, MagickFormat.Bmp, (image) =>
    image.write(MagickFormat.Png, (data) => Buffer.from(data))
  );
}

export async function pngToBmp(png: Uint8Array): Promise<Buffer> {
  await ensureMagick();
  return ImageMagick.read(png, MagickFormat.Png, (image) =>
    image.write(MagickFormat.Bmp, (data) => Buffer.from(data))
  );
}

export async function bmpSize(bytes: Uint8Array): Promise<{ width: number; height: number }> {
  await ensureMagick();
  return ImageMagick.read(bytes, MagickFormat.Bmp, (image) => ({ width: image.width, height: image.height }));
}
