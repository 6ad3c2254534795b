import { promises as fs } from 'node:fs';
import path from 'node:path';

import { createCanvas, loadImage } from '@napi-rs/canvas';
import { PNG } from 'pngjs';

import type { Bitmap } from '../../domain/avatar/value-objects/frame.js';

export const STILL_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(['.png', '.jpg', '.jpeg', '.webp', '.bmp']);

export function isStillImagePath(filePath: string): boolean {
  return STILL_IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function isGifPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.gif';
}

/**
 * PNGs are decoded with pngjs; the remaining still formats go through skia.
 * Decode failures propagate to the caller unchanged.
 */
export async function decodeStillImage(filePath: string): Promise<Bitmap> {
  const buffer = await fs.readFile(filePath);

  if (path.extname(filePath).toLowerCase() === '.png') {
    return decodePng(buffer);
  }

  const image = await loadImage(buffer);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);
  const imageData = ctx.getImageData(0, 0, image.width, image.height);

  return {
    width: imageData.width,
    height: imageData.height,
    data: new Uint8ClampedArray(imageData.data),
  };
}

export function decodePng(buffer: Buffer): Bitmap {
  const png = PNG.sync.read(buffer);
  return {
    width: png.width,
    height: png.height,
    data: new Uint8ClampedArray(png.data),
  };
}

export function encodePng(bitmap: Bitmap): Buffer {
  const png = new PNG({ width: bitmap.width, height: bitmap.height });
  png.data = Buffer.from(bitmap.data);
  return PNG.sync.write(png);
}
