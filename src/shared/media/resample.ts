import { createCanvas } from '@napi-rs/canvas';

import type { Bitmap, Rgb } from '../../domain/avatar/value-objects/frame.js';

/**
 * Draws the bitmap over an opaque background at the target size. Terminal
 * cells have no alpha channel, so every renderer samples this copy.
 */
export function resampleOnBackground(
  bitmap: Bitmap,
  background: Rgb,
  targetWidth: number,
  targetHeight: number,
): Bitmap {
  if (targetWidth <= 0 || targetHeight <= 0) {
    throw new RangeError(`Invalid resize target ${targetWidth}x${targetHeight}`);
  }

  const source = createCanvas(bitmap.width, bitmap.height);
  const sourceCtx = source.getContext('2d');
  const imageData = sourceCtx.createImageData(bitmap.width, bitmap.height);
  imageData.data.set(bitmap.data);
  sourceCtx.putImageData(imageData, 0, 0);

  const target = createCanvas(targetWidth, targetHeight);
  const ctx = target.getContext('2d');
  const [red, green, blue] = background;
  ctx.fillStyle = `rgb(${red}, ${green}, ${blue})`;
  ctx.fillRect(0, 0, targetWidth, targetHeight);
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = 'high';
  ctx.drawImage(source, 0, 0, targetWidth, targetHeight);

  const resampled = ctx.getImageData(0, 0, targetWidth, targetHeight);
  return {
    width: resampled.width,
    height: resampled.height,
    data: new Uint8ClampedArray(resampled.data),
  };
}
