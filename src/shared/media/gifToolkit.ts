import { promises as fs } from 'node:fs';

import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';

import { type Bitmap, cloneBitmap, createBitmap, type Frame } from '../../domain/avatar/value-objects/frame.js';

import { gifFrameDurationSeconds } from './frameTiming.js';

export const DISPOSAL_RESTORE_BACKGROUND = 2;

export const DISPOSAL_RESTORE_PREVIOUS = 3;

/** The subset of a gifuct-js frame the compositor reads. */
export interface GifSubFrame {
  readonly dims: ParsedFrame['dims'];
  readonly patch: Uint8ClampedArray;
  readonly delay?: number;
  readonly disposalType?: number;
}

export interface CompositionState {
  readonly canvas: Bitmap;
}

export interface CompositionStep {
  /** What an observer sees while this sub-frame is displayed. */
  readonly output: Bitmap;
  /** The canvas as it was before this sub-frame was drawn. */
  readonly previous: Bitmap;
  /** The canvas the following sub-frame is drawn onto. */
  readonly next: CompositionState;
}

export function initialCompositionState(width: number, height: number): CompositionState {
  return { canvas: createBitmap(width, height) };
}

/**
 * One step of the disposal fold. Every bitmap it returns is a fresh copy, so
 * `previous`, `output` and the next canvas never share a buffer.
 */
export function compositeStep(state: CompositionState, subFrame: GifSubFrame): CompositionStep {
  const previous = cloneBitmap(state.canvas);
  const output = cloneBitmap(state.canvas);
  compositePatch(output, subFrame.patch, subFrame.dims);

  const disposalType = subFrame.disposalType ?? 0;
  let canvas: Bitmap;

  switch (disposalType) {
    case DISPOSAL_RESTORE_BACKGROUND: {
      canvas = createBitmap(state.canvas.width, state.canvas.height);
      break;
    }
    case DISPOSAL_RESTORE_PREVIOUS: {
      canvas = cloneBitmap(previous);
      break;
    }
    default: {
      canvas = cloneBitmap(output);
      break;
    }
  }

  return { output, previous, next: { canvas } };
}

export function compositeGifFrames(
  subFrames: readonly GifSubFrame[],
  width: number,
  height: number,
): Frame[] {
  let state = initialCompositionState(width, height);

  return subFrames.map((subFrame) => {
    const step = compositeStep(state, subFrame);
    state = step.next;

    return {
      bitmap: step.output,
      durationSeconds: gifFrameDurationSeconds(subFrame.delay),
    } satisfies Frame;
  });
}

/** Decodes every sub-frame and composites it onto the logical screen. */
export async function decodeGifFrames(input: string | Buffer): Promise<Frame[]> {
  const buffer = await loadGifBuffer(input);
  const gif = parseGifBuffer(buffer);
  return compositeGifFrames(decompressFrames(gif, true), gif.lsd.width, gif.lsd.height);
}

async function loadGifBuffer(input: string | Buffer): Promise<Buffer> {
  if (typeof input === 'string') {
    return fs.readFile(input);
  }

  if (Buffer.isBuffer(input)) {
    return input;
  }

  throw new TypeError('GIF input must be a file path or Buffer');
}

function parseGifBuffer(buffer: Buffer): ReturnType<typeof parseGIF> {
  const arrayBuffer = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
  return parseGIF(arrayBuffer);
}

/** Porter-Duff "over" of a positioned patch onto the destination canvas. */
function compositePatch(destination: Bitmap, patch: Uint8ClampedArray, dims: ParsedFrame['dims']): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;
  const { width, height, data } = destination;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY < 0 || destY >= height) {
      continue;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      if (destX < 0 || destX >= width) {
        continue;
      }

      const patchIndex = (y * patchWidth + x) * 4;
      const srcAlpha = (patch[patchIndex + 3] ?? 0) / 255;
      if (srcAlpha === 0) {
        continue;
      }

      const destIndex = (destY * width + destX) * 4;

      if (srcAlpha === 1) {
        data[destIndex] = patch[patchIndex] ?? 0;
        data[destIndex + 1] = patch[patchIndex + 1] ?? 0;
        data[destIndex + 2] = patch[patchIndex + 2] ?? 0;
        data[destIndex + 3] = 255;
        continue;
      }

      const dstAlpha = (data[destIndex + 3] ?? 0) / 255;
      const outAlpha = srcAlpha + dstAlpha * (1 - srcAlpha);

      for (let channel = 0; channel < 3; channel += 1) {
        const src = patch[patchIndex + channel] ?? 0;
        const dst = data[destIndex + channel] ?? 0;
        data[destIndex + channel] = (src * srcAlpha + dst * dstAlpha * (1 - srcAlpha)) / outAlpha;
      }

      data[destIndex + 3] = outAlpha * 255;
    }
  }
}
