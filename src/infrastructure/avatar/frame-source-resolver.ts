import { promises as fs, type Stats } from 'node:fs';
import path from 'node:path';

import type { Frame } from '../../domain/avatar/value-objects/frame.js';
import type { FrameSourceResult, FrameSourceStatus } from '../../domain/avatar/value-objects/frame-source.js';
import { stillFrameDurationSeconds } from '../../shared/media/frameTiming.js';
import { decodeGifFrames } from '../../shared/media/gifToolkit.js';
import { decodeStillImage, isGifPath, isStillImagePath } from '../../shared/media/stillImage.js';
import { isMissingPathError } from '../../shared/utils/paths.js';

export interface FrameSourceOptions {
  readonly targetFps?: number | null;
}

/**
 * Turns a GIF, a single still image or a directory of numbered stills into an
 * ordered frame list. Directory order is file-name order and nothing else.
 */
export async function resolveFrameSource(
  location: string,
  options: FrameSourceOptions = {},
): Promise<FrameSourceResult> {
  const stats = await statOrNull(location);
  if (!stats) {
    return { status: 'missing' };
  }

  if (stats.isFile()) {
    if (isGifPath(location)) {
      const frames = await decodeGifFrames(location);
      return frames.length > 0
        ? { status: 'ok', kind: 'animated', frames }
        : { status: 'empty' };
    }

    if (isStillImagePath(location)) {
      return { status: 'ok', kind: 'stills', frames: await decodeStills([location], options) };
    }

    return { status: 'empty' };
  }

  if (!stats.isDirectory()) {
    return { status: 'empty' };
  }

  const paths = await listStillFramePaths(location);
  if (paths.length === 0) {
    return { status: 'empty' };
  }

  return { status: 'ok', kind: 'stills', frames: await decodeStills(paths, options) };
}

/** Cheap check used before deciding to generate placeholder frames. */
export async function inspectFrameSource(location: string): Promise<FrameSourceStatus> {
  const stats = await statOrNull(location);
  if (!stats) {
    return 'missing';
  }

  if (stats.isFile()) {
    return isGifPath(location) || isStillImagePath(location) ? 'ok' : 'empty';
  }

  if (!stats.isDirectory()) {
    return 'empty';
  }

  return (await listStillFramePaths(location)).length > 0 ? 'ok' : 'empty';
}

export async function listStillFramePaths(directory: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error) {
    if (isMissingPathError(error)) {
      return [];
    }
    throw error;
  }

  const candidates = names.filter((name) => isStillImagePath(name)).sort(compareFileNames);
  const files: string[] = [];

  for (const name of candidates) {
    const fullPath = path.join(directory, name);
    const stats = await statOrNull(fullPath);
    if (stats?.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

async function decodeStills(paths: readonly string[], options: FrameSourceOptions): Promise<Frame[]> {
  const durationSeconds = stillFrameDurationSeconds(options.targetFps ?? undefined);
  const frames: Frame[] = [];

  for (const filePath of paths) {
    frames.push({ bitmap: await decodeStillImage(filePath), durationSeconds });
  }

  return frames;
}

function compareFileNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }

  return a < b ? -1 : 1;
}

async function statOrNull(location: string): Promise<Stats | null> {
  try {
    return await fs.stat(location);
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

