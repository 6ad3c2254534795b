import { promises as fs } from 'node:fs';
import path from 'node:path';

import { createCanvas } from '@napi-rs/canvas';

import { createChildLogger } from '../../../shared/logger/pino.js';
import { xdgCacheDir } from '../../../shared/utils/paths.js';
import { inspectFrameSource, listStillFramePaths } from '../frame-source-resolver.js';

const logger = createChildLogger({ module: 'PlaceholderFrames' });

const DEFAULT_FRAME_COUNT = 48;

const FRAME_SIZE_PX = 128;

export interface EnsureFramesOptions {
  readonly frameCount?: number;
  readonly cacheDir?: string;
}

export function generatedFramesDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(xdgCacheDir(env), 'tty-scrape', 'avatar_frames');
}

/**
 * Returns `framesDir` when it already holds something playable; otherwise
 * falls back to a cache directory of generated frames, drawing them the first
 * time.
 */
export async function ensureFramesDir(framesDir: string, options: EnsureFramesOptions = {}): Promise<string> {
  if ((await inspectFrameSource(framesDir)) === 'ok') {
    return framesDir;
  }

  const cacheDir = options.cacheDir ?? generatedFramesDir();
  if ((await listStillFramePaths(cacheDir)).length >= 2) {
    return cacheDir;
  }

  const frameCount = options.frameCount ?? DEFAULT_FRAME_COUNT;
  await fs.mkdir(cacheDir, { recursive: true });
  await generatePlaceholderFrames(cacheDir, frameCount);
  logger.info({ cacheDir, frameCount }, 'Generated placeholder avatar frames');
  return cacheDir;
}

export async function generatePlaceholderFrames(
  outDir: string,
  frameCount: number,
  sizePx: number = FRAME_SIZE_PX,
): Promise<string[]> {
  const written: string[] = [];

  for (let index = 0; index < frameCount; index += 1) {
    const png = drawPlaceholderFrame(index / Math.max(1, frameCount), sizePx);
    const outPath = path.join(outDir, `${index.toString().padStart(3, '0')}.png`);
    await fs.writeFile(outPath, png);
    written.push(outPath);
  }

  return written;
}

/** A drifting orb over scan-lines; `t` is the loop phase in [0, 1). */
export function drawPlaceholderFrame(t: number, sizePx: number = FRAME_SIZE_PX): Buffer {
  const w = sizePx;
  const h = sizePx;
  const canvas = createCanvas(w, h);
  const ctx = canvas.getContext('2d');
  const tau = 2 * Math.PI;

  const baseR = 10 + Math.trunc(10 * Math.sin(tau * t));
  const baseG = 8 + Math.trunc(8 * Math.sin(tau * (t + 0.2)));
  const baseB = 14 + Math.trunc(12 * Math.sin(tau * (t + 0.4)));

  for (let y = 0; y < h; y += 1) {
    const v = y / Math.max(1, h - 1);
    const wave = 0.5 + 0.5 * Math.sin(tau * (t + v * 0.9));
    let r = Math.min(255, Math.trunc(baseR + 30 * wave));
    let g = Math.min(255, Math.trunc(baseG + 18 * wave));
    let b = Math.min(255, Math.trunc(baseB + 40 * wave));
    if (y % 4 === 0) {
      r = Math.trunc(r * 0.75);
      g = Math.trunc(g * 0.75);
      b = Math.trunc(b * 0.75);
    }
    ctx.fillStyle = `rgb(${r}, ${g}, ${b})`;
    ctx.fillRect(0, y, w, 1);
  }

  const cx = w * (0.5 + 0.08 * Math.sin(tau * t));
  const cy = h * (0.5 + 0.08 * Math.cos(tau * t));
  const radius = Math.min(w, h) * (0.23 + 0.03 * Math.sin(tau * (t + 0.1)));

  for (let k = 10; k > 0; k -= 1) {
    const kf = k / 10;
    const glow = Math.trunc(110 * (1 - kf));
    const alpha = (22 * (1 - kf)) / 255;
    ctx.fillStyle = `rgba(${30 + glow}, ${40 + glow}, ${120 + glow}, ${alpha.toFixed(3)})`;
    ctx.beginPath();
    ctx.arc(cx, cy, radius + k * 2, 0, tau);
    ctx.fill();
  }

  ctx.beginPath();
  ctx.arc(cx, cy, radius, 0, tau);
  ctx.fillStyle = `rgba(70, 90, 220, ${(210 / 255).toFixed(3)})`;
  ctx.fill();
  ctx.lineWidth = 2;
  ctx.strokeStyle = `rgba(200, 220, 255, ${(240 / 255).toFixed(3)})`;
  ctx.stroke();

  const hx = cx + radius * 0.55 * Math.cos(tau * t);
  const hy = cy + radius * 0.55 * Math.sin(tau * t);
  ctx.beginPath();
  ctx.arc(hx, hy, radius * 0.25, 0, tau);
  ctx.fillStyle = `rgba(255, 255, 255, ${(90 / 255).toFixed(3)})`;
  ctx.fill();

  const glitchY = Math.trunc(((t * 1.7) % 1) * h);
  ctx.fillStyle = `rgba(255, 80, 220, ${(35 / 255).toFixed(3)})`;
  ctx.fillRect(0, glitchY, w, 2);
  const secondY = (glitchY + 36) % h;
  ctx.fillStyle = `rgba(80, 255, 220, ${(20 / 255).toFixed(3)})`;
  ctx.fillRect(0, secondY, w, 1);

  const blurred = createCanvas(w, h);
  const blurredCtx = blurred.getContext('2d');
  blurredCtx.filter = 'blur(0.6px)';
  blurredCtx.drawImage(canvas, 0, 0);

  return blurred.toBuffer('image/png');
}
