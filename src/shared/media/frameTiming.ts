import { isPositiveFinite, roundTo } from './numberUtils.js';

/** Floor applied to GIF frame delays; containers declaring 0 ms would otherwise spin. */
export const GIF_MIN_FRAME_SECONDS = 0.02;

export const GIF_DEFAULT_DELAY_MS = 100;

/** Used for still-image sequences and by the scheduler when no fps cap is set. */
export const DEFAULT_FRAME_SECONDS = 0.1;

const MAX_TARGET_FPS = 1000;

export interface FrameTimingStats {
  averageDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  stdDeviationMs: number;
  fps: number;
}

export function calculateFrameTimingStats(delaysMs: number[]): FrameTimingStats {
  if (delaysMs.length === 0) {
    return {
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      stdDeviationMs: 0,
      fps: 0,
    };
  }

  const total = delaysMs.reduce((sum, delay) => sum + delay, 0);
  const average = total / delaysMs.length;
  const min = Math.min(...delaysMs);
  const max = Math.max(...delaysMs);
  const variance =
    delaysMs.reduce((acc, delay) => acc + (delay - average) ** 2, 0) / delaysMs.length;
  const stdDeviation = Math.sqrt(variance);
  const fps = average > 0 ? 1000 / average : 0;

  return {
    averageDelayMs: roundTo(average, 3),
    minDelayMs: roundTo(min, 3),
    maxDelayMs: roundTo(max, 3),
    stdDeviationMs: roundTo(stdDeviation, 3),
    fps: roundTo(fps, 3),
  };
}

export function gifFrameDurationSeconds(delayMs: number | undefined): number {
  const declared = typeof delayMs === 'number' && Number.isFinite(delayMs) ? delayMs : GIF_DEFAULT_DELAY_MS;
  return Math.max(GIF_MIN_FRAME_SECONDS, declared / 1000);
}

export function stillFrameDurationSeconds(targetFps: number | undefined): number {
  if (!isPositiveFinite(targetFps) || targetFps > MAX_TARGET_FPS) {
    return DEFAULT_FRAME_SECONDS;
  }

  return 1 / targetFps;
}

export function minimumPlaybackSeconds(fpsCap: number | null | undefined): number {
  return isPositiveFinite(fpsCap) ? 1 / fpsCap : 0;
}

/**
 * The fps cap only ever slows playback down: a frame shorter than `1 / fpsCap`
 * is stretched, a longer one keeps its own duration.
 */
export function resolvePlaybackDuration(
  frameSeconds: number,
  fpsCap: number | null | undefined,
): number {
  const minimum = minimumPlaybackSeconds(fpsCap);

  if (!Number.isFinite(frameSeconds) || frameSeconds <= 0) {
    return minimum > 0 ? minimum : DEFAULT_FRAME_SECONDS;
  }

  return Math.max(frameSeconds, minimum);
}
