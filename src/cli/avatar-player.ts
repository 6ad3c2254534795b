import path from 'node:path';
import { pathToFileURL } from 'node:url';

import type { ChalkInstance } from 'chalk';

import { AvatarView } from '../application/avatar/avatar-view.js';
import { LoadAvatarHandler } from '../application/avatar/handlers/load-avatar.handler.js';
import type { TimerScheduler } from '../domain/avatar/contracts/timer-scheduler.js';
import {
  type AvatarBackend,
  DEFAULT_AVATAR_DIMENSIONS,
  DEFAULT_AVATAR_FPS,
} from '../domain/avatar/value-objects/avatar-configuration.js';
import { ensureFramesDir } from '../infrastructure/avatar/assets/placeholder-frames.js';
import { loadExternalPixelCapability } from '../infrastructure/avatar/renderers/external-pixel.renderer.js';
import { GlyphRendererRegistry } from '../infrastructure/avatar/renderers/renderer-registry.js';
import { NodeTimerScheduler } from '../infrastructure/avatar/timers/node-timer-scheduler.js';
import { readEnvironment } from '../shared/config/environment.js';
import type { AvatarSettings } from '../shared/config/settings.js';
import { createChildLogger } from '../shared/logger/pino.js';

import { chalkFor, HIDE_CURSOR, paintFrame, SHOW_CURSOR, type TerminalStream } from './terminal-surface.js';

const logger = createChildLogger({ module: 'AvatarPlayer' });

export const DEFAULT_FRAMES_DIR = 'avatar_frames';

export interface AvatarCliOptions {
  readonly fps?: number;
  readonly backend?: AvatarBackend;
  readonly width?: number;
  readonly height?: number;
  readonly seconds?: number;
}

export interface AvatarPlayerDependencies {
  readonly output?: TerminalStream;
  readonly timers?: TimerScheduler;
  readonly chalk?: ChalkInstance;
  /** Resolves once playback should end; defaults to `--seconds` or Ctrl-C. */
  readonly waitForExit?: (seconds: number | null) => Promise<void>;
}

/**
 * Module specifiers that look like paths are imported as file URLs relative
 * to the working directory; bare names go through normal resolution.
 */
export function toImportSpecifier(specifier: string | null | undefined, cwd: string = process.cwd()): string | null {
  if (!specifier) {
    return null;
  }
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href;
  }
  return specifier;
}

export async function playAvatar(
  source: string | undefined,
  options: AvatarCliOptions,
  settings: AvatarSettings = {},
  dependencies: AvatarPlayerDependencies = {},
): Promise<void> {
  const output = dependencies.output ?? process.stdout;
  const chalk = dependencies.chalk ?? chalkFor(output);

  const pixelModule = readEnvironment().TTY_SCRAPE_PIXEL_MODULE ?? settings.pixelModule;
  const external = await loadExternalPixelCapability(toImportSpecifier(pixelModule));
  const handler = new LoadAvatarHandler({ registry: new GlyphRendererRegistry({ external }) });

  const framesDir = source ?? (await ensureFramesDir(settings.framesDir ?? DEFAULT_FRAMES_DIR));
  const widthChars = options.width ?? settings.widthChars ?? DEFAULT_AVATAR_DIMENSIONS.widthChars;
  const heightChars = options.height ?? settings.heightChars ?? DEFAULT_AVATAR_DIMENSIONS.heightChars;
  const backend = options.backend ?? settings.backend ?? 'auto';
  const fps = options.fps ?? settings.fps ?? DEFAULT_AVATAR_FPS;

  const view = new AvatarView({
    timers: dependencies.timers ?? new NodeTimerScheduler(),
    handler,
    redraw: () => output.write(paintFrame(view.currentRenderedFrame(), chalk)),
  });

  output.write(HIDE_CURSOR);
  output.write(paintFrame(view.currentRenderedFrame(), chalk));

  try {
    const result = await view.load(framesDir, widthChars, heightChars, backend, fps);
    output.write(paintFrame(view.currentRenderedFrame(), chalk));
    logger.info({ framesDir, frameCount: result.frameCount, elapsedSeconds: result.elapsedSeconds }, 'Avatar playing');

    if (view.status === 'ready') {
      await (dependencies.waitForExit ?? waitForExit)(options.seconds ?? null);
    }
  } finally {
    view.dispose();
    output.write(`${SHOW_CURSOR}\n`);
  }
}

function waitForExit(seconds: number | null): Promise<void> {
  return new Promise<void>((resolve) => {
    let timer: NodeJS.Timeout | null = null;

    const finish = () => {
      process.off('SIGINT', finish);
      if (timer) {
        clearTimeout(timer);
      }
      resolve();
    };

    process.once('SIGINT', finish);
    if (seconds !== null) {
      timer = setTimeout(finish, Math.max(0, seconds) * 1000);
    }
  });
}
