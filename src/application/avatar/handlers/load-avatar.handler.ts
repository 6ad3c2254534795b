import { performance } from 'node:perf_hooks';

import type { GlyphStrategy } from '../../../domain/avatar/value-objects/avatar-configuration.js';
import type { RenderedFrame } from '../../../domain/avatar/value-objects/frame.js';
import type { FrameSourceResult, FrameSourceStatus } from '../../../domain/avatar/value-objects/frame-source.js';
import { type FrameSourceOptions, resolveFrameSource } from '../../../infrastructure/avatar/frame-source-resolver.js';
import {
  GlyphRendererRegistry,
  type RenderSelection,
} from '../../../infrastructure/avatar/renderers/renderer-registry.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { calculateFrameTimingStats, DEFAULT_FRAME_SECONDS } from '../../../shared/media/frameTiming.js';

import type { LoadAvatarCommand } from '../commands/load-avatar.command.js';
import { loadAvatarCommandSchema, type LoadAvatarRequest } from '../dto/load-avatar.dto.js';

export interface LoadAvatarOutcome {
  readonly status: FrameSourceStatus;
  readonly frames: RenderedFrame[];
  readonly strategy: GlyphStrategy | null;
  readonly elapsedSeconds: number;
}

export type FrameSourceLoader = (location: string, options: FrameSourceOptions) => Promise<FrameSourceResult>;

export interface LoadAvatarHandlerDependencies {
  readonly registry?: GlyphRendererRegistry;
  readonly resolveFrames?: FrameSourceLoader;
  readonly now?: () => number;
}

/**
 * Decodes and renders a whole avatar source up front. The returned frames are
 * final; playback never touches the decoder again.
 */
export class LoadAvatarHandler {
  private readonly logger = createChildLogger({ module: 'LoadAvatarHandler' });

  private readonly registry: GlyphRendererRegistry;

  private readonly resolveFrames: FrameSourceLoader;

  private readonly now: () => number;

  public constructor(dependencies: LoadAvatarHandlerDependencies = {}) {
    this.registry = dependencies.registry ?? new GlyphRendererRegistry();
    this.resolveFrames = dependencies.resolveFrames ?? resolveFrameSource;
    this.now = dependencies.now ?? (() => performance.now());
  }

  public async execute(command: LoadAvatarCommand): Promise<LoadAvatarOutcome> {
    const request = this.validate(command);
    const startedAt = this.now();

    this.logger.debug(
      { source: request.source, backend: request.backend, width: request.widthChars, height: request.heightChars },
      'Loading avatar frames',
    );

    let source: FrameSourceResult;
    try {
      source = await this.resolveFrames(request.source, { targetFps: request.fpsCap });
    } catch (error) {
      this.logger.error({ source: request.source, error }, 'Avatar frames could not be decoded');
      throw AppError.fromUnknown(error, 'avatar.load-failed');
    }

    if (source.status !== 'ok') {
      const elapsedSeconds = this.elapsedSince(startedAt);
      this.logger.info({ source: request.source, status: source.status }, 'No avatar frames to render');
      return { status: source.status, frames: [], strategy: null, elapsedSeconds };
    }

    const { kind, frames: sourceFrames } = source;
    let selection: RenderSelection;
    try {
      selection = this.registry.renderAll(sourceFrames, request.backend, {
        widthChars: request.widthChars,
        heightChars: request.heightChars,
        background: request.background,
      });
    } catch (error) {
      this.logger.error({ source: request.source, backend: request.backend, error }, 'Avatar rendering failed');
      throw AppError.fromUnknown(error, 'avatar.load-failed');
    }

    const frames = selection.grids.map((grid, index) => ({
      grid,
      durationSeconds: sourceFrames[index]?.durationSeconds ?? DEFAULT_FRAME_SECONDS,
    } satisfies RenderedFrame));

    const elapsedSeconds = this.elapsedSince(startedAt);
    const timing = calculateFrameTimingStats(frames.map((frame) => frame.durationSeconds * 1000));

    this.logger.info(
      {
        source: request.source,
        kind,
        strategy: selection.strategy,
        frameCount: frames.length,
        averageDelayMs: timing.averageDelayMs,
        elapsedSeconds,
      },
      'Avatar frames rendered',
    );

    return { status: 'ok', frames, strategy: selection.strategy, elapsedSeconds };
  }

  private validate(command: LoadAvatarCommand): LoadAvatarRequest {
    const parsed = loadAvatarCommandSchema.safeParse(command.payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid avatar load request received');
      throw AppError.validation('avatar.invalid-payload', { issues: parsed.error.issues });
    }

    return parsed.data;
  }

  private elapsedSince(startedAt: number): number {
    return (this.now() - startedAt) / 1000;
  }
}
