import type { ExternalPixelCapability, GlyphRenderer } from '../../../domain/avatar/contracts/glyph-renderer.js';
import type {
  AvatarBackend,
  GlyphRenderOptions,
  GlyphStrategy,
} from '../../../domain/avatar/value-objects/avatar-configuration.js';
import type { Frame, StyledGrid } from '../../../domain/avatar/value-objects/frame.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

import { BrailleRenderer } from './braille.renderer.js';
import { ExternalPixelRenderer } from './external-pixel.renderer.js';
import { HalfBlockRenderer } from './half-block.renderer.js';

export interface RenderSelection {
  readonly strategy: GlyphStrategy;
  readonly grids: StyledGrid[];
}

export interface GlyphRendererRegistryOptions {
  readonly external?: ExternalPixelCapability | null;
}

/**
 * Ordered strategy list behind every backend choice. `auto` walks the list and
 * keeps the first strategy that renders something; a pinned backend either
 * works or fails loudly.
 */
export class GlyphRendererRegistry {
  private readonly logger = createChildLogger({ module: 'GlyphRendererRegistry' });

  private readonly external: ExternalPixelCapability | null;

  public constructor(options: GlyphRendererRegistryOptions = {}) {
    this.external = options.external ?? null;
  }

  public get hasExternal(): boolean {
    return this.external !== null;
  }

  public candidatesFor(backend: AvatarBackend): GlyphStrategy[] {
    switch (backend) {
      case 'auto':
        return this.external ? ['external', 'braille', 'halfblock'] : ['braille', 'halfblock'];
      case 'external':
      case 'braille':
      case 'halfblock':
        return [backend];
      default: {
        const exhaustive: never = backend;
        throw AppError.configuration('avatar.unknown-backend', `Unknown avatar backend ${String(exhaustive)}`);
      }
    }
  }

  public create(strategy: GlyphStrategy, options: GlyphRenderOptions): GlyphRenderer | null {
    switch (strategy) {
      case 'external':
        return this.external ? new ExternalPixelRenderer(this.external, options) : null;
      case 'braille':
        return new BrailleRenderer(options);
      case 'halfblock':
        return new HalfBlockRenderer(options);
      default: {
        const exhaustive: never = strategy;
        throw AppError.configuration('avatar.unknown-backend', `Unknown glyph strategy ${String(exhaustive)}`);
      }
    }
  }

  public renderAll(frames: readonly Frame[], backend: AvatarBackend, options: GlyphRenderOptions): RenderSelection {
    if (backend === 'external') {
      return this.renderPinnedExternal(frames, options);
    }

    const candidates = this.candidatesFor(backend);
    const fallback = candidates[candidates.length - 1] ?? 'halfblock';

    for (const strategy of candidates) {
      const renderer = this.create(strategy, options);
      if (!renderer) {
        continue;
      }

      if (strategy === 'external') {
        const grids = this.tryRender(renderer, frames);
        if (grids && grids.length > 0) {
          return { strategy, grids };
        }
        continue;
      }

      const grids = frames.map((frame) => renderer.render(frame));
      if (grids.length > 0 || strategy === fallback) {
        return { strategy, grids };
      }
    }

    return { strategy: fallback, grids: [] };
  }

  private renderPinnedExternal(frames: readonly Frame[], options: GlyphRenderOptions): RenderSelection {
    const renderer = this.create('external', options);
    const grids = renderer ? this.tryRender(renderer, frames) : null;

    if (!grids) {
      throw AppError.configuration(
        'avatar.backend-unavailable',
        "Backend 'external' was requested but no pixel module could be used. " +
          "Set TTY_SCRAPE_PIXEL_MODULE to an installed module, or use backend 'braille' or 'halfblock'.",
        { backend: 'external' },
      );
    }

    return { strategy: 'external', grids };
  }

  private tryRender(renderer: GlyphRenderer, frames: readonly Frame[]): StyledGrid[] | null {
    try {
      return frames.map((frame) => renderer.render(frame));
    } catch (error) {
      this.logger.debug({ strategy: renderer.strategy, error }, 'Glyph strategy failed, trying the next one');
      return null;
    }
  }
}
