import { z } from 'zod';

import type { ExternalPixelCapability, GlyphRenderer } from '../../../domain/avatar/contracts/glyph-renderer.js';
import type { GlyphRenderOptions } from '../../../domain/avatar/value-objects/avatar-configuration.js';
import type { Bitmap, Frame, StyledGrid } from '../../../domain/avatar/value-objects/frame.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

const logger = createChildLogger({ module: 'ExternalPixelRenderer' });

const byte = z.number().int().min(0).max(255);
const rgbSchema = z.tuple([byte, byte, byte]).readonly();

export const styledGridSchema = z.object({
  rows: z.array(
    z.array(
      z.object({
        text: z.string(),
        foreground: rgbSchema.nullable(),
        background: rgbSchema.nullable(),
        dim: z.boolean().optional(),
      }),
    ),
  ),
});

const pixelModuleSchema = z.object({
  renderFrame: z.function(),
  name: z.string().optional(),
});

/** Adapts an external capability to the renderer contract. */
export class ExternalPixelRenderer implements GlyphRenderer {
  public readonly strategy = 'external' as const;

  public constructor(
    private readonly capability: ExternalPixelCapability,
    public readonly options: GlyphRenderOptions,
  ) {}

  public render(frame: Frame): StyledGrid {
    return this.capability.renderFrame(frame.bitmap, this.options);
  }
}

/**
 * Loads a pixel-rendering plugin by module specifier. Anything that goes wrong
 * while importing or inspecting the module means "not available"; the grids it
 * returns are validated on every call.
 */
export async function loadExternalPixelCapability(
  specifier: string | null | undefined,
  importer: (specifier: string) => Promise<unknown> = (value) => import(value),
): Promise<ExternalPixelCapability | null> {
  if (!specifier) {
    return null;
  }

  try {
    const loaded = await importer(specifier);
    const candidate = pixelModuleSchema.safeParse(
      typeof loaded === 'object' && loaded !== null && 'default' in loaded && !('renderFrame' in loaded)
        ? loaded.default
        : loaded,
    );

    if (!candidate.success) {
      logger.debug({ specifier, issues: candidate.error.issues }, 'Pixel module has no renderFrame export');
      return null;
    }

    const { renderFrame, name } = candidate.data;
    return {
      name: name ?? specifier,
      renderFrame: (bitmap: Bitmap, options: GlyphRenderOptions): StyledGrid =>
        styledGridSchema.parse(renderFrame(bitmap, options)),
    };
  } catch (error) {
    logger.debug({ specifier, error }, 'Pixel module could not be loaded');
    return null;
  }
}
