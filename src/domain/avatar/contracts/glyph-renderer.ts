import type { GlyphRenderOptions, GlyphStrategy } from '../value-objects/avatar-configuration.js';
import type { Bitmap, Frame, StyledGrid } from '../value-objects/frame.js';

export interface GlyphRenderer {
  readonly strategy: GlyphStrategy;
  readonly options: GlyphRenderOptions;
  render(frame: Frame): StyledGrid;
}

/**
 * A true-pixel renderer supplied by an optional plugin module. It receives the
 * untouched source bitmap and is responsible for its own scaling.
 */
export interface ExternalPixelCapability {
  readonly name: string;
  renderFrame(bitmap: Bitmap, options: GlyphRenderOptions): StyledGrid;
}
