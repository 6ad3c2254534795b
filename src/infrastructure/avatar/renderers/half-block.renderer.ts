import type { GlyphRenderer } from '../../../domain/avatar/contracts/glyph-renderer.js';
import type { GlyphRenderOptions } from '../../../domain/avatar/value-objects/avatar-configuration.js';
import type { Frame, StyledGrid, StyledRow } from '../../../domain/avatar/value-objects/frame.js';
import { resampleOnBackground } from '../../../shared/media/resample.js';

import { RgbPool, StyledRowBuilder } from './styled-row-builder.js';

export const UPPER_HALF_BLOCK = '▀';

/**
 * One cell per 1x2 pixel pair: the top pixel is the glyph colour, the bottom
 * pixel the cell background.
 */
export class HalfBlockRenderer implements GlyphRenderer {
  public readonly strategy = 'halfblock' as const;

  public constructor(public readonly options: GlyphRenderOptions) {}

  public render(frame: Frame): StyledGrid {
    const { widthChars, heightChars, background } = this.options;
    const pixels = resampleOnBackground(frame.bitmap, background, widthChars, heightChars * 2);
    const data = pixels.data;
    const pool = new RgbPool();
    const rows: StyledRow[] = [];

    for (let row = 0; row < heightChars; row += 1) {
      const builder = new StyledRowBuilder(false);
      const topOffset = row * 2 * widthChars * 4;
      const bottomOffset = (row * 2 + 1) * widthChars * 4;

      for (let col = 0; col < widthChars; col += 1) {
        const top = topOffset + col * 4;
        const bottom = bottomOffset + col * 4;
        builder.push(
          UPPER_HALF_BLOCK,
          pool.get(data[top] ?? 0, data[top + 1] ?? 0, data[top + 2] ?? 0),
          pool.get(data[bottom] ?? 0, data[bottom + 1] ?? 0, data[bottom + 2] ?? 0),
        );
      }

      rows.push(builder.build());
    }

    return { rows };
  }
}
