import type { GlyphRenderer } from '../../../domain/avatar/contracts/glyph-renderer.js';
import type { GlyphRenderOptions } from '../../../domain/avatar/value-objects/avatar-configuration.js';
import type { Frame, Rgb, StyledGrid, StyledRow } from '../../../domain/avatar/value-objects/frame.js';
import { resampleOnBackground } from '../../../shared/media/resample.js';

import { RgbPool, StyledRowBuilder } from './styled-row-builder.js';

export const BRAILLE_BASE_CODEPOINT = 0x2800;

const REFINEMENT_ROUNDS = 4;

/**
 * Dot bit per sample position, indexed `[dy][dx]` within the 2x4 block:
 *
 *   1 4
 *   2 5
 *   3 6
 *   7 8
 */
const DOT_BITS: readonly (readonly [number, number])[] = [
  [0x01, 0x08],
  [0x02, 0x10],
  [0x04, 0x20],
  [0x40, 0x80],
];

const BRAILLE_GLYPHS: readonly string[] = Array.from({ length: 256 }, (_, mask) =>
  String.fromCodePoint(BRAILLE_BASE_CODEPOINT + mask),
);

export interface BlockClusters {
  readonly foreground: Rgb;
  readonly background: Rgb;
  readonly mask: number;
}

export function luma(color: Rgb): number {
  return 0.2126 * color[0] + 0.7152 * color[1] + 0.0722 * color[2];
}

export function brailleGlyph(mask: number): string {
  return BRAILLE_GLYPHS[mask & 0xff] ?? ' ';
}

export function dotBit(dx: number, dy: number): number {
  return DOT_BITS[dy]?.[dx] ?? 0;
}

/**
 * 2-means over the eight samples of one cell, listed row by row (`dy`, then
 * `dx`). Centres start at the darkest and brightest sample; the brighter final
 * centre becomes the dot colour.
 */
export function clusterBlock(samples: readonly Rgb[]): BlockClusters {
  const first = samples[0];
  if (!first) {
    return { foreground: [0, 0, 0], background: [0, 0, 0], mask: 0 };
  }

  let darkest = first;
  let brightest = first;
  for (const sample of samples) {
    if (luma(sample) < luma(darkest)) {
      darkest = sample;
    }
    if (luma(sample) > luma(brightest)) {
      brightest = sample;
    }
  }

  let c0: [number, number, number] = [darkest[0], darkest[1], darkest[2]];
  let c1: [number, number, number] = [brightest[0], brightest[1], brightest[2]];
  const assignments = new Array<number>(samples.length).fill(0);

  for (let round = 0; round < REFINEMENT_ROUNDS; round += 1) {
    const sum0 = [0, 0, 0];
    const sum1 = [0, 0, 0];
    let n0 = 0;
    let n1 = 0;

    samples.forEach((sample, index) => {
      const d0 = squaredDistance(sample, c0);
      const d1 = squaredDistance(sample, c1);
      const target = d1 < d0 ? sum1 : sum0;

      assignments[index] = d1 < d0 ? 1 : 0;
      target[0] = (target[0] ?? 0) + sample[0];
      target[1] = (target[1] ?? 0) + sample[1];
      target[2] = (target[2] ?? 0) + sample[2];
      if (d1 < d0) {
        n1 += 1;
      } else {
        n0 += 1;
      }
    });

    if (n0 > 0) {
      c0 = [(sum0[0] ?? 0) / n0, (sum0[1] ?? 0) / n0, (sum0[2] ?? 0) / n0];
    }
    if (n1 > 0) {
      c1 = [(sum1[0] ?? 0) / n1, (sum1[1] ?? 0) / n1, (sum1[2] ?? 0) / n1];
    }
  }

  const center0: Rgb = [Math.round(c0[0]), Math.round(c0[1]), Math.round(c0[2])];
  const center1: Rgb = [Math.round(c1[0]), Math.round(c1[1]), Math.round(c1[2])];
  const foregroundCluster = luma(center0) >= luma(center1) ? 0 : 1;

  let mask = 0;
  assignments.forEach((cluster, index) => {
    if (cluster === foregroundCluster) {
      mask |= dotBit(index % 2, Math.floor(index / 2));
    }
  });

  return foregroundCluster === 0
    ? { foreground: center0, background: center1, mask }
    : { foreground: center1, background: center0, mask };
}

/**
 * One cell per 2x4 pixel block. Roughly eight times the spatial resolution of
 * half blocks, at the cost of a tiny clustering pass per cell.
 */
export class BrailleRenderer implements GlyphRenderer {
  public readonly strategy = 'braille' as const;

  public constructor(public readonly options: GlyphRenderOptions) {}

  public render(frame: Frame): StyledGrid {
    const { widthChars, heightChars, background } = this.options;
    const pixelWidth = widthChars * 2;
    const pixels = resampleOnBackground(frame.bitmap, background, pixelWidth, heightChars * 4);
    const data = pixels.data;
    const pool = new RgbPool();
    const rows: StyledRow[] = [];

    for (let cy = 0; cy < heightChars; cy += 1) {
      const builder = new StyledRowBuilder(true);

      for (let cx = 0; cx < widthChars; cx += 1) {
        const samples: Rgb[] = [];
        for (let dy = 0; dy < 4; dy += 1) {
          for (let dx = 0; dx < 2; dx += 1) {
            const index = ((cy * 4 + dy) * pixelWidth + cx * 2 + dx) * 4;
            samples.push(pool.get(data[index] ?? 0, data[index + 1] ?? 0, data[index + 2] ?? 0));
          }
        }

        const clusters = clusterBlock(samples);
        builder.push(
          brailleGlyph(clusters.mask),
          pool.get(...clusters.foreground),
          pool.get(...clusters.background),
        );
      }

      rows.push(builder.build());
    }

    return { rows };
  }
}

function squaredDistance(sample: Rgb, center: readonly [number, number, number]): number {
  const dr = sample[0] - center[0];
  const dg = sample[1] - center[1];
  const db = sample[2] - center[2];
  return dr * dr + dg * dg + db * db;
}
