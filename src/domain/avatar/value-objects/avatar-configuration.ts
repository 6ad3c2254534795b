import type { Rgb } from './frame.js';

export const AVATAR_BACKENDS = ['auto', 'external', 'braille', 'halfblock'] as const;

export type AvatarBackend = (typeof AVATAR_BACKENDS)[number];

/** Strategies that actually produce glyphs; `auto` resolves to one of these. */
export type GlyphStrategy = Exclude<AvatarBackend, 'auto'>;

export interface GlyphRenderOptions {
  readonly widthChars: number;
  readonly heightChars: number;
  readonly background: Rgb;
}

export const DEFAULT_AVATAR_DIMENSIONS = {
  widthChars: 32,
  heightChars: 16,
} as const;

export const DEFAULT_AVATAR_FPS = 10;
