/**
 * Value objects shared by every stage of the avatar pipeline.
 */
export type Rgb = readonly [number, number, number];

export interface Bitmap {
  readonly width: number;
  readonly height: number;
  /** RGBA, row-major, `width * height * 4` bytes. */
  readonly data: Uint8ClampedArray;
}

export interface Frame {
  readonly bitmap: Bitmap;
  readonly durationSeconds?: number;
}

export interface StyledSpan {
  readonly text: string;
  readonly foreground: Rgb | null;
  readonly background: Rgb | null;
  readonly dim?: boolean;
}

export type StyledRow = readonly StyledSpan[];

export interface StyledGrid {
  readonly rows: readonly StyledRow[];
}

export interface RenderedFrame {
  readonly grid: StyledGrid;
  readonly durationSeconds: number;
}

export function createBitmap(width: number, height: number): Bitmap {
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

export function cloneBitmap(bitmap: Bitmap): Bitmap {
  return { width: bitmap.width, height: bitmap.height, data: new Uint8ClampedArray(bitmap.data) };
}

export function sameRgb(a: Rgb | null, b: Rgb | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }

  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

export function gridToPlainText(grid: StyledGrid): string {
  return grid.rows.map((row) => row.map((span) => span.text).join('')).join('\n');
}
