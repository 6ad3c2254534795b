import { type Rgb, sameRgb, type StyledSpan } from '../../../domain/avatar/value-objects/frame.js';

/**
 * Interns colours so identical cells share one tuple; spans compare colours by
 * value either way.
 */
export class RgbPool {
  private readonly colors = new Map<number, Rgb>();

  public get(r: number, g: number, b: number): Rgb {
    const key = (r << 16) | (g << 8) | b;
    const existing = this.colors.get(key);
    if (existing) {
      return existing;
    }

    const created: Rgb = [r, g, b];
    this.colors.set(key, created);
    return created;
  }
}

/**
 * Collapses one row of cells into maximal runs. A cell extends the open run
 * only when its colours match and, if `matchGlyph` is set, its glyph matches too.
 */
export class StyledRowBuilder {
  private readonly spans: StyledSpan[] = [];

  private runText = '';

  private runGlyph: string | null = null;

  private runForeground: Rgb | null = null;

  private runBackground: Rgb | null = null;

  public constructor(private readonly matchGlyph: boolean) {}

  public push(glyph: string, foreground: Rgb, background: Rgb): void {
    const continues =
      this.runGlyph !== null &&
      sameRgb(this.runForeground, foreground) &&
      sameRgb(this.runBackground, background) &&
      (!this.matchGlyph || this.runGlyph === glyph);

    if (continues) {
      this.runText += glyph;
      return;
    }

    this.flush();
    this.runText = glyph;
    this.runGlyph = glyph;
    this.runForeground = foreground;
    this.runBackground = background;
  }

  public build(): StyledSpan[] {
    this.flush();
    return this.spans;
  }

  private flush(): void {
    if (this.runGlyph === null) {
      return;
    }

    this.spans.push({ text: this.runText, foreground: this.runForeground, background: this.runBackground });
    this.runText = '';
    this.runGlyph = null;
    this.runForeground = null;
    this.runBackground = null;
  }
}
