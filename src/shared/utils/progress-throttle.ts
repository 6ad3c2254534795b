import { formatBytes } from './filenames.js';

const MIN_INTERVAL_SECONDS = 0.1;

/**
 * Turns a stream of byte counts into status lines: at most one per 100 ms,
 * and with a known total only when the whole-number percentage moves.
 */
export class ProgressThrottle {
  private lastEmit = Number.NEGATIVE_INFINITY;

  private lastPercent = -1;

  public constructor(
    private readonly label: string,
    private readonly now: () => number = () => performance.now() / 1000,
  ) {}

  public update(downloadedBytes: number, totalBytes: number | null): string | null {
    const now = this.now();
    if (now - this.lastEmit < MIN_INTERVAL_SECONDS) {
      return null;
    }
    this.lastEmit = now;

    if (totalBytes && totalBytes > 0) {
      const percent = Math.trunc((downloadedBytes * 100) / Math.max(1, totalBytes));
      if (percent === this.lastPercent) {
        return null;
      }
      this.lastPercent = percent;
      return `${this.label} ${percent}% (${formatBytes(downloadedBytes)}/${formatBytes(totalBytes)})`;
    }

    return `${this.label} ${formatBytes(downloadedBytes)}`;
  }
}
