/**
 * Format negotiation over yt-dlp's info dictionary. Everything here is pure so
 * it can be tested against hand-written info objects.
 */
export type VideoInfo = Record<string, unknown>;

export interface VideoOption {
  readonly label: string;
  readonly formatSelector: string;
  readonly height?: number;
}

const VIDEO_EXTENSIONS = new Set(['mp4', 'mkv', 'webm', 'mov', 'm4v', 'flv', 'avi']);

export function hasCodec(value: unknown): boolean {
  return value !== undefined && value !== null && value !== 'none';
}

function formatsOf(info: VideoInfo): Record<string, unknown>[] {
  const formats = info.formats;
  if (!Array.isArray(formats)) {
    return [];
  }

  return formats.filter(
    (format): format is Record<string, unknown> => typeof format === 'object' && format !== null,
  );
}

export function isVideoInfo(info: VideoInfo): boolean {
  const entries = info.entries;
  if (Array.isArray(entries) && entries.length > 0) {
    return true;
  }

  if (formatsOf(info).some((format) => hasCodec(format.vcodec))) {
    return true;
  }

  if (hasCodec(info.vcodec)) {
    return true;
  }

  return typeof info.ext === 'string' && VIDEO_EXTENSIONS.has(info.ext.toLowerCase());
}

export function extractHeights(info: VideoInfo, requireSingleFile: boolean): number[] {
  const heights = new Set<number>();

  for (const format of formatsOf(info)) {
    const height = format.height;
    if (typeof height !== 'number' || !Number.isInteger(height)) {
      continue;
    }
    if (!hasCodec(format.vcodec)) {
      continue;
    }
    if (requireSingleFile && !hasCodec(format.acodec)) {
      continue;
    }
    heights.add(height);
  }

  return Array.from(heights).sort((a, b) => b - a);
}

/**
 * With ffmpeg available, video and audio streams can be merged, so every
 * height is offered as "best video up to H plus best audio". Without it only
 * formats that already carry both streams are usable.
 */
export function buildVideoOptions(info: VideoInfo, canMerge: boolean): VideoOption[] {
  const heights = extractHeights(info, !canMerge);

  if (canMerge) {
    return [
      { label: 'Best available (requires ffmpeg for high res)', formatSelector: 'bestvideo+bestaudio/best' },
      ...heights.map((height) => ({
        label: `${height}p`,
        height,
        formatSelector: `bestvideo[height<=${height}]+bestaudio/best`,
      })),
      { label: 'Audio only', formatSelector: 'bestaudio/best' },
    ];
  }

  return [
    { label: 'Best available (no ffmpeg detected)', formatSelector: 'best' },
    ...heights.map((height) => ({
      label: `${height}p (single file)`,
      height,
      formatSelector: `best[height<=${height}]`,
    })),
  ];
}

export function videoTitle(info: VideoInfo): string {
  return typeof info.title === 'string' && info.title.trim() ? info.title : 'video';
}
