import { describe, expect, test } from 'vitest';

import {
  buildVideoOptions,
  extractHeights,
  isVideoInfo,
  videoTitle,
} from '../../../../src/domain/download/video-options.js';

const info = {
  title: 'Sample clip',
  formats: [
    { format_id: 'a', vcodec: 'none', acodec: 'opus' },
    { format_id: 'b', vcodec: 'avc1', acodec: 'none', height: 1080 },
    { format_id: 'c', vcodec: 'avc1', acodec: 'mp4a', height: 720 },
    { format_id: 'd', vcodec: 'vp9', acodec: 'none', height: 720 },
    { format_id: 'e', vcodec: 'avc1', acodec: 'mp4a', height: 360 },
    { format_id: 'f', vcodec: 'avc1', height: 'tall' },
    'garbage',
  ],
};

describe('isVideoInfo', () => {
  test('recognises formats carrying a video codec', () => {
    expect(isVideoInfo(info)).toBe(true);
  });

  test('recognises playlists and top-level codec or extension hints', () => {
    expect(isVideoInfo({ entries: [{ id: 1 }] })).toBe(true);
    expect(isVideoInfo({ vcodec: 'h264' })).toBe(true);
    expect(isVideoInfo({ ext: 'MP4' })).toBe(true);
  });

  test('rejects audio-only and image metadata', () => {
    expect(isVideoInfo({ formats: [{ vcodec: 'none', acodec: 'mp3' }] })).toBe(false);
    expect(isVideoInfo({ entries: [], ext: 'jpg' })).toBe(false);
    expect(isVideoInfo({})).toBe(false);
  });
});

describe('extractHeights', () => {
  test('lists distinct heights in descending order', () => {
    expect(extractHeights(info, false)).toEqual([1080, 720, 360]);
  });

  test('can require formats that already include audio', () => {
    expect(extractHeights(info, true)).toEqual([720, 360]);
  });
});

describe('buildVideoOptions', () => {
  test('offers merged selectors when ffmpeg is available', () => {
    expect(buildVideoOptions(info, true)).toEqual([
      { label: 'Best available (requires ffmpeg for high res)', formatSelector: 'bestvideo+bestaudio/best' },
      { label: '1080p', height: 1080, formatSelector: 'bestvideo[height<=1080]+bestaudio/best' },
      { label: '720p', height: 720, formatSelector: 'bestvideo[height<=720]+bestaudio/best' },
      { label: '360p', height: 360, formatSelector: 'bestvideo[height<=360]+bestaudio/best' },
      { label: 'Audio only', formatSelector: 'bestaudio/best' },
    ]);
  });

  test('offers single-file selectors without ffmpeg', () => {
    expect(buildVideoOptions(info, false)).toEqual([
      { label: 'Best available (no ffmpeg detected)', formatSelector: 'best' },
      { label: '720p (single file)', height: 720, formatSelector: 'best[height<=720]' },
      { label: '360p (single file)', height: 360, formatSelector: 'best[height<=360]' },
    ]);
  });
});

describe('videoTitle', () => {
  test('falls back to "video" when the title is missing or blank', () => {
    expect(videoTitle(info)).toBe('Sample clip');
    expect(videoTitle({ title: '  ' })).toBe('video');
    expect(videoTitle({})).toBe('video');
  });
});
