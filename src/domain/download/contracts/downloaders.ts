import type { VideoInfo } from '../video-options.js';

export type StatusListener = (message: string) => void;

export interface VideoProgress {
  readonly status: 'downloading' | 'finished';
  readonly downloadedBytes: number;
  readonly totalBytes: number | null;
}

export interface VideoDownloadRequest {
  readonly outputDir: string;
  readonly formatSelector: string;
  readonly onProgress?: (progress: VideoProgress) => void;
}

export interface VideoDownloader {
  probe(url: string): Promise<VideoInfo>;
  download(url: string, request: VideoDownloadRequest): Promise<void>;
}

export interface ImageDownloadRequest {
  readonly url: string;
  readonly outputDir: string;
  readonly maxImages?: number | null;
  readonly onStatus?: StatusListener;
}

export interface ImageDownloader {
  /** Resolves with the saved file paths, never an empty list. */
  download(request: ImageDownloadRequest): Promise<string[]>;
}
