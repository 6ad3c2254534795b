import path from 'node:path';

import type { ImageDownloader, VideoDownloader } from '../../../domain/download/contracts/downloaders.js';
import { buildVideoOptions, isVideoInfo, videoTitle, type VideoOption } from '../../../domain/download/video-options.js';
import { HttpImageDownloader } from '../../../infrastructure/download/http-downloader.js';
import { ffmpegIsAvailable, YtDlpClient } from '../../../infrastructure/download/ytdlp-client.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { domainFromUrl, sanitizeFilename, sessionStamp } from '../../../shared/utils/filenames.js';
import { ProgressThrottle } from '../../../shared/utils/progress-throttle.js';

import type { DownloadInteraction, DownloadUrlCommand } from '../commands/download-url.command.js';
import { downloadUrlCommandSchema, type DownloadUrlRequest } from '../dto/download-url.dto.js';

export type DownloadOutcome =
  | { readonly kind: 'video'; readonly outputDir: string; readonly title: string; readonly option: VideoOption }
  | { readonly kind: 'images'; readonly outputDir: string; readonly files: string[] };

export interface DownloadUrlHandlerDependencies {
  readonly video?: VideoDownloader;
  readonly images?: ImageDownloader;
  readonly canMerge?: () => Promise<boolean>;
  readonly now?: () => Date;
}

const FALLBACK_CODES = new Set(['download.unsupported-url', 'download.failed']);

/**
 * Routes a URL to yt-dlp or the page image scraper. In `auto` mode a URL that
 * yt-dlp rejects (or that turns out not to be a video) falls through to image
 * scraping.
 */
export class DownloadUrlHandler {
  private readonly logger = createChildLogger({ module: 'DownloadUrlHandler' });

  private readonly video: VideoDownloader;

  private readonly images: ImageDownloader;

  private readonly canMerge: () => Promise<boolean>;

  private readonly now: () => Date;

  public constructor(dependencies: DownloadUrlHandlerDependencies = {}) {
    this.video = dependencies.video ?? new YtDlpClient();
    this.images = dependencies.images ?? new HttpImageDownloader();
    this.canMerge = dependencies.canMerge ?? ffmpegIsAvailable;
    this.now = dependencies.now ?? (() => new Date());
  }

  public async execute(command: DownloadUrlCommand): Promise<DownloadOutcome> {
    const request = this.validate(command);
    const outputDir = path.join(
      request.outputRoot,
      sanitizeFilename(domainFromUrl(request.url)),
      sessionStamp(this.now()),
    );

    this.logger.info({ url: request.url, mode: request.mode, outputDir }, 'Download requested');

    if (request.mode === 'auto' || request.mode === 'video') {
      try {
        const outcome = await this.tryVideo(request, outputDir, command.interaction);
        if (outcome) {
          return outcome;
        }
      } catch (error) {
        if (request.mode === 'video' || !(error instanceof AppError) || !FALLBACK_CODES.has(error.code)) {
          throw error;
        }
        this.logger.info({ url: request.url, code: error.code }, 'Video download unavailable, scraping images');
      }
    }

    if (request.mode === 'auto' || request.mode === 'images') {
      const files = await this.images.download({
        url: request.url,
        outputDir,
        maxImages: request.maxImages,
        onStatus: command.interaction.onStatus,
      });
      this.logger.info({ url: request.url, count: files.length, outputDir }, 'Images downloaded');
      return { kind: 'images', outputDir, files };
    }

    throw AppError.downloadFailed('No downloader matched the requested mode.');
  }

  private async tryVideo(
    request: DownloadUrlRequest,
    outputDir: string,
    interaction: DownloadInteraction,
  ): Promise<DownloadOutcome | null> {
    const info = await this.video.probe(request.url);
    if (!isVideoInfo(info)) {
      this.logger.debug({ url: request.url }, 'yt-dlp metadata does not describe a video');
      return null;
    }

    const title = videoTitle(info);
    const options = buildVideoOptions(info, await this.canMerge());
    const option = await interaction.chooseVideoOption(options, title);

    const throttle = new ProgressThrottle('video');
    const onStatus = interaction.onStatus;

    await this.video.download(request.url, {
      outputDir,
      formatSelector: option.formatSelector,
      onProgress: (progress) => {
        if (!onStatus) {
          return;
        }
        if (progress.status === 'finished') {
          onStatus('video finished, finalizing…');
          return;
        }
        const message = throttle.update(progress.downloadedBytes, progress.totalBytes);
        if (message) {
          onStatus(message);
        }
      },
    });

    this.logger.info({ url: request.url, title, format: option.formatSelector, outputDir }, 'Video downloaded');
    return { kind: 'video', outputDir, title, option };
  }

  private validate(command: DownloadUrlCommand): DownloadUrlRequest {
    const parsed = downloadUrlCommandSchema.safeParse(command.payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid download request received');
      throw AppError.validation('download.invalid-payload', { issues: parsed.error.issues });
    }

    return parsed.data;
  }
}
