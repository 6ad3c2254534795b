import type { StatusListener } from '../../../domain/download/contracts/downloaders.js';
import type { VideoOption } from '../../../domain/download/video-options.js';
import type { DownloadUrlPayload } from '../dto/download-url.dto.js';

/** Callbacks into whoever is driving the download (prompt, progress line). */
export interface DownloadInteraction {
  readonly chooseVideoOption: (options: readonly VideoOption[], title: string) => Promise<VideoOption>;
  readonly onStatus?: StatusListener;
}

export class DownloadUrlCommand {
  public readonly payload: DownloadUrlPayload;

  public readonly interaction: DownloadInteraction;

  public constructor(payload: DownloadUrlPayload, interaction: DownloadInteraction) {
    this.payload = payload;
    this.interaction = interaction;
  }
}
