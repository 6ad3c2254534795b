import { createWriteStream, promises as fs } from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import type {
  ImageDownloader,
  ImageDownloadRequest,
  StatusListener,
} from '../../domain/download/contracts/downloaders.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { ensureUniquePath, sanitizeFilename } from '../../shared/utils/filenames.js';
import { ProgressThrottle } from '../../shared/utils/progress-throttle.js';

import { extractImageItems, looksLikeDirectImage, type ImageItem } from './image-scraper.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const REQUEST_TIMEOUT_MS = 30_000;

export function createHttpClient(): AxiosInstance {
  return axios.create({
    timeout: REQUEST_TIMEOUT_MS,
    headers: { 'User-Agent': DEFAULT_USER_AGENT },
    maxRedirects: 10,
  });
}

export function extensionFromContentType(contentType: string | null | undefined): string | null {
  if (!contentType) {
    return null;
  }

  const mime = contentType.split(';', 1)[0]?.trim().toLowerCase() ?? '';
  if (!mime.startsWith('image/')) {
    return null;
  }

  const subtype = mime.slice('image/'.length);
  if (subtype === 'jpeg' || subtype === 'jpg') {
    return '.jpg';
  }
  if (subtype === 'svg+xml') {
    return '.svg';
  }
  if (['png', 'gif', 'webp', 'bmp'].includes(subtype)) {
    return `.${subtype}`;
  }

  return null;
}

export class HttpImageDownloader implements ImageDownloader {
  private readonly logger = createChildLogger({ module: 'HttpImageDownloader' });

  public constructor(private readonly http: AxiosInstance = createHttpClient()) {}

  /**
   * Downloads a direct image, or every image a page references. Individual
   * HTTP failures on a page are skipped; the call fails only when nothing at
   * all could be saved.
   */
  public async download(request: ImageDownloadRequest): Promise<string[]> {
    await fs.mkdir(request.outputDir, { recursive: true });

    if (looksLikeDirectImage(request.url)) {
      return [await this.downloadSingle(request.url, request)];
    }

    let page: AxiosResponse<string>;
    try {
      page = await this.http.get<string>(request.url, { responseType: 'text' });
    } catch (error) {
      throw AppError.downloadFailed(describeHttpError(error), error);
    }

    const pageUrl = finalUrl(page, request.url);
    const contentType = headerValue(page, 'content-type').toLowerCase();

    if (contentType.startsWith('image/')) {
      return [await this.downloadSingle(pageUrl, request)];
    }

    const body = typeof page.data === 'string' ? page.data : '';
    if (!contentType.includes('text/html') && !body.toLowerCase().includes('<html')) {
      throw AppError.downloadFailed(`URL did not look like HTML or an image: ${request.url}`);
    }

    let items = extractImageItems(body, pageUrl);
    if (items.length === 0) {
      throw AppError.downloadFailed('No images found on the page');
    }

    if (request.maxImages !== undefined && request.maxImages !== null) {
      items = items.slice(0, Math.max(0, request.maxImages));
    }

    this.logger.info({ url: request.url, count: items.length }, 'Downloading page images');

    const saved: string[] = [];
    for (const [index, item] of items.entries()) {
      const prefix = `[${index + 1}/${items.length}] `;
      request.onStatus?.(`${prefix}downloading…`);
      try {
        saved.push(await this.downloadOne(item, request.outputDir, request.onStatus, prefix));
      } catch (error) {
        if (!axios.isAxiosError(error)) {
          throw error;
        }
        this.logger.warn({ url: item.url, error: describeHttpError(error) }, 'Skipping image that failed to download');
      }
    }

    if (saved.length === 0) {
      throw AppError.downloadFailed('Failed to download any images');
    }

    return saved;
  }

  private async downloadSingle(url: string, request: ImageDownloadRequest): Promise<string> {
    try {
      return await this.downloadOne({ url, filenameHint: 'image' }, request.outputDir, request.onStatus);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw AppError.downloadFailed(describeHttpError(error), error);
      }
      throw error;
    }
  }

  private async downloadOne(
    item: ImageItem,
    outputDir: string,
    onStatus: StatusListener | undefined,
    prefix = '',
  ): Promise<string> {
    const response = await this.http.get<Readable>(item.url, { responseType: 'stream' });

    const resolvedUrl = finalUrl(response, item.url);
    const extension =
      path.extname(new URL(resolvedUrl).pathname) || extensionFromContentType(headerValue(response, 'content-type')) || '';
    const stem = path.parse(item.filenameHint).name;
    const destination = await ensureUniquePath(path.join(outputDir, sanitizeFilename(stem) + extension));
    const name = path.basename(destination);

    const lengthHeader = headerValue(response, 'content-length');
    const totalBytes = /^\d+$/.test(lengthHeader) ? Number(lengthHeader) : null;
    const throttle = new ProgressThrottle(`${prefix}${name}`);
    let downloadedBytes = 0;

    if (onStatus) {
      response.data.on('data', (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        const message = throttle.update(downloadedBytes, totalBytes);
        if (message) {
          onStatus(message);
        }
      });
    }

    await pipeline(response.data, createWriteStream(destination));
    onStatus?.(`${prefix}${name} done`);

    return destination;
  }
}

function headerValue(response: AxiosResponse, name: string): string {
  const value: unknown = response.headers[name];
  return typeof value === 'string' ? value : '';
}

/** URL after redirects, as recorded by the node http adapter. */
function finalUrl(response: AxiosResponse, fallback: string): string {
  const request: unknown = response.request;
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res: unknown = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return fallback;
}

function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status} for ${error.config?.url ?? 'request'}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
