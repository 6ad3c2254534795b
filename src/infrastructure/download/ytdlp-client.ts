import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { promises as fs, constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { createInterface } from 'node:readline';

import type {
  VideoDownloader,
  VideoDownloadRequest,
  VideoProgress,
} from '../../domain/download/contracts/downloaders.js';
import type { VideoInfo } from '../../domain/download/video-options.js';
import { readEnvironment } from '../../shared/config/environment.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { errnoCode } from '../../shared/utils/paths.js';

const PROGRESS_PREFIX = '[tty-scrape]';

const PROGRESS_TEMPLATE =
  `download:${PROGRESS_PREFIX} %(progress.status)s %(progress.downloaded_bytes)s ` +
  '%(progress.total_bytes)s %(progress.total_bytes_estimate)s';

export interface SpawnedProcess extends EventEmitter {
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
}

export type ProcessSpawner = (command: string, args: readonly string[]) => SpawnedProcess;

export interface YtDlpClientOptions {
  readonly binary?: string;
  readonly spawnProcess?: ProcessSpawner;
}

interface ProcessResult {
  readonly code: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

const defaultSpawner: ProcessSpawner = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

/** Parses one line written through `PROGRESS_TEMPLATE`; other lines yield null. */
export function parseProgressLine(line: string): VideoProgress | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(PROGRESS_PREFIX)) {
    return null;
  }

  const [status, downloaded, total, estimate] = trimmed.slice(PROGRESS_PREFIX.length).trim().split(/\s+/);
  if (status !== 'downloading' && status !== 'finished') {
    return null;
  }

  const totalBytes = parseByteCount(total) ?? parseByteCount(estimate);
  return {
    status,
    downloadedBytes: parseByteCount(downloaded) ?? 0,
    totalBytes,
  };
}

export function isUnsupportedUrlMessage(message: string): boolean {
  return message.includes('Unsupported URL');
}

/**
 * Thin wrapper over the yt-dlp binary: `probe` reads the info JSON without
 * downloading, `download` streams progress lines back to the caller.
 */
export class YtDlpClient implements VideoDownloader {
  private readonly logger = createChildLogger({ module: 'YtDlpClient' });

  private readonly binary: string;

  private readonly spawnProcess: ProcessSpawner;

  public constructor(options: YtDlpClientOptions = {}) {
    this.binary = options.binary ?? readEnvironment().YTDLP_PATH;
    this.spawnProcess = options.spawnProcess ?? defaultSpawner;
  }

  public async probe(url: string): Promise<VideoInfo> {
    const result = await this.run(['-J', '--no-warnings', '--skip-download', url]);
    this.raiseOnFailure(url, result);

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch (error) {
      throw AppError.downloadFailed('yt-dlp returned malformed metadata', error);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw AppError.downloadFailed('yt-dlp returned malformed metadata');
    }

    return Object.fromEntries(Object.entries(parsed));
  }

  public async download(url: string, request: VideoDownloadRequest): Promise<void> {
    await fs.mkdir(request.outputDir, { recursive: true });

    const args = [
      '-f',
      request.formatSelector,
      '--newline',
      '--no-warnings',
      '--retries',
      '3',
      '--windows-filenames',
      '--progress-template',
      PROGRESS_TEMPLATE,
      '-o',
      path.join(request.outputDir, '%(title)s.%(ext)s'),
      url,
    ];

    this.logger.info({ url, format: request.formatSelector, outputDir: request.outputDir }, 'Starting yt-dlp download');

    const result = await this.run(args, (line) => {
      const progress = parseProgressLine(line);
      if (progress) {
        request.onProgress?.(progress);
      }
    });
    this.raiseOnFailure(url, result);
  }

  private raiseOnFailure(url: string, result: ProcessResult): void {
    if (result.code === 0) {
      return;
    }

    const message = lastErrorLine(result.stderr) ?? `yt-dlp exited with code ${String(result.code)}`;
    this.logger.warn({ url, code: result.code, message }, 'yt-dlp failed');

    if (isUnsupportedUrlMessage(result.stderr)) {
      throw AppError.unsupportedUrl(url, message);
    }

    throw AppError.downloadFailed(message);
  }

  private run(args: readonly string[], onStdoutLine?: (line: string) => void): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
      const child = this.spawnProcess(this.binary, args);
      const stdoutChunks: string[] = [];
      const stderrChunks: string[] = [];

      if (child.stdout) {
        if (onStdoutLine) {
          const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
          lines.on('line', (line) => {
            stdoutChunks.push(`${line}\n`);
            onStdoutLine(line);
          });
        } else {
          child.stdout.on('data', (chunk: Buffer | string) => stdoutChunks.push(chunk.toString()));
        }
      }

      child.stderr?.on('data', (chunk: Buffer | string) => stderrChunks.push(chunk.toString()));

      child.once('error', (error: Error) => {
        if (errnoCode(error) === 'ENOENT') {
          reject(
            AppError.downloadFailed(
              `yt-dlp binary not found. Install yt-dlp or set YTDLP_PATH (tried "${this.binary}").`,
              error,
            ),
          );
          return;
        }
        reject(AppError.downloadFailed(error.message, error));
      });

      child.once('close', (code: number | null) => {
        resolve({ code, stdout: stdoutChunks.join(''), stderr: stderrChunks.join('') });
      });
    });
  }
}

/** Equivalent of `which`: true when `binary` resolves to an executable file. */
export async function commandExists(binary: string, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  const candidates = binary.includes(path.sep)
    ? [binary]
    : (env.PATH ?? '').split(path.delimiter).filter(Boolean).map((dir) => path.join(dir, binary));

  for (const candidate of candidates) {
    try {
      await fs.access(candidate, fsConstants.X_OK);
      return true;
    } catch {
      continue;
    }
  }

  return false;
}

export async function ffmpegIsAvailable(): Promise<boolean> {
  return commandExists(readEnvironment().FFMPEG_PATH);
}

function parseByteCount(value: string | undefined): number | null {
  if (!value || value === 'NA' || value === 'None') {
    return null;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
}

function lastErrorLine(stderr: string): string | null {
  const lines = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  const errorLine = [...lines].reverse().find((line) => line.startsWith('ERROR:'));
  return errorLine ?? lines.at(-1) ?? null;
}
