import { DownloadUrlCommand } from '../application/download/commands/download-url.command.js';
import type { DownloadMode } from '../application/download/dto/download-url.dto.js';
import { DownloadUrlHandler, type DownloadOutcome } from '../application/download/handlers/download-url.handler.js';
import { loadUiSettings, saveUiSettings } from '../shared/config/settings.js';
import { TtyScrapeError } from '../shared/errors/base.error.js';
import { createChildLogger } from '../shared/logger/pino.js';

import { bannerPanel, errorPanel } from './panels.js';
import { promptForUrl, promptForVideoOption } from './prompts.js';
import { StatusLine } from './status-line.js';
import { chalkFor, type TerminalStream } from './terminal-surface.js';
import { isThemeName, resolveTheme, THEME_NAMES, themePainter, type ThemePainter } from './themes.js';

const logger = createChildLogger({ module: 'DownloadCli' });

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_NO_URL = 2;

export interface DownloadCliOptions {
  readonly output: string;
  readonly mode: DownloadMode;
  readonly maxImages?: number;
  readonly theme?: string;
}

export interface DownloadCliDependencies {
  readonly handler?: DownloadUrlHandler;
  readonly stdout?: TerminalStream;
  readonly stderr?: TerminalStream;
  readonly askForUrl?: () => Promise<string>;
  readonly settingsFile?: string;
}

export async function runDownload(
  url: string | undefined,
  options: DownloadCliOptions,
  dependencies: DownloadCliDependencies = {},
): Promise<number> {
  const stdout = dependencies.stdout ?? process.stdout;
  const stderr = dependencies.stderr ?? process.stderr;

  const settings = await loadUiSettings(dependencies.settingsFile);
  const painter = themePainter(resolveTheme(options.theme ?? settings.theme), chalkFor(stdout));

  if (options.theme !== undefined) {
    if (!isThemeName(options.theme)) {
      stderr.write(`${errorPanel(`Unknown theme "${options.theme}". Available: ${THEME_NAMES.join(', ')}`, painter)}\n`);
      return EXIT_FAILED;
    }
    await saveUiSettings({ ...settings, theme: options.theme }, dependencies.settingsFile);
  }

  stdout.write(`${bannerPanel(painter)}\n`);

  let target = (url ?? '').trim();
  if (!target) {
    target = await (dependencies.askForUrl ?? promptForUrl)();
  }
  if (!target) {
    stderr.write(`${errorPanel('No URL provided.', painter)}\n`);
    return EXIT_NO_URL;
  }

  const status = new StatusLine(stdout);
  const handler = dependencies.handler ?? new DownloadUrlHandler();

  try {
    const outcome = await handler.execute(
      new DownloadUrlCommand(
        { url: target, outputRoot: options.output, mode: options.mode, maxImages: options.maxImages ?? null },
        {
          chooseVideoOption: async (videoOptions, title) => {
            stdout.write(`${painter.success('Detected video:')} ${painter.bold(title)}\n`);
            return promptForVideoOption(videoOptions, title);
          },
          onStatus: (message) => status.update(message),
        },
      ),
    );
    status.finish();
    stdout.write(`${describeOutcome(outcome, painter)}\n`);
    return EXIT_OK;
  } catch (error) {
    status.finish();
    logger.error({ url: target, error }, 'Download failed');
    stderr.write(`${errorPanel(userMessage(error), painter)}\n`);
    return EXIT_FAILED;
  }
}

export function describeOutcome(outcome: DownloadOutcome, painter: ThemePainter): string {
  if (outcome.kind === 'video') {
    return `${painter.success('Saved to')} ${outcome.outputDir}`;
  }
  return `${painter.success(`Downloaded ${outcome.files.length} image(s) to`)} ${outcome.outputDir}`;
}

export function userMessage(error: unknown): string {
  if (error instanceof TtyScrapeError) {
    if (error.code === 'download.unsupported-url') {
      return 'This URL is not supported for video download.';
    }
    return error.exposeMessage ? error.message : `Unexpected error (${error.code}): ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
