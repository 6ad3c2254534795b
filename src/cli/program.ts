import { Command, InvalidArgumentError, Option } from 'commander';

import { DOWNLOAD_MODES } from '../application/download/dto/download-url.dto.js';
import { AVATAR_BACKENDS } from '../domain/avatar/value-objects/avatar-configuration.js';
import { loadUiSettings } from '../shared/config/settings.js';

import { type AvatarCliOptions, playAvatar } from './avatar-player.js';
import { type DownloadCliOptions, runDownload } from './download-command.js';

export const VERSION = '0.3.0';

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('tty-scrape')
    .description('Download videos or page images from a URL, with a terminal avatar.')
    .version(VERSION)
    .argument('[url]', 'URL to download')
    .option('-o, --output <dir>', 'base output directory', 'downloads')
    .addOption(new Option('--mode <mode>', 'force download mode').choices(DOWNLOAD_MODES).default('auto'))
    .option('--max-images <n>', 'limit images when scraping a page', parseNonNegativeInteger)
    .option('--theme <name>', 'colour theme (saved for later runs)')
    .action(async (url: string | undefined, options: DownloadCliOptions) => {
      process.exitCode = await runDownload(url, options);
    });

  program
    .command('avatar')
    .description('Play an animated avatar (GIF, image or frame directory) in the terminal.')
    .argument('[source]', 'GIF file, still image or directory of frames')
    .option('--fps <n>', 'cap playback rate', parseNonNegativeNumber)
    .addOption(new Option('--backend <name>', 'glyph backend').choices(AVATAR_BACKENDS))
    .option('--width <chars>', 'width in terminal cells', parsePositiveInteger)
    .option('--height <chars>', 'height in terminal cells', parsePositiveInteger)
    .option('--seconds <n>', 'stop after this many seconds (default: until Ctrl-C)', parseNonNegativeNumber)
    .action(async (source: string | undefined, options: AvatarCliOptions) => {
      const settings = await loadUiSettings();
      await playAvatar(source, options, settings.avatar);
    });

  return program;
}
