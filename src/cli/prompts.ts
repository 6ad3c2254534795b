import enquirer from 'enquirer';

import type { VideoOption } from '../domain/download/video-options.js';
import { AppError } from '../shared/errors/app-error.js';

export async function promptForUrl(): Promise<string> {
  const response = await enquirer.prompt<{ url: string }>({
    type: 'input',
    name: 'url',
    message: 'URL',
  });

  return response.url.trim();
}

export async function promptForVideoOption(options: readonly VideoOption[], title: string): Promise<VideoOption> {
  const choices = options.map((option, index) => ({
    name: String(index),
    message: option.label,
    hint: option.formatSelector,
  }));

  const response = await enquirer.prompt<{ choice: string }>({
    type: 'select',
    name: 'choice',
    message: `Download options for "${title}"`,
    choices,
  });

  const selected = options[Number(response.choice)];
  if (!selected) {
    throw AppError.downloadFailed('Invalid selection');
  }

  return selected;
}
