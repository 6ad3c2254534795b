import { promises as fs } from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import { AVATAR_BACKENDS } from '../../domain/avatar/value-objects/avatar-configuration.js';
import { createChildLogger } from '../logger/pino.js';
import { errnoCode, xdgConfigDir } from '../utils/paths.js';

const logger = createChildLogger({ module: 'Settings' });

const nonBlank = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().min(1));

export const avatarSettingsSchema = z.object({
  framesDir: nonBlank.optional().catch(undefined),
  fps: z.number().min(0).max(1000).optional().catch(undefined),
  backend: z.enum(AVATAR_BACKENDS).optional().catch(undefined),
  widthChars: z.number().int().positive().max(512).optional().catch(undefined),
  heightChars: z.number().int().positive().max(256).optional().catch(undefined),
  pixelModule: nonBlank.optional().catch(undefined),
});

export const uiSettingsSchema = z.object({
  theme: nonBlank.optional().catch(undefined),
  avatar: avatarSettingsSchema.optional().catch(undefined),
});

export type AvatarSettings = z.infer<typeof avatarSettingsSchema>;

export type UiSettings = z.infer<typeof uiSettingsSchema>;

export function settingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(xdgConfigDir(env), 'tty-scrape', 'settings.json');
}

/**
 * Never throws: a missing, unreadable or malformed file yields defaults, and
 * individual fields that fail validation are dropped.
 */
export async function loadUiSettings(filePath: string = settingsPath()): Promise<UiSettings> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      logger.warn({ filePath, error }, 'Settings file could not be read; using defaults');
    }
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.warn({ filePath, error }, 'Settings file is not valid JSON; using defaults');
    return {};
  }

  const parsed = uiSettingsSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn({ filePath, issues: parsed.error.issues }, 'Settings file has an unexpected shape; using defaults');
    return {};
  }

  return parsed.data;
}

export async function saveUiSettings(settings: UiSettings, filePath: string = settingsPath()): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(sortKeys(settings), null, 2)}\n`, 'utf8');
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }

  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, sortKeys(entry)]),
    );
  }

  return value;
}
