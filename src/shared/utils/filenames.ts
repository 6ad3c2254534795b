import { promises as fs } from 'node:fs';
import path from 'node:path';

const INVALID_CHARS = /[^\p{L}\p{N}_.\- ]+/gu;
const WHITESPACE = /\s+/g;
const MAX_UNIQUE_ATTEMPTS = 10_000;

export function sanitizeFilename(name: string, maxLength = 180): string {
  let cleaned = trimChars(name.replace(INVALID_CHARS, '_'), ' .');
  cleaned = cleaned.replace(WHITESPACE, ' ').trim();

  if (!cleaned) {
    cleaned = 'download';
  }

  return cleaned.slice(0, maxLength);
}

/** `name.ext`, then `name_1.ext`, `name_2.ext`, … until nothing exists at the path. */
export async function ensureUniquePath(filePath: string): Promise<string> {
  if (!(await exists(filePath))) {
    return filePath;
  }

  const parsed = path.parse(filePath);
  for (let index = 1; index < MAX_UNIQUE_ATTEMPTS; index += 1) {
    const candidate = path.join(parsed.dir, `${parsed.name}_${index}${parsed.ext}`);
    if (!(await exists(candidate))) {
      return candidate;
    }
  }

  throw new Error(`Could not find a unique filename for: ${filePath}`);
}

export function domainFromUrl(url: string): string {
  let host = '';
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    host = '';
  }

  if (!host) {
    return 'site';
  }

  return host.startsWith('www.') ? host.slice(4) : host;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;

  for (const unit of units) {
    if (value < 1024 || unit === 'TB') {
      return unit === 'B' ? `${Math.trunc(value)}B` : `${value.toFixed(1)}${unit}`;
    }
    value /= 1024;
  }

  return `${value.toFixed(1)}TB`;
}

export function sessionStamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function trimChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;

  while (start < end && chars.includes(value.charAt(start))) {
    start += 1;
  }
  while (end > start && chars.includes(value.charAt(end - 1))) {
    end -= 1;
  }

  return value.slice(start, end);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
