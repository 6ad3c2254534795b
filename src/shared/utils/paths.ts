import os from 'node:os';
import path from 'node:path';

export function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }

  return value.startsWith('~/') ? path.join(os.homedir(), value.slice(2)) : value;
}

function xdgDir(raw: string | undefined, fallback: string): string {
  if (raw && raw.trim()) {
    return expandHome(raw.trim());
  }

  return path.join(os.homedir(), fallback);
}

export function xdgConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return xdgDir(env.XDG_CONFIG_HOME, '.config');
}

export function xdgCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  return xdgDir(env.XDG_CACHE_HOME, '.cache');
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** ENOENT, or ENOTDIR when a parent component is a file. */
export function isMissingPathError(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}
