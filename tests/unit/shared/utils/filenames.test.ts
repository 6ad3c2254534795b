import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import {
  domainFromUrl,
  ensureUniquePath,
  formatBytes,
  sanitizeFilename,
  sessionStamp,
} from '../../../../src/shared/utils/filenames.js';

describe('sanitizeFilename', () => {
  test('replaces unsafe characters and trims dots and spaces', () => {
    expect(sanitizeFilename('  My: Video / Clip?.mp4 ')).toBe('My_ Video _ Clip_.mp4');
  });

  test('keeps letters and digits from any script', () => {
    expect(sanitizeFilename('café 写真 2024')).toBe('café 写真 2024');
  });

  test('collapses runs of whitespace', () => {
    expect(sanitizeFilename('a\t\tb   c')).toBe('a_b c');
  });

  test('falls back to "download" when nothing is left', () => {
    expect(sanitizeFilename(' ... ')).toBe('download');
    expect(sanitizeFilename('')).toBe('download');
  });

  test('truncates to the maximum length', () => {
    expect(sanitizeFilename('abcdef', 3)).toBe('abc');
  });
});

describe('domainFromUrl', () => {
  test('lowercases the host and drops a leading www.', () => {
    expect(domainFromUrl('https://WWW.Example.org/path')).toBe('example.org');
    expect(domainFromUrl('https://cdn.example.org:8443/x')).toBe('cdn.example.org');
  });

  test('uses "site" when there is no host', () => {
    expect(domainFromUrl('not a url')).toBe('site');
    expect(domainFromUrl('file:///tmp/a.png')).toBe('site');
  });
});

describe('formatBytes', () => {
  test.each([
    [0, '0B'],
    [1023, '1023B'],
    [1024, '1.0KB'],
    [1536, '1.5KB'],
    [5 * 1024 ** 2, '5.0MB'],
    [3 * 1024 ** 3, '3.0GB'],
    [1024 ** 5, '1024.0TB'],
  ])('%d bytes → %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe('sessionStamp', () => {
  test('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(sessionStamp(new Date(2024, 11, 31, 23, 59, 7))).toBe('20241231_235907');
    expect(sessionStamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('20250102_030405');
  });
});

describe('ensureUniquePath', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'unique-path-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('returns the path unchanged when it is free', async () => {
    expect(await ensureUniquePath(path.join(dir, 'photo.jpg'))).toBe(path.join(dir, 'photo.jpg'));
  });

  test('appends the first free numeric suffix', async () => {
    await fs.writeFile(path.join(dir, 'photo.jpg'), '');
    await fs.writeFile(path.join(dir, 'photo_1.jpg'), '');

    expect(await ensureUniquePath(path.join(dir, 'photo.jpg'))).toBe(path.join(dir, 'photo_2.jpg'));
  });
});
