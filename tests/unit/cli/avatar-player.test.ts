import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { Chalk } from 'chalk';
import { afterAll, beforeAll, describe, expect, test, vi } from 'vitest';

import { playAvatar, toImportSpecifier } from '../../../src/cli/avatar-player.js';
import {
  CLEAR_LINE_END,
  CLEAR_TO_END,
  CURSOR_HOME,
  HIDE_CURSOR,
  SHOW_CURSOR,
} from '../../../src/cli/terminal-surface.js';
import { encodePng } from '../../../src/shared/media/stillImage.js';
import { FakeTimerScheduler } from '../../support/fake-timer-scheduler.js';
import { MemoryStream } from '../../support/memory-stream.js';

const UPPER_HALF_BLOCK = '▀';

const redPng = (): Buffer => {
  const data = new Uint8ClampedArray(2 * 2 * 4);
  for (let index = 0; index < data.length; index += 4) {
    data.set([255, 0, 0, 255], index);
  }
  return encodePng({ width: 2, height: 2, data });
};

let root = '';
let framesDir = '';

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'avatar-player-'));
  framesDir = path.join(root, 'frames');
  await fs.mkdir(framesDir);
  await fs.writeFile(path.join(framesDir, '000.png'), redPng());
  await fs.writeFile(path.join(framesDir, '001.png'), redPng());
});

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('toImportSpecifier', () => {
  test('turns relative and absolute paths into file URLs', () => {
    expect(toImportSpecifier('./pixels.mjs', '/work')).toBe(pathToFileURL('/work/pixels.mjs').href);
    expect(toImportSpecifier('/opt/pixels.mjs', '/work')).toBe(pathToFileURL('/opt/pixels.mjs').href);
  });

  test('passes bare package names through', () => {
    expect(toImportSpecifier('terminal-pixels', '/work')).toBe('terminal-pixels');
    expect(toImportSpecifier(undefined)).toBeNull();
    expect(toImportSpecifier('')).toBeNull();
  });
});

describe('playAvatar', () => {
  test('paints the placeholder, then frames, and restores the cursor', async () => {
    const output = new MemoryStream();
    const timers = new FakeTimerScheduler();
    const waitForExit = vi.fn(async () => {
      timers.fireNext();
    });

    await playAvatar(
      framesDir,
      { width: 2, height: 1, backend: 'halfblock', fps: 10 },
      {},
      { output, timers, chalk: new Chalk({ level: 0 }), waitForExit },
    );

    const framePaint = `${CURSOR_HOME}${UPPER_HALF_BLOCK.repeat(2)}${CLEAR_LINE_END}${CLEAR_TO_END}`;
    expect(output.chunks).toEqual([
      HIDE_CURSOR,
      `${CURSOR_HOME}Loading avatar…${CLEAR_LINE_END}${CLEAR_TO_END}`,
      framePaint,
      framePaint,
      `${SHOW_CURSOR}\n`,
    ]);
    expect(waitForExit).toHaveBeenCalledWith(null);
    expect(timers.pending).toHaveLength(0);
  });

  test('shows a missing-source placeholder and returns without waiting', async () => {
    const output = new MemoryStream();
    const missing = path.join(root, 'nope');
    const waitForExit = vi.fn(async () => undefined);

    await playAvatar(
      missing,
      { width: 8, height: 2, seconds: 5 },
      {},
      { output, timers: new FakeTimerScheduler(), chalk: new Chalk({ level: 0 }), waitForExit },
    );

    expect(output.chunks[2]).toBe(
      `${CURSOR_HOME}Missing frames:${CLEAR_LINE_END}\n${missing}${CLEAR_LINE_END}${CLEAR_TO_END}`,
    );
    expect(waitForExit).not.toHaveBeenCalled();
  });
});
