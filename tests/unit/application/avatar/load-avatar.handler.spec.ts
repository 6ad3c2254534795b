import { describe, expect, it, vi } from 'vitest';

import { LoadAvatarCommand } from '../../../../src/application/avatar/commands/load-avatar.command.js';
import {
  type FrameSourceLoader,
  LoadAvatarHandler,
} from '../../../../src/application/avatar/handlers/load-avatar.handler.js';
import type { Frame } from '../../../../src/domain/avatar/value-objects/frame.js';
import { AppError } from '../../../../src/shared/errors/app-error.js';

const opaque = (width: number, height: number): Frame['bitmap'] => ({
  width,
  height,
  data: new Uint8ClampedArray(width * height * 4).fill(255),
});

const stills: Frame[] = [
  { bitmap: opaque(2, 2), durationSeconds: 0.25 },
  { bitmap: opaque(2, 2), durationSeconds: 0.5 },
];

const clock = (...readings: number[]) => {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)] ?? 0;
};

const captureError = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
};

describe('LoadAvatarHandler', () => {
  it('renders resolved frames and keeps their durations', async () => {
    const resolveFrames = vi.fn<FrameSourceLoader>(async () => ({ status: 'ok', kind: 'stills', frames: stills }));
    const handler = new LoadAvatarHandler({ resolveFrames, now: clock(1_000, 1_250) });

    const outcome = await handler.execute(
      new LoadAvatarCommand({ source: '/frames', widthChars: 2, heightChars: 1, backend: 'halfblock', fpsCap: 8 }),
    );

    expect(resolveFrames).toHaveBeenCalledWith('/frames', { targetFps: 8 });
    expect(outcome.status).toBe('ok');
    expect(outcome.strategy).toBe('halfblock');
    expect(outcome.elapsedSeconds).toBe(0.25);
    expect(outcome.frames.map((frame) => frame.durationSeconds)).toEqual([0.25, 0.5]);
    expect(outcome.frames[0]?.grid.rows).toEqual([[{ text: '▀▀', foreground: [255, 255, 255], background: [255, 255, 255] }]]);
  });

  it('applies defaults for backend, fps cap and background', async () => {
    const resolveFrames = vi.fn<FrameSourceLoader>(async () => ({ status: 'ok', kind: 'stills', frames: stills }));
    const handler = new LoadAvatarHandler({ resolveFrames });

    const outcome = await handler.execute(new LoadAvatarCommand({ source: '/frames', widthChars: 1, heightChars: 1 }));

    expect(resolveFrames).toHaveBeenCalledWith('/frames', { targetFps: null });
    expect(outcome.strategy).toBe('braille');
  });

  it.each(['missing', 'empty'] as const)('returns a %s source without rendering', async (status) => {
    const handler = new LoadAvatarHandler({ resolveFrames: async () => ({ status }) });

    const outcome = await handler.execute(new LoadAvatarCommand({ source: '/nowhere', widthChars: 4, heightChars: 2 }));

    expect(outcome).toMatchObject({ status, frames: [], strategy: null });
  });

  it('throws validation error when payload is invalid', async () => {
    const resolveFrames = vi.fn<FrameSourceLoader>();
    const handler = new LoadAvatarHandler({ resolveFrames });

    const error = await captureError(
      handler.execute(new LoadAvatarCommand({ source: '', widthChars: 0, heightChars: 2 })),
    );

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: 'avatar.invalid-payload' });
    expect(resolveFrames).not.toHaveBeenCalled();
  });

  it('wraps decode failures as avatar.load-failed', async () => {
    const cause = new Error('corrupt GIF');
    const handler = new LoadAvatarHandler({
      resolveFrames: async () => {
        throw cause;
      },
    });

    const error = await captureError(
      handler.execute(new LoadAvatarCommand({ source: '/broken.gif', widthChars: 4, heightChars: 2 })),
    );

    expect(error).toMatchObject({ code: 'avatar.load-failed', message: 'corrupt GIF', cause });
  });

  it('lets an unavailable pinned backend surface unchanged', async () => {
    const handler = new LoadAvatarHandler({
      resolveFrames: async () => ({ status: 'ok', kind: 'stills', frames: stills }),
    });

    const error = await captureError(
      handler.execute(
        new LoadAvatarCommand({ source: '/frames', widthChars: 4, heightChars: 2, backend: 'external' }),
      ),
    );

    expect(error).toMatchObject({ code: 'avatar.backend-unavailable' });
  });
});
