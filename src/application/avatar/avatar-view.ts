import type { TimerScheduler } from '../../domain/avatar/contracts/timer-scheduler.js';
import { PlaybackScheduler, type PlaybackState } from '../../domain/avatar/entities/playback-scheduler.js';
import type { AvatarBackend } from '../../domain/avatar/value-objects/avatar-configuration.js';
import type { RenderedFrame, StyledGrid } from '../../domain/avatar/value-objects/frame.js';

import { LoadAvatarCommand } from './commands/load-avatar.command.js';
import { LoadAvatarHandler } from './handlers/load-avatar.handler.js';

export type AvatarViewStatus = 'unloaded' | 'missing' | 'empty' | 'failed' | 'ready';

export interface AvatarLoadResult {
  readonly frameCount: number;
  readonly elapsedSeconds: number;
}

export interface AvatarViewOptions {
  readonly timers: TimerScheduler;
  readonly redraw?: () => void;
  readonly handler?: LoadAvatarHandler;
}

export function placeholderGrid(message: string): StyledGrid {
  return {
    rows: message.split('\n').map((line) => [{ text: line, foreground: null, background: null, dim: true }]),
  };
}

/**
 * What the terminal shell talks to: load a source once, then ask for the
 * current frame whenever it repaints. Until frames exist it answers with a
 * labelled placeholder.
 */
export class AvatarView {
  private readonly handler: LoadAvatarHandler;

  private readonly scheduler: PlaybackScheduler;

  private frames: readonly RenderedFrame[] = [];

  private statusValue: AvatarViewStatus = 'unloaded';

  private source: string | null = null;

  private loadSecondsValue: number | null = null;

  private generation = 0;

  public constructor(options: AvatarViewOptions) {
    this.handler = options.handler ?? new LoadAvatarHandler();
    this.scheduler = new PlaybackScheduler({
      timers: options.timers,
      redraw: options.redraw ?? (() => undefined),
    });
  }

  public get framesLoaded(): number {
    return this.frames.length;
  }

  public get loadSeconds(): number | null {
    return this.loadSecondsValue;
  }

  public get status(): AvatarViewStatus {
    return this.statusValue;
  }

  public get playbackState(): PlaybackState {
    return this.scheduler.state;
  }

  public get currentIndex(): number {
    return this.scheduler.currentIndex;
  }

  /**
   * Replaces whatever is playing. The pending timer is cancelled before the new
   * load starts, and a load that has been superseded by a newer call is dropped.
   */
  public async load(
    source: string,
    widthChars: number,
    heightChars: number,
    backend: AvatarBackend = 'auto',
    fpsCap: number | null = null,
  ): Promise<AvatarLoadResult> {
    this.scheduler.stop();
    const generation = ++this.generation;
    this.source = source;

    try {
      const outcome = await this.handler.execute(
        new LoadAvatarCommand({ source, widthChars, heightChars, backend, fpsCap }),
      );

      if (generation !== this.generation) {
        return { frameCount: outcome.frames.length, elapsedSeconds: outcome.elapsedSeconds };
      }

      this.frames = outcome.frames;
      this.loadSecondsValue = outcome.elapsedSeconds;
      this.statusValue = outcome.status === 'ok' ? 'ready' : outcome.status;
      if (this.statusValue === 'ready' && outcome.frames.length === 0) {
        this.statusValue = 'empty';
      }

      this.scheduler.start(this.frames, fpsCap);
      return { frameCount: this.frames.length, elapsedSeconds: outcome.elapsedSeconds };
    } catch (error) {
      if (generation === this.generation) {
        this.frames = [];
        this.statusValue = 'failed';
        this.scheduler.start(this.frames);
      }
      throw error;
    }
  }

  public currentRenderedFrame(): StyledGrid {
    const current = this.scheduler.current();
    if (current) {
      return current.grid;
    }

    switch (this.statusValue) {
      case 'missing':
        return placeholderGrid(`Missing frames:\n${this.source ?? ''}`);
      case 'empty':
        return placeholderGrid(`No image frames in:\n${this.source ?? ''}`);
      case 'failed':
        return placeholderGrid(`Avatar unavailable:\n${this.source ?? ''}`);
      default:
        return placeholderGrid('Loading avatar…');
    }
  }

  public dispose(): void {
    this.generation += 1;
    this.scheduler.stop();
  }
}
