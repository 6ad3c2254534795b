import { resolvePlaybackDuration } from '../../../shared/media/frameTiming.js';
import type { TimerHandle, TimerScheduler } from '../contracts/timer-scheduler.js';
import type { RenderedFrame } from '../value-objects/frame.js';

export type PlaybackState = 'idle' | 'playing';

export interface PlaybackSchedulerOptions {
  readonly timers: TimerScheduler;
  readonly redraw: () => void;
  readonly fpsCap?: number | null;
}

/**
 * Owns the playback cursor over an immutable rendered sequence. Exactly one
 * timer is pending while playing; every re-arm cancels the previous one first.
 */
export class PlaybackScheduler {
  private frames: readonly RenderedFrame[] = [];

  private index = 0;

  private pending: TimerHandle | null = null;

  private stateValue: PlaybackState = 'idle';

  private fpsCap: number | null;

  private readonly timers: TimerScheduler;

  private readonly redraw: () => void;

  public constructor(options: PlaybackSchedulerOptions) {
    this.timers = options.timers;
    this.redraw = options.redraw;
    this.fpsCap = options.fpsCap ?? null;
  }

  public get state(): PlaybackState {
    return this.stateValue;
  }

  public get currentIndex(): number {
    return this.index;
  }

  public get frameCount(): number {
    return this.frames.length;
  }

  public get hasPendingTimer(): boolean {
    return this.pending !== null;
  }

  public current(): RenderedFrame | null {
    return this.frames[this.index] ?? null;
  }

  public start(frames: readonly RenderedFrame[], fpsCap: number | null = this.fpsCap): PlaybackState {
    this.cancelPending();
    this.frames = frames;
    this.index = 0;
    this.fpsCap = fpsCap;

    if (frames.length === 0) {
      this.stateValue = 'idle';
      return this.stateValue;
    }

    this.stateValue = 'playing';
    this.arm();
    return this.stateValue;
  }

  public stop(): void {
    this.cancelPending();
    this.stateValue = 'idle';
  }

  /** Duration the timer is armed with for the frame at `index`. */
  public durationFor(index: number): number {
    const frame = this.frames[index];
    return resolvePlaybackDuration(frame?.durationSeconds ?? 0, this.fpsCap);
  }

  /** Moves to the next frame, redraws and re-arms. Exposed for timer callbacks and tests. */
  public advance(): void {
    if (this.stateValue !== 'playing' || this.frames.length === 0) {
      return;
    }

    this.index = (this.index + 1) % this.frames.length;
    this.redraw();
    this.arm();
  }

  private arm(): void {
    this.cancelPending();
    const handle = this.timers.schedule(this.durationFor(this.index), () => {
      if (this.pending !== handle) {
        return;
      }

      this.pending = null;
      this.advance();
    });
    this.pending = handle;
  }

  private cancelPending(): void {
    if (this.pending) {
      this.pending.cancel();
      this.pending = null;
    }
  }
}
