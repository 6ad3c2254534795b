import type { TimerHandle, TimerScheduler } from '../../../domain/avatar/contracts/timer-scheduler.js';

export class NodeTimerScheduler implements TimerScheduler {
  public schedule(seconds: number, callback: () => void): TimerHandle {
    const timeout = setTimeout(callback, Math.max(0, seconds * 1000));

    return {
      cancel: () => clearTimeout(timeout),
    };
  }
}
