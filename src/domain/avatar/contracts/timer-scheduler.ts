export interface TimerHandle {
  cancel(): void;
}

export interface TimerScheduler {
  schedule(seconds: number, callback: () => void): TimerHandle;
}
