export interface Cancellable {
  /** Safe to call any number of times, before or after the task fired. */
  cancel(): void;
}

export interface Clock {
  now(): Date;
  setInterval(callback: () => void, intervalMs: number): Cancellable;
  setTimeout(callback: () => void, delayMs: number): Cancellable;
}

export const TICK_INTERVAL_MS = 1000;

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  setInterval(callback: () => void, intervalMs: number): Cancellable {
    const handle = setInterval(callback, intervalMs);
    return { cancel: () => clearInterval(handle) };
  }

  setTimeout(callback: () => void, delayMs: number): Cancellable {
    const handle = setTimeout(callback, delayMs);
    return { cancel: () => clearTimeout(handle) };
  }
}
