/**
 * Clock interface
 * Abstracts time so phase timeouts, retry backoff and timestamps can be
 * driven deterministically in tests.
 */

import { TimeoutError } from './errors';

/**
 * A pending timeout that can be disarmed once the guarded work settles
 */
export interface PendingTimeout {
  /** Rejects with a TimeoutError when the timer fires; never resolves */
  readonly promise: Promise<never>;
  /** Disarm the timer */
  cancel(): void;
}

export interface Clock {
  now(): Date;

  /** Unix timestamp in milliseconds */
  timestamp(): number;

  iso(): string;

  /**
   * Wait for a duration
   * @param ms - Duration to wait in milliseconds
   */
  delay(ms: number): Promise<void>;

  /**
   * Arm a timer that rejects after the given duration
   * @param ms - Timeout duration in milliseconds
   * @param message - Message for the TimeoutError
   */
  timeout(ms: number, message?: string): PendingTimeout;
}

/**
 * Clock backed by system time and real timers
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  async delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  timeout(ms: number, message?: string): PendingTimeout {
    let handle: ReturnType<typeof setTimeout> | undefined;
    const promise = new Promise<never>((_, reject) => {
      handle = setTimeout(() => reject(new TimeoutError(ms, message)), ms);
    });
    return {
      promise,
      cancel: () => {
        if (handle !== undefined) {
          clearTimeout(handle);
        }
      },
    };
  }
}

/**
 * Manually advanced clock for tests
 */
export class MockClock implements Clock {
  private currentTime: Date;
  private timers: Array<{ id: number; time: number; fire: () => void }> = [];
  private nextTimerId = 1;

  constructor(initialTime?: Date) {
    this.currentTime = initialTime ?? new Date('2025-01-01T00:00:00.000Z');
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime.getTime();
  }

  iso(): string {
    return this.currentTime.toISOString();
  }

  async delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    return new Promise((resolve) => {
      this.schedule(ms, resolve);
    });
  }

  timeout(ms: number, message?: string): PendingTimeout {
    let id = 0;
    const promise = new Promise<never>((_, reject) => {
      id = this.schedule(ms, () => reject(new TimeoutError(ms, message)));
    });
    return {
      promise,
      cancel: () => {
        this.timers = this.timers.filter((timer) => timer.id !== id);
      },
    };
  }

  /**
   * Advance time and fire every timer that came due
   */
  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
    this.fireDueTimers();
  }

  /**
   * Number of timers still armed
   */
  pendingTimers(): number {
    return this.timers.length;
  }

  private schedule(ms: number, fire: () => void): number {
    const id = this.nextTimerId++;
    this.timers.push({ id, time: this.currentTime.getTime() + ms, fire });
    return id;
  }

  private fireDueTimers(): void {
    const now = this.currentTime.getTime();
    const due = this.timers.filter((timer) => timer.time <= now);
    this.timers = this.timers.filter((timer) => timer.time > now);
    due.forEach((timer) => timer.fire());
  }
}
