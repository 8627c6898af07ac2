/**
 * Process-wide spacing between image generation calls.
 */

import { Config } from '../../config';
import { sleep } from '../../utils';

export class CooldownLimiter {
  private tail: Promise<void> = Promise.resolve();
  private lastStart: number | null = null;

  constructor(
    private intervalMs: number,
    private now: () => number = Date.now,
    private wait: (ms: number) => Promise<void> = sleep
  ) {}

  /**
   * Runs `task` once every previously scheduled task has settled and at
   * least `intervalMs` has passed since the last one started.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      if (this.lastStart !== null) {
        const remaining = this.lastStart + this.intervalMs - this.now();
        if (remaining > 0) {
          await this.wait(remaining);
        }
      }
      this.lastStart = this.now();
      return task();
    });
    // a failed task must not stall the queue
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/** Shared by every AI image provider in the process. */
export const imageCooldown = new CooldownLimiter(Config.IMAGE_COOLDOWN_MS);
