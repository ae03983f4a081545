/**
 * Semaphore
 *
 * Counting semaphore with FIFO hand-off. Shared by every job so the
 * capacity bounds unit pipelines process-wide.
 */

import { Errors } from 'gradekit-core';

export type Release = () => void;

export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw Errors.invalidArgument('capacity', 'must be a positive integer');
    }
  }

  /** Permits currently held */
  get inUse(): number {
    return this.active;
  }

  /** Callers waiting for a permit */
  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a permit. The returned function gives it back; calling it
   * more than once has no further effect.
   */
  async acquire(): Promise<Release> {
    if (this.active < this.capacity) {
      this.active++;
    } else {
      // The releasing holder passes its permit straight to us
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  /**
   * Run a task while holding a permit.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}
