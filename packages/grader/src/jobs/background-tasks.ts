/**
 * Background Task Runner
 *
 * Owns fire-and-forget work (job runs, webhook deliveries) so it can be
 * awaited on shutdown instead of abandoned.
 */

import { createLogger, type Logger } from 'gradekit-core';

export class BackgroundTaskRunner {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('tasks');
  }

  /** Tasks started and not yet settled */
  get size(): number {
    return this.inFlight.size;
  }

  spawn(label: string, task: () => Promise<void>): void {
    const running = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        this.logger.error(`Background task '${label}' failed`, error);
      })
      .finally(() => {
        this.inFlight.delete(running);
      });
    this.inFlight.add(running);
  }

  /**
   * Resolve once every task has settled, including tasks spawned by
   * tasks that were running when drain() was called.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
