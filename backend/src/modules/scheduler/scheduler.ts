/**
 * backend/src/modules/scheduler/scheduler.ts
 *
 * WHY:
 * - The long-running loop behind `run_scheduler` / src/worker.ts.
 *
 * RULES:
 * - One tick at a time: a tick that outlasts the interval makes the next one skip.
 * - A tick failure is logged; the loop keeps going.
 */

import type { Logger } from '../../shared/logger/logger';
import type { TickResult } from './scheduler.types';

export class Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly deps: {
      logger: Logger;
      tickSeconds: number;
      tick: () => Promise<TickResult>;
    },
  ) {}

  start(): void {
    if (this.timer) return;
    this.deps.logger.info({ msg: 'scheduler.started', tickSeconds: this.deps.tickSeconds });

    this.trigger();
    this.timer = setInterval(() => this.trigger(), this.deps.tickSeconds * 1000);
  }

  /** Stops the loop and waits for the tick in progress, if any. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
    this.deps.logger.info({ msg: 'scheduler.stopped' });
  }

  private trigger(): void {
    if (this.running) {
      this.deps.logger.warn({ msg: 'scheduler.tick.overlap' });
      return;
    }
    this.running = this.tickSafely().finally(() => {
      this.running = null;
    });
  }

  private async tickSafely(): Promise<void> {
    try {
      const result = await this.deps.tick();
      if (result.ran.length || result.failed.length) {
        this.deps.logger.info({ msg: 'scheduler.tick.done', ...result });
      }
    } catch (err) {
      this.deps.logger.error({ msg: 'scheduler.tick.failed', err });
    }
  }
}
