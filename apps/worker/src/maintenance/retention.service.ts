import { OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { logger } from '@reelqueue/shared';
import type { JobQueue } from '../jobs/job.queue';

const DAY_MS = 24 * 60 * 60 * 1000;

export type RetentionSettings = {
  /** 0 disables the sweep. */
  days: number;
  sweepIntervalMs: number;
};

/**
 * Deletes terminal jobs once they have been finished for longer than the
 * retention window.
 */
export class RetentionService implements OnModuleInit, OnModuleDestroy {
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(
    private readonly queue: Pick<JobQueue, 'pruneTerminal'>,
    private readonly settings: RetentionSettings,
    private readonly now: () => Date = () => new Date(),
  ) {}

  onModuleInit() {
    if (this.settings.days === 0 || this.settings.sweepIntervalMs === 0) {
      logger.info({ service: 'worker' }, 'retention sweep disabled');
      return;
    }
    this.timer = setInterval(() => {
      void this.sweep();
    }, this.settings.sweepIntervalMs);
    this.timer.unref();
  }

  onModuleDestroy() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async sweep(): Promise<number> {
    if (this.settings.days === 0 || this.sweeping) {
      return 0;
    }
    this.sweeping = true;
    const olderThan = new Date(this.now().getTime() - this.settings.days * DAY_MS);
    try {
      const removed = await this.queue.pruneTerminal(olderThan);
      if (removed > 0) {
        logger.info(
          { service: 'worker', removed, older_than: olderThan.toISOString() },
          'terminal jobs pruned',
        );
      }
      return removed;
    } catch (error) {
      logger.error({ service: 'worker', error }, 'retention sweep failed');
      return 0;
    } finally {
      this.sweeping = false;
    }
  }
}
