import { OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { logger } from '@reelqueue/shared';
import type { EnvironmentDetector } from './environment.detector';
import type { EnvironmentProfile, ProfileSource } from './environment.types';

/**
 * Publishes the current EnvironmentProfile. Detection runs once at init and
 * then on a timer of its own, so refreshing never holds a dispatch slot.
 */
export class EnvironmentMonitor
  implements ProfileSource, OnModuleInit, OnModuleDestroy
{
  private profile: EnvironmentProfile | null = null;
  private timer: NodeJS.Timeout | null = null;
  private refreshing = false;

  constructor(
    private readonly detector: EnvironmentDetector,
    private readonly refreshIntervalMs: number,
  ) {}

  async onModuleInit() {
    this.profile = await this.detector.detect();
    if (this.refreshIntervalMs > 0) {
      this.timer = setInterval(() => {
        void this.refresh();
      }, this.refreshIntervalMs);
      this.timer.unref();
    }
  }

  onModuleDestroy() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  current(): EnvironmentProfile {
    if (!this.profile) {
      throw new Error('environment profile requested before detection');
    }
    return this.profile;
  }

  async refresh(): Promise<void> {
    if (this.refreshing || !this.profile) {
      return;
    }
    this.refreshing = true;
    try {
      this.profile = await this.detector.refresh(this.profile);
    } catch (error) {
      logger.error({ service: 'worker', error }, 'environment refresh failed');
    } finally {
      this.refreshing = false;
    }
  }
}
