import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { logger } from '@reelqueue/shared';
import { JobsRepository } from './jobs/jobs.repository';

@Controller()
export class HealthController {
  constructor(private readonly jobsRepository: JobsRepository) {}

  @Get('/health')
  async health() {
    try {
      await this.jobsRepository.ping();
    } catch (error) {
      logger.warn({ service: 'api', error }, 'health check failed');
      throw new ServiceUnavailableException('database unavailable');
    }
    return { status: 'ok' };
  }
}
