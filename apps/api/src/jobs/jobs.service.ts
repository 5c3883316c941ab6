import { Injectable, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { logger } from '@reelqueue/shared';
import { JobNotFoundError } from '../errors';
import type { GetJobsQuery, SubmitJobBody } from '../validation/schemas';
import { JobsRepository } from './jobs.repository';

@Injectable()
export class JobsService {
  constructor(private readonly jobsRepository: JobsRepository) {}

  async submitJob(body: SubmitJobBody) {
    const job = await this.jobsRepository
      .insertJob({
        backend: body.backend,
        sourcePath: body.source_path,
        params: body.params,
      })
      .catch((error: unknown) => {
        logger.error({ service: 'api', backend: body.backend, error }, 'job submission failed');
        throw new ServiceUnavailableException('database unavailable');
      });

    logger.info(
      { service: 'api', job_id: job.id, backend: job.backend },
      'job enqueued',
    );
    return { accepted: true, id: job.id, status: job.status };
  }

  async getJobs(query: GetJobsQuery) {
    const items = await this.jobsRepository.findJobs(query);
    const serverNow = await this.jobsRepository.getServerNow();
    return {
      items,
      limit: query.limit,
      server_now: serverNow,
    };
  }

  async getJob(id: number) {
    try {
      return await this.jobsRepository.getById(id);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }

  async getStats() {
    return this.jobsRepository.getStats();
  }
}
