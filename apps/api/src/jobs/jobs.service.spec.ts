import { NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { emptyStatusCounts } from '@reelqueue/shared';
import { JobNotFoundError } from '../errors';
import { JobsRepository } from './jobs.repository';
import { JobsService } from './jobs.service';

describe('JobsService', () => {
  let service: JobsService;
  let jobsRepository: {
    insertJob: jest.Mock;
    findJobs: jest.Mock;
    getById: jest.Mock;
    getStats: jest.Mock;
    getServerNow: jest.Mock;
  };

  beforeEach(() => {
    jobsRepository = {
      insertJob: jest.fn(),
      findJobs: jest.fn(),
      getById: jest.fn(),
      getStats: jest.fn(),
      getServerNow: jest.fn(),
    };
    service = new JobsService(jobsRepository as unknown as JobsRepository);
  });

  describe('submitJob', () => {
    it('should insert the job and report it as accepted', async () => {
      jobsRepository.insertJob.mockResolvedValue({ id: 7, status: 'pending', backend: 'upscaler' });

      const result = await service.submitJob({
        backend: 'upscaler',
        source_path: '/tapes/wedding.avi',
        params: { scale: 2 },
      });

      expect(jobsRepository.insertJob).toHaveBeenCalledWith({
        backend: 'upscaler',
        sourcePath: '/tapes/wedding.avi',
        params: { scale: 2 },
      });
      expect(result).toEqual({ accepted: true, id: 7, status: 'pending' });
    });

    it('should map a database failure to ServiceUnavailableException', async () => {
      jobsRepository.insertJob.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(
        service.submitJob({ backend: 'transcoder', source_path: '/tapes/a.avi', params: {} }),
      ).rejects.toThrow(ServiceUnavailableException);
    });
  });

  describe('getJobs', () => {
    it('should pass filters through and include the server time', async () => {
      const serverNow = new Date('2024-03-01T12:00:00Z');
      const items = [{ id: 3, status: 'failed', backend: 'editor' }];
      jobsRepository.findJobs.mockResolvedValue(items);
      jobsRepository.getServerNow.mockResolvedValue(serverNow);

      const result = await service.getJobs({ limit: 10, status: 'failed', backend: 'editor' });

      expect(jobsRepository.findJobs).toHaveBeenCalledWith({
        limit: 10,
        status: 'failed',
        backend: 'editor',
      });
      expect(result).toEqual({ items, limit: 10, server_now: serverNow });
    });
  });

  describe('getJob', () => {
    it('should return the job when it exists', async () => {
      const job = { id: 5, status: 'succeeded', history: [] };
      jobsRepository.getById.mockResolvedValue(job);

      await expect(service.getJob(5)).resolves.toBe(job);
    });

    it('should throw NotFoundException when the job does not exist', async () => {
      jobsRepository.getById.mockRejectedValue(new JobNotFoundError(99));

      await expect(service.getJob(99)).rejects.toThrow(NotFoundException);
      await expect(service.getJob(99)).rejects.toThrow('Job with id 99 not found');
    });

    it('should rethrow unexpected errors', async () => {
      const error = new Error('connection terminated');
      jobsRepository.getById.mockRejectedValue(error);

      await expect(service.getJob(1)).rejects.toBe(error);
    });
  });

  describe('getStats', () => {
    it('should return the repository stats', async () => {
      const stats = {
        total: 4,
        by_status: { ...emptyStatusCounts(), succeeded: 3, failed: 1 },
        avg_processing_seconds: 42.5,
      };
      jobsRepository.getStats.mockResolvedValue(stats);

      await expect(service.getStats()).resolves.toEqual(stats);
    });
  });
});
