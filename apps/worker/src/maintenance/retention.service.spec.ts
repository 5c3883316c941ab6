import { InMemoryJobQueue } from '../jobs/in-memory-job.queue';
import { RetentionService } from './retention.service';

describe('RetentionService', () => {
  const now = new Date('2024-03-31T00:00:00Z');

  it('should prune terminal jobs finished before the retention window', async () => {
    const pruneTerminal = jest.fn().mockResolvedValue(4);
    const service = new RetentionService({ pruneTerminal }, { days: 30, sweepIntervalMs: 1_000 }, () => now);

    await expect(service.sweep()).resolves.toBe(4);
    expect(pruneTerminal).toHaveBeenCalledWith(new Date('2024-03-01T00:00:00Z'));
  });

  it('should do nothing when retention is disabled', async () => {
    const pruneTerminal = jest.fn();
    const service = new RetentionService({ pruneTerminal }, { days: 0, sweepIntervalMs: 1_000 }, () => now);

    await expect(service.sweep()).resolves.toBe(0);
    expect(pruneTerminal).not.toHaveBeenCalled();
  });

  it('should keep running after a failed sweep', async () => {
    const pruneTerminal = jest
      .fn()
      .mockRejectedValueOnce(new Error('connection terminated'))
      .mockResolvedValueOnce(1);
    const service = new RetentionService({ pruneTerminal }, { days: 7, sweepIntervalMs: 1_000 }, () => now);

    await expect(service.sweep()).resolves.toBe(0);
    await expect(service.sweep()).resolves.toBe(1);
  });

  it('should leave unfinished and recent jobs in place', async () => {
    let clock = new Date('2024-03-01T00:00:00Z');
    const queue = new InMemoryJobQueue(() => clock);
    const old = await queue.enqueue({ backend: 'transcoder', source_path: '/in/old.mov' });
    await queue.markRunning(old.id);
    await queue.markResult(old.id, { success: true, artifactRef: '/out/old.mp4', durationMs: 1 });
    const pending = await queue.enqueue({ backend: 'transcoder', source_path: '/in/pending.mov' });

    clock = new Date('2024-03-30T00:00:00Z');
    const recent = await queue.enqueue({ backend: 'transcoder', source_path: '/in/recent.mov' });
    await queue.markRunning(recent.id);
    await queue.markResult(recent.id, { success: true, artifactRef: '/out/recent.mp4', durationMs: 1 });

    const service = new RetentionService(queue, { days: 7, sweepIntervalMs: 1_000 }, () => now);
    await expect(service.sweep()).resolves.toBe(1);

    expect(await queue.get(old.id)).toBeNull();
    expect(await queue.get(pending.id)).not.toBeNull();
    expect(await queue.get(recent.id)).not.toBeNull();
  });

  it('should schedule and cancel the sweep timer', () => {
    jest.useFakeTimers();
    try {
      const pruneTerminal = jest.fn().mockResolvedValue(0);
      const service = new RetentionService({ pruneTerminal }, { days: 30, sweepIntervalMs: 1_000 }, () => now);

      service.onModuleInit();
      jest.advanceTimersByTime(1_500);
      expect(pruneTerminal).toHaveBeenCalledTimes(1);

      service.onModuleDestroy();
      jest.advanceTimersByTime(5_000);
      expect(pruneTerminal).toHaveBeenCalledTimes(1);
    } finally {
      jest.useRealTimers();
    }
  });
});
