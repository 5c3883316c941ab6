import { InMemoryJobQueue } from './in-memory-job.queue';
import { JobInvalidStateError, JobNotFoundError } from '../errors';

describe('InMemoryJobQueue', () => {
  let now: Date;
  let queue: InMemoryJobQueue;

  const advance = (ms: number) => {
    now = new Date(now.getTime() + ms);
  };

  beforeEach(() => {
    now = new Date('2024-03-01T10:00:00Z');
    queue = new InMemoryJobQueue(() => now);
  });

  describe('enqueue', () => {
    it('should create pending jobs with increasing ids', async () => {
      const first = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      const second = await queue.enqueue({
        backend: 'editor',
        source_path: '/in/b.mov',
        params: { tape_type: 'vhs' },
      });

      expect(first).toMatchObject({ id: 1, status: 'pending', attempts: 0, params: {} });
      expect(second).toMatchObject({ id: 2, params: { tape_type: 'vhs' } });
    });
  });

  describe('dequeueNext', () => {
    it('should claim in FIFO order and increment attempts', async () => {
      await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.enqueue({ backend: 'transcoder', source_path: '/in/b.mov' });

      const claimed = await queue.dequeueNext({ backends: ['transcoder'] });

      expect(claimed).toMatchObject({ id: 1, status: 'running', attempts: 1, started_at: now });
    });

    it('should never hand out the same job twice', async () => {
      await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });

      const [first, second] = await Promise.all([
        queue.dequeueNext({ backends: ['transcoder'] }),
        queue.dequeueNext({ backends: ['transcoder'] }),
      ]);

      expect(first?.id).toBe(1);
      expect(second).toBeNull();
    });

    it('should only consider the requested backends', async () => {
      await queue.enqueue({ backend: 'upscaler', source_path: '/in/a.mov' });
      await queue.enqueue({ backend: 'transcoder', source_path: '/in/b.mov' });

      expect((await queue.dequeueNext({ backends: ['transcoder'] }))?.id).toBe(2);
      expect(await queue.dequeueNext({ backends: [] })).toBeNull();
    });

    it('should hold retrying jobs until they are due', async () => {
      const job = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.dequeueNext({ backends: ['transcoder'] });
      await queue.requeue(job.id, 5_000, { type: 'transient', reason: 'timeout', message: 'timed out' });

      expect(await queue.dequeueNext({ backends: ['transcoder'] })).toBeNull();

      advance(5_000);
      const retried = await queue.dequeueNext({ backends: ['transcoder'] });
      expect(retried).toMatchObject({ id: job.id, status: 'running', attempts: 2 });
    });
  });

  describe('markRunning', () => {
    it('should reject unknown jobs', async () => {
      await expect(queue.markRunning(99)).rejects.toThrow(JobNotFoundError);
    });

    it('should reject jobs that are already running', async () => {
      const job = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.markRunning(job.id);

      await expect(queue.markRunning(job.id)).rejects.toThrow(JobInvalidStateError);
    });
  });

  describe('markResult', () => {
    it('should mark a successful attempt succeeded', async () => {
      const job = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.dequeueNext({ backends: ['transcoder'] });
      advance(1_000);

      const done = await queue.markResult(
        job.id,
        { success: true, artifactRef: '/out/a.mp4', durationMs: 1_000 },
        { success: true, uploadRef: 's3://bucket/processed/1/a.mp4' },
        { timeoutMs: 60_000 },
      );

      expect(done).toMatchObject({
        status: 'succeeded',
        artifact_ref: '/out/a.mp4',
        upload_ref: 's3://bucket/processed/1/a.mp4',
        timeout_ms: 60_000,
        finished_at: now,
      });
      expect(done.history).toEqual([
        {
          attempt: 1,
          outcome: 'succeeded',
          failure_type: null,
          error: null,
          duration_ms: 1_000,
          timeout_ms: 60_000,
          finished_at: '2024-03-01T10:00:01.000Z',
        },
      ]);
    });

    it('should mark a failed result failed', async () => {
      const job = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.dequeueNext({ backends: ['transcoder'] });

      const done = await queue.markResult(job.id, {
        success: false,
        error: { type: 'fatal_input', reason: 'corrupt_input', message: 'moov atom not found' },
        durationMs: 20,
      });

      expect(done).toMatchObject({
        status: 'failed',
        failure_type: 'fatal_input',
        failure_reason: 'corrupt_input',
        last_error: 'moov atom not found',
        artifact_ref: null,
      });
    });

    it('should mark a processed job whose upload failed upload_failed', async () => {
      const job = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.dequeueNext({ backends: ['transcoder'] });

      const done = await queue.markResult(
        job.id,
        { success: true, artifactRef: '/out/a.mp4', durationMs: 10 },
        {
          success: false,
          error: { type: 'fatal_upload', reason: 'access_denied', message: 'Access Denied' },
        },
      );

      expect(done).toMatchObject({
        status: 'upload_failed',
        artifact_ref: '/out/a.mp4',
        upload_ref: null,
        failure_type: 'fatal_upload',
      });
    });

    it('should refuse to record a result for a job that is not running', async () => {
      const job = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });

      await expect(
        queue.markResult(job.id, { success: true, artifactRef: '/out/a.mp4', durationMs: 1 }),
      ).rejects.toThrow('Job 1 is not in running status (current status: pending)');
    });
  });

  describe('requeue', () => {
    it('should accumulate backoff and keep the retry state', async () => {
      const job = await queue.enqueue({ backend: 'editor', source_path: '/in/a.mov' });
      await queue.dequeueNext({ backends: ['editor'] });

      const retrying = await queue.requeue(
        job.id,
        4_000,
        { type: 'fatal_backend', reason: 'backend_crashed', message: 'ECONNREFUSED' },
        { timeoutMs: 90_000, durationMs: 12, backendRestarts: 1 },
      );

      expect(retrying).toMatchObject({
        status: 'retrying',
        elapsed_backoff_ms: 4_000,
        timeout_ms: 90_000,
        backend_restarts: 1,
        failure_reason: 'backend_crashed',
        available_at: new Date('2024-03-01T10:00:04Z'),
      });
      expect(retrying.history[0]).toMatchObject({ attempt: 1, outcome: 'retrying', duration_ms: 12 });
    });
  });

  describe('recoverInFlight', () => {
    it('should requeue interrupted jobs and fail exhausted ones', async () => {
      const fresh = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      const exhausted = await queue.enqueue({ backend: 'transcoder', source_path: '/in/b.mov' });
      const pending = await queue.enqueue({ backend: 'transcoder', source_path: '/in/c.mov' });
      await queue.markRunning(fresh.id);
      for (let attempt = 0; attempt < 4; attempt += 1) {
        await queue.markRunning(exhausted.id);
        if (attempt < 3) {
          await queue.requeue(exhausted.id, 0, { type: 'transient', reason: 'timeout', message: 't' });
        }
      }

      const report = await queue.recoverInFlight(4);

      expect(report).toEqual({ requeued: [fresh.id], failed: [exhausted.id] });
      expect(await queue.get(fresh.id)).toMatchObject({
        status: 'retrying',
        failure_type: 'transient',
        last_error: 'interrupted by worker restart',
      });
      expect(await queue.get(exhausted.id)).toMatchObject({ status: 'failed', attempts: 4 });
      expect((await queue.get(pending.id))?.status).toBe('pending');
    });
  });

  describe('stats and pruneTerminal', () => {
    it('should count by status and average succeeded durations', async () => {
      const a = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.enqueue({ backend: 'transcoder', source_path: '/in/b.mov' });
      await queue.dequeueNext({ backends: ['transcoder'] });
      advance(30_000);
      await queue.markResult(a.id, { success: true, artifactRef: '/out/a.mp4', durationMs: 30_000 });

      expect(await queue.stats()).toEqual({
        total: 2,
        by_status: {
          pending: 1,
          running: 0,
          retrying: 0,
          succeeded: 1,
          failed: 0,
          upload_failed: 0,
        },
        avg_processing_seconds: 30,
      });
    });

    it('should prune only terminal jobs finished before the cutoff', async () => {
      const a = await queue.enqueue({ backend: 'transcoder', source_path: '/in/a.mov' });
      await queue.enqueue({ backend: 'transcoder', source_path: '/in/b.mov' });
      await queue.dequeueNext({ backends: ['transcoder'] });
      await queue.markResult(a.id, { success: true, artifactRef: '/out/a.mp4', durationMs: 1 });

      expect(await queue.pruneTerminal(new Date('2024-03-01T09:00:00Z'))).toBe(0);
      expect(await queue.pruneTerminal(new Date('2024-03-02T00:00:00Z'))).toBe(1);
      expect(await queue.get(a.id)).toBeNull();
      expect((await queue.stats()).total).toBe(1);
    });
  });
});
