import type { EnvironmentProfile } from '../environment/environment.types';
import type { Job } from '../jobs/job.types';

export function buildJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 1,
    status: 'running',
    backend: 'transcoder',
    source_path: '/tapes/sample.avi',
    params: {},
    attempts: 1,
    backend_restarts: 0,
    timeout_ms: null,
    elapsed_backoff_ms: 0,
    failure_type: null,
    failure_reason: null,
    last_error: null,
    artifact_ref: null,
    upload_ref: null,
    history: [],
    enqueued_at: new Date('2024-03-01T09:00:00Z'),
    available_at: new Date('2024-03-01T09:00:00Z'),
    started_at: new Date('2024-03-01T10:00:00Z'),
    finished_at: null,
    ...overrides,
  };
}

export function buildProfile(overrides: Partial<EnvironmentProfile> = {}): EnvironmentProfile {
  return Object.freeze({
    virtualized: false,
    maxConcurrentJobs: 2,
    latencyMs: 20,
    accelerationPaths: [],
    timeoutMultiplier: 1,
    detectedAt: new Date('2024-03-01T10:00:00Z'),
    fallbacks: [],
    ...overrides,
  });
}
