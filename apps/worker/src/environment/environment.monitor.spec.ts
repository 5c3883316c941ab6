import { EnvironmentMonitor } from './environment.monitor';
import type { EnvironmentDetector } from './environment.detector';
import type { EnvironmentProfile } from './environment.types';

const profile = (latencyMs: number): EnvironmentProfile =>
  Object.freeze({
    virtualized: true,
    maxConcurrentJobs: 1,
    latencyMs,
    accelerationPaths: [],
    timeoutMultiplier: 1,
    detectedAt: new Date('2024-03-01T10:00:00Z'),
    fallbacks: [],
  });

describe('EnvironmentMonitor', () => {
  let detector: { detect: jest.Mock; refresh: jest.Mock };
  let monitor: EnvironmentMonitor;

  beforeEach(() => {
    detector = { detect: jest.fn(), refresh: jest.fn() };
    monitor = new EnvironmentMonitor(detector as unknown as EnvironmentDetector, 0);
  });

  afterEach(() => {
    monitor.onModuleDestroy();
  });

  it('should refuse to serve a profile before detection', () => {
    expect(() => monitor.current()).toThrow(
      'environment profile requested before detection',
    );
  });

  it('should publish the detected profile on init', async () => {
    const initial = profile(20);
    detector.detect.mockResolvedValue(initial);

    await monitor.onModuleInit();

    expect(monitor.current()).toBe(initial);
  });

  it('should replace the snapshot wholesale on refresh', async () => {
    const initial = profile(20);
    const next = profile(400);
    detector.detect.mockResolvedValue(initial);
    detector.refresh.mockResolvedValue(next);
    await monitor.onModuleInit();

    await monitor.refresh();

    expect(detector.refresh).toHaveBeenCalledWith(initial);
    expect(monitor.current()).toBe(next);
    expect(initial.latencyMs).toBe(20);
  });

  it('should keep the previous snapshot when refresh fails', async () => {
    const initial = profile(20);
    detector.detect.mockResolvedValue(initial);
    detector.refresh.mockRejectedValue(new Error('probe crashed'));
    await monitor.onModuleInit();

    await monitor.refresh();

    expect(monitor.current()).toBe(initial);
  });
});
