import {
  EnvironmentDetector,
  DetectorSettings,
  concurrencyFor,
  timeoutMultiplierFor,
} from './environment.detector';
import type { EnvironmentProbes } from './environment.types';

const settings: DetectorSettings = {
  bareMetalMaxConcurrency: 2,
  probeHost: '127.0.0.1',
  probePort: 53,
  probeSamples: 3,
  probeTimeoutMs: 100,
  latencyCeilingMs: 1_000,
  latencyBaselineMs: 50,
  latencyScaleMs: 100,
  highLatencyMs: 150,
  deviationMs: 40,
  deviationRatio: 0.5,
  maxTimeoutMultiplier: 4,
  refreshIntervalMs: 0,
  accelerationOrder: ['nvenc', 'qsv'],
};

const detectedAt = new Date('2024-03-01T10:00:00Z');

describe('timeoutMultiplierFor', () => {
  it('should be 1 at or below the baseline', () => {
    expect(timeoutMultiplierFor(0, settings)).toBe(1);
    expect(timeoutMultiplierFor(50, settings)).toBe(1);
  });

  it('should grow with latency and stop at the maximum', () => {
    expect(timeoutMultiplierFor(150, settings)).toBe(2);
    expect(timeoutMultiplierFor(250, settings)).toBe(3);
    expect(timeoutMultiplierFor(5_000, settings)).toBe(4);
  });
});

describe('concurrencyFor', () => {
  it('should allow the bare-metal maximum on a healthy physical host', () => {
    expect(
      concurrencyFor({ virtualized: false, latencyMs: 20, virtualizationUnknown: false }, settings),
    ).toBe(2);
  });

  it('should drop to 1 when virtualized, unknown or on a degraded network', () => {
    expect(
      concurrencyFor({ virtualized: true, latencyMs: 20, virtualizationUnknown: false }, settings),
    ).toBe(1);
    expect(
      concurrencyFor({ virtualized: false, latencyMs: 20, virtualizationUnknown: true }, settings),
    ).toBe(1);
    expect(
      concurrencyFor({ virtualized: false, latencyMs: 151, virtualizationUnknown: false }, settings),
    ).toBe(1);
  });

  it('should let an explicit override win', () => {
    expect(
      concurrencyFor(
        { virtualized: true, latencyMs: 900, virtualizationUnknown: false },
        { ...settings, concurrencyOverride: 3 },
      ),
    ).toBe(3);
  });
});

describe('EnvironmentDetector', () => {
  let probes: {
    detectVirtualization: jest.Mock;
    sampleLatency: jest.Mock;
    listAccelerationPaths: jest.Mock;
  };

  const createDetector = (overrides: Partial<DetectorSettings> = {}) =>
    new EnvironmentDetector(
      probes as unknown as EnvironmentProbes,
      { ...settings, ...overrides },
      () => detectedAt,
    );

  beforeEach(() => {
    probes = {
      detectVirtualization: jest.fn().mockResolvedValue(false),
      sampleLatency: jest
        .fn()
        .mockResolvedValueOnce(30)
        .mockResolvedValueOnce(10)
        .mockResolvedValueOnce(20),
      listAccelerationPaths: jest.fn().mockResolvedValue(['nvenc']),
    };
  });

  describe('detect', () => {
    it('should build a frozen profile from the probes', async () => {
      const profile = await createDetector().detect();

      expect(profile).toEqual({
        virtualized: false,
        maxConcurrentJobs: 2,
        latencyMs: 20,
        accelerationPaths: ['nvenc'],
        timeoutMultiplier: 1,
        detectedAt,
        fallbacks: [],
      });
      expect(Object.isFrozen(profile)).toBe(true);
      expect(Object.isFrozen(profile.accelerationPaths)).toBe(true);
    });

    it('should cap concurrency at 1 on a virtualized host', async () => {
      probes.detectVirtualization.mockResolvedValue(true);

      const profile = await createDetector().detect();

      expect(profile.virtualized).toBe(true);
      expect(profile.maxConcurrentJobs).toBe(1);
    });

    it('should skip the virtualization probe when overridden', async () => {
      const profile = await createDetector({ override: 'virtualized' }).detect();

      expect(probes.detectVirtualization).not.toHaveBeenCalled();
      expect(profile.virtualized).toBe(true);
    });

    it('should fall back to conservative defaults when every probe fails', async () => {
      probes.detectVirtualization.mockRejectedValue(new Error('wmic missing'));
      probes.sampleLatency.mockReset().mockRejectedValue(new Error('unreachable'));
      probes.listAccelerationPaths.mockRejectedValue(new Error('ffmpeg missing'));

      const profile = await createDetector().detect();

      expect(profile).toEqual({
        virtualized: false,
        maxConcurrentJobs: 1,
        latencyMs: 1_000,
        accelerationPaths: [],
        timeoutMultiplier: 4,
        detectedAt,
        fallbacks: ['virtualization', 'latency', 'acceleration'],
      });
    });

    it('should take the median of the samples that succeeded', async () => {
      probes.sampleLatency
        .mockReset()
        .mockResolvedValueOnce(200)
        .mockRejectedValueOnce(new Error('timeout'))
        .mockResolvedValueOnce(100);

      const profile = await createDetector().detect();

      expect(profile.latencyMs).toBe(150);
      expect(profile.fallbacks).toEqual([]);
    });
  });

  describe('refresh', () => {
    it('should return the previous profile when latency is stable', async () => {
      const detector = createDetector();
      const previous = await detector.detect();
      probes.sampleLatency.mockResolvedValue(45);

      const next = await detector.refresh(previous);

      expect(next).toBe(previous);
      expect(probes.detectVirtualization).toHaveBeenCalledTimes(1);
    });

    it('should re-detect everything when latency deviates', async () => {
      const detector = createDetector();
      const previous = await detector.detect();
      probes.sampleLatency.mockResolvedValue(400);

      const next = await detector.refresh(previous);

      expect(next).not.toBe(previous);
      expect(next.latencyMs).toBe(400);
      expect(next.maxConcurrentJobs).toBe(1);
      expect(probes.detectVirtualization).toHaveBeenCalledTimes(2);
    });

    it('should use the relative threshold for high previous latency', async () => {
      const detector = createDetector();
      probes.sampleLatency.mockReset().mockResolvedValue(300);
      const previous = await detector.detect();
      probes.sampleLatency.mockResolvedValue(420);

      expect(await detector.refresh(previous)).toBe(previous);
    });
  });
});
