import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { connect } from 'node:net';
import { promisify } from 'node:util';
import type { AccelerationPath, EnvironmentProbes } from './environment.types';

const execFileAsync = promisify(execFile);

const HYPERVISOR_SIGNATURES = [
  'vmware',
  'virtualbox',
  'kvm',
  'qemu',
  'xen',
  'hyper-v',
  'microsoft corporation virtual',
  'amazon ec2',
  'google compute engine',
  'openstack',
  'parallels',
  'shadow',
  'blade sas',
  'parsec',
];

const ENCODER_SUFFIX: Record<AccelerationPath, string> = {
  nvenc: '_nvenc',
  qsv: '_qsv',
  amf: '_amf',
  vaapi: '_vaapi',
  videotoolbox: '_videotoolbox',
};

export function matchesHypervisorSignature(text: string): boolean {
  const normalized = text.toLowerCase();
  return HYPERVISOR_SIGNATURES.some((signature) => normalized.includes(signature));
}

/**
 * Picks the acceleration paths present in `ffmpeg -encoders` output,
 * keeping the caller's preference order.
 */
export function parseEncoderList(
  output: string,
  order: readonly AccelerationPath[],
): AccelerationPath[] {
  const encoders = new Set(
    output
      .split('\n')
      .map((line) => line.trim().split(/\s+/)[1])
      .filter((name): name is string => typeof name === 'string' && name.length > 0),
  );
  return order.filter((path) =>
    [...encoders].some((name) => name.endsWith(ENCODER_SUFFIX[path])),
  );
}

export function median(samples: readonly number[]): number {
  if (samples.length === 0) {
    throw new Error('median of an empty sample set');
  }
  const sorted = [...samples].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export type NodeProbeOptions = {
  transcoderPath: string;
  probeHost: string;
  probePort: number;
  probeTimeoutMs: number;
  accelerationOrder: readonly AccelerationPath[];
  platform?: NodeJS.Platform;
};

/**
 * Probes backed by the host OS. Every method may throw or time out; the
 * detector decides what a failure means.
 */
export class NodeEnvironmentProbes implements EnvironmentProbes {
  private readonly platform: NodeJS.Platform;

  constructor(private readonly options: NodeProbeOptions) {
    this.platform = options.platform ?? process.platform;
  }

  async detectVirtualization(): Promise<boolean> {
    switch (this.platform) {
      case 'linux':
        return this.detectLinux();
      case 'win32': {
        const { stdout } = await execFileAsync(
          'wmic',
          ['computersystem', 'get', 'manufacturer,model'],
          { timeout: this.options.probeTimeoutMs },
        );
        return matchesHypervisorSignature(stdout);
      }
      case 'darwin': {
        const { stdout } = await execFileAsync(
          'sysctl',
          ['-n', 'kern.hv_vmm_present'],
          { timeout: this.options.probeTimeoutMs },
        );
        return stdout.trim() === '1';
      }
      default:
        throw new Error(`no virtualization probe for platform ${this.platform}`);
    }
  }

  private async detectLinux(): Promise<boolean> {
    const cpuinfo = await readFile('/proc/cpuinfo', 'utf8');
    if (/^flags\s*:.*\bhypervisor\b/m.test(cpuinfo)) {
      return true;
    }
    const dmi = await Promise.all(
      ['sys_vendor', 'product_name'].map((file) =>
        readFile(`/sys/class/dmi/id/${file}`, 'utf8').catch(() => ''),
      ),
    );
    return matchesHypervisorSignature(dmi.join(' '));
  }

  sampleLatency(): Promise<number> {
    const { probeHost, probePort, probeTimeoutMs } = this.options;
    return new Promise((resolve, reject) => {
      const startedAt = process.hrtime.bigint();
      const socket = connect({ host: probeHost, port: probePort });
      socket.setTimeout(probeTimeoutMs);
      socket.once('connect', () => {
        const elapsed = Number(process.hrtime.bigint() - startedAt) / 1e6;
        socket.destroy();
        resolve(elapsed);
      });
      socket.once('timeout', () => {
        socket.destroy();
        reject(new Error(`latency probe to ${probeHost}:${probePort} timed out`));
      });
      socket.once('error', (error) => {
        socket.destroy();
        reject(error);
      });
    });
  }

  async listAccelerationPaths(): Promise<AccelerationPath[]> {
    const { stdout } = await execFileAsync(
      this.options.transcoderPath,
      ['-hide_banner', '-encoders'],
      { timeout: this.options.probeTimeoutMs, maxBuffer: 4 * 1024 * 1024 },
    );
    return parseEncoderList(stdout, this.options.accelerationOrder);
  }
}
