import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

export type ProcessOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Last stderr lines, oldest first. */
  stderrTail: string[];
  /** The caller's signal fired before the process exited. */
  aborted: boolean;
  /** Set when the process never started (missing binary, permissions). */
  spawnError?: NodeJS.ErrnoException;
};

export type RunOptions = {
  signal?: AbortSignal;
  /** Sent first on abort. Defaults to SIGTERM. */
  killSignal?: NodeJS.Signals;
  /** Wait after killSignal before forcing SIGKILL. */
  killGraceMs?: number;
  cwd?: string;
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
};

export interface ProcessRunner {
  /** Resolves once the process has exited; never rejects. */
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessOutcome>;
  /** Starts a detached process that outlives the worker. */
  launch(command: string, args: string[]): Promise<void>;
}

const STDERR_TAIL_LINES = 40;

function forEachLine(stream: Readable | null, onLine: (line: string) => void) {
  if (!stream) return;
  createInterface({ input: stream, crlfDelay: Infinity }).on('line', onLine);
}

export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<ProcessOutcome> {
    const { signal, killSignal = 'SIGTERM', killGraceMs = 10_000 } = options;

    return new Promise((resolve) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
      const stderrTail: string[] = [];
      let aborted = false;
      let spawnError: NodeJS.ErrnoException | undefined;
      let escalation: NodeJS.Timeout | undefined;
      let settled = false;

      const onAbort = () => {
        aborted = true;
        child.kill(killSignal);
        escalation = setTimeout(() => child.kill('SIGKILL'), killGraceMs);
        escalation.unref();
      };

      const settle = (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(escalation);
        signal?.removeEventListener('abort', onAbort);
        if (child.exitCode === null && child.signalCode === null && child.pid !== undefined) {
          child.kill('SIGKILL');
        }
        resolve({ exitCode, signal: exitSignal, stderrTail, aborted, spawnError });
      };

      forEachLine(child.stdout, (line) => options.onStdoutLine?.(line));
      forEachLine(child.stderr, (line) => {
        stderrTail.push(line);
        if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
        options.onStderrLine?.(line);
      });

      child.once('error', (error: NodeJS.ErrnoException) => {
        if (child.pid === undefined) {
          spawnError = error;
          settle(null, null);
        }
      });
      child.once('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
        settle(code, exitSignal);
      });

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  launch(command: string, args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore' });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}
