import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { spawn } from 'node:child_process';
import { SpawnProcessRunner } from './process-runner';

jest.mock('node:child_process', () => ({ spawn: jest.fn() }));

class FakeChild extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  pid: number | undefined = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  kill = jest.fn();
  unref = jest.fn();

  exit(code: number | null, signal: NodeJS.Signals | null = null) {
    this.exitCode = code;
    this.signalCode = signal;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('SpawnProcessRunner', () => {
  const spawnMock = spawn as unknown as jest.Mock;
  let child: FakeChild;
  let runner: SpawnProcessRunner;

  beforeEach(() => {
    child = new FakeChild();
    spawnMock.mockReset().mockReturnValue(child);
    runner = new SpawnProcessRunner();
  });

  it('should stream lines and keep the stderr tail', async () => {
    const stdoutLines: string[] = [];
    const run = runner.run('ffmpeg', ['-i', 'in.mov'], {
      onStdoutLine: (line) => stdoutLines.push(line),
    });

    child.stdout.write('out_time_ms=1000\nprogress=continue\n');
    child.stderr.write('warning: something\nerror: broken\n');
    await flush();
    child.exit(1);

    await expect(run).resolves.toEqual({
      exitCode: 1,
      signal: null,
      stderrTail: ['warning: something', 'error: broken'],
      aborted: false,
      spawnError: undefined,
    });
    expect(stdoutLines).toEqual(['out_time_ms=1000', 'progress=continue']);
    expect(spawnMock).toHaveBeenCalledWith('ffmpeg', ['-i', 'in.mov'], {
      cwd: undefined,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  });

  it('should report a process that never started', async () => {
    child.pid = undefined;
    const run = runner.run('missing-binary', []);
    const error: NodeJS.ErrnoException = new Error('spawn missing-binary ENOENT');
    error.code = 'ENOENT';

    child.emit('error', error);

    const outcome = await run;
    expect(outcome.spawnError?.code).toBe('ENOENT');
    expect(outcome.exitCode).toBeNull();
  });

  it('should send the kill signal on abort and resolve only after exit', async () => {
    const controller = new AbortController();
    let settled = false;
    const run = runner
      .run('topaz', [], { signal: controller.signal, killSignal: 'SIGINT', killGraceMs: 60_000 })
      .then((outcome) => {
        settled = true;
        return outcome;
      });

    controller.abort();
    await flush();

    expect(child.kill).toHaveBeenCalledWith('SIGINT');
    expect(settled).toBe(false);

    child.exit(null, 'SIGINT');
    const outcome = await run;
    expect(outcome.aborted).toBe(true);
    expect(outcome.signal).toBe('SIGINT');
    expect(child.kill).toHaveBeenCalledTimes(1);
  });

  it('should escalate to SIGKILL after the grace period', async () => {
    jest.useFakeTimers();
    try {
      const controller = new AbortController();
      const run = runner.run('ffmpeg', [], { signal: controller.signal, killGraceMs: 5_000 });

      controller.abort();
      jest.advanceTimersByTime(5_000);

      expect(child.kill.mock.calls).toEqual([['SIGTERM'], ['SIGKILL']]);
      child.emit('close', null, 'SIGKILL');
      await expect(run).resolves.toMatchObject({ aborted: true, signal: 'SIGKILL' });
    } finally {
      jest.useRealTimers();
    }
  });

  it('should resolve launch once the detached process has spawned', async () => {
    const launched = runner.launch('/opt/editor/editor', ['--automation']);

    child.emit('spawn');

    await expect(launched).resolves.toBeUndefined();
    expect(child.unref).toHaveBeenCalled();
    expect(spawnMock).toHaveBeenCalledWith('/opt/editor/editor', ['--automation'], {
      detached: true,
      stdio: 'ignore',
    });
  });
});
