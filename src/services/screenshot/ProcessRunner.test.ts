import { PassThrough } from 'stream';
import { ChildProcess, spawn } from 'child_process';
import { ProcessRunner } from './ProcessRunner';
import { getLogger } from '../../core/logging/LogManager';
import { createMockLogger } from '../../core/test/testUtils';

jest.mock('child_process', () => ({
  ...jest.requireActual('child_process'),
  spawn: jest.fn()
}));
jest.mock('../../core/logging/LogManager');

/**
 * 未真正启动的子进程，输出由测试写入
 */
class FakeChild extends ChildProcess {
  readonly out = new PassThrough();
  readonly err = new PassThrough();
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];

  constructor() {
    super();
    this.stdout = this.out;
    this.stderr = this.err;
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    setImmediate(() => this.emit('close', null));
    return true;
  }
}

describe('ProcessRunner', () => {
  let child: FakeChild;
  let runner: ProcessRunner;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.useRealTimers();
    jest.mocked(getLogger).mockReturnValue(createMockLogger());

    child = new FakeChild();
    jest.mocked(spawn).mockReturnValue(child);
    runner = new ProcessRunner();
  });

  it('收集stdout与退出码', async () => {
    const pending = runner.run('ffprobe', ['-v', 'error', 'clip.mp4'], { timeoutMs: 0 });
    child.out.write('33.0');
    child.out.write('00000\n');
    setImmediate(() => child.emit('close', 0));

    const result = await pending;

    expect(spawn).toHaveBeenCalledWith('ffprobe', ['-v', 'error', 'clip.mp4'], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true
    });
    expect(result).toEqual({ exitCode: 0, stdout: '33.000000\n', stderr: '', timedOut: false });
  });

  it('stderr最多保留2000个字符', async () => {
    const pending = runner.run('ffmpeg', [], { timeoutMs: 0 });
    child.err.write('x'.repeat(1500));
    child.err.write('y'.repeat(1500));
    setImmediate(() => child.emit('close', 1));

    const result = await pending;

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('x'.repeat(1500) + 'y'.repeat(500));
  });

  it('启动失败时返回spawnError而不是reject', async () => {
    const pending = runner.run('missing-binary', [], { timeoutMs: 0 });
    const error = new Error('spawn missing-binary ENOENT');
    child.emit('error', error);
    child.emit('close', null);

    const result = await pending;

    expect(result.exitCode).toBeNull();
    expect(result.spawnError).toBe(error);
    expect(result.timedOut).toBe(false);
  });

  it('超时后强制结束进程', async () => {
    const result = await runner.run('ffmpeg', ['-i', 'clip.mp4'], { timeoutMs: 20 });

    expect(child.signals).toEqual(['SIGKILL']);
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });
});
