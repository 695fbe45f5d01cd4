import { spawn } from 'child_process';
import { getLogger } from '../../core/logging/LogManager';

const MAX_STDERR_LENGTH = 2000;

/**
 * 外部进程执行结果
 */
export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  spawnError?: Error;
}

export interface RunOptions {
  /** 0 表示不限时 */
  timeoutMs: number;
}

export interface IProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

/**
 * 运行外部命令并收集输出
 * 总是resolve，由调用方把结果映射为各自的错误类型
 */
export class ProcessRunner implements IProcessRunner {
  private logger = getLogger('ProcessRunner');

  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    this.logger.debug('执行外部命令', {
      command: `${command} ${args.join(' ')}`,
      timeout: options.timeoutMs
    });

    return new Promise((resolve) => {
      const child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let timeoutId: NodeJS.Timeout | null = null;

      const settle = (result: Omit<ProcessResult, 'stdout' | 'stderr' | 'timedOut'>) => {
        if (settled) {
          return;
        }
        settled = true;
        if (timeoutId) clearTimeout(timeoutId);
        resolve({ ...result, stdout, stderr: stderr.substring(0, MAX_STDERR_LENGTH), timedOut });
      };

      if (options.timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          this.logger.warn('外部命令超时，终止进程', { command, timeout: options.timeoutMs });
          child.kill('SIGKILL');
        }, options.timeoutMs);
      }

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        if (stderr.length < MAX_STDERR_LENGTH) {
          stderr += data.toString();
        }
      });

      child.on('close', (code: number | null) => {
        settle({ exitCode: code });
      });

      child.on('error', (error: Error) => {
        this.logger.error(`外部命令启动失败: ${command}`, { error: error.message });
        settle({ exitCode: null, spawnError: error });
      });
    });
  }
}
