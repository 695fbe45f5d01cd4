import * as path from 'path';
import { getLogger } from '../../core/logging/LogManager';
import { ProbeError, TimeoutError } from '../../core/errors/AppError';
import { IDurationProber, Result, fail, ok } from './IScreenshotService';
import { IProcessRunner, ProcessRunner } from './ProcessRunner';

export interface FfprobeOptions {
  ffprobePath: string;
  timeoutMs: number;
}

/**
 * 使用ffprobe获取视频时长（秒）
 */
export class FfprobeDurationProber implements IDurationProber {
  private logger = getLogger('FfprobeDurationProber');

  constructor(
    private readonly options: FfprobeOptions,
    private readonly runner: IProcessRunner = new ProcessRunner()
  ) {}

  async probe(mediaPath: string): Promise<Result<number>> {
    const args = [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      mediaPath
    ];

    const result = await this.runner.run(this.options.ffprobePath, args, { timeoutMs: this.options.timeoutMs });
    const file = path.basename(mediaPath);

    if (result.timedOut) {
      return fail(new TimeoutError(`ffprobe timed out after ${this.options.timeoutMs}ms`, { file }));
    }

    if (result.spawnError) {
      return fail(new ProbeError(`ffprobe could not be started: ${result.spawnError.message}`, { file }, result.spawnError));
    }

    if (result.exitCode !== 0) {
      this.logger.error(`获取视频时长失败: ${file}`, { exitCode: result.exitCode, stderr: result.stderr });
      return fail(new ProbeError(`ffprobe exited with code ${result.exitCode}`, {
        file,
        exitCode: result.exitCode,
        stderr: result.stderr
      }));
    }

    const output = result.stdout.trim();
    const duration = Number(output);
    if (output === '' || !Number.isFinite(duration)) {
      this.logger.error(`ffprobe输出无法解析为时长: ${file}`, { output });
      return fail(new ProbeError('ffprobe produced non-numeric duration', { file, output }));
    }

    this.logger.debug(`视频时长: ${duration.toFixed(2)}秒`, { file });
    return ok(duration);
  }
}
