import * as fs from 'fs';
import * as path from 'path';
import { getLogger } from '../../core/logging/LogManager';
import { ExtractionError, TimeoutError } from '../../core/errors/AppError';
import { IFrameExtractor, Result, fail, ok } from './IScreenshotService';
import { IProcessRunner, ProcessRunner } from './ProcessRunner';
import { formatTimestamp } from './ScreenshotScheduler';

export interface FfmpegOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

/**
 * 使用ffmpeg在指定时间点截取一帧
 */
export class FfmpegFrameExtractor implements IFrameExtractor {
  private logger = getLogger('FfmpegFrameExtractor');

  constructor(
    private readonly options: FfmpegOptions,
    private readonly runner: IProcessRunner = new ProcessRunner()
  ) {}

  /**
   * 构建ffmpeg参数：先 -ss 再 -i，按关键帧快速定位
   */
  static buildArgs(mediaPath: string, seekSeconds: number, quality: number, destinationPath: string): string[] {
    return [
      '-ss', formatTimestamp(seekSeconds),
      '-i', mediaPath,
      '-vframes', '1',
      '-q:v', String(quality),
      '-y',
      destinationPath
    ];
  }

  async extractAt(mediaPath: string, seekSeconds: number, quality: number, destinationPath: string): Promise<Result<void>> {
    const args = FfmpegFrameExtractor.buildArgs(mediaPath, seekSeconds, quality, destinationPath);
    const output = path.basename(destinationPath);

    const result = await this.runner.run(this.options.ffmpegPath, args, { timeoutMs: this.options.timeoutMs });

    if (result.timedOut) {
      return fail(new TimeoutError(`ffmpeg timed out after ${this.options.timeoutMs}ms`, { output, seekSeconds }));
    }

    if (result.spawnError) {
      return fail(new ExtractionError(`ffmpeg could not be started: ${result.spawnError.message}`, { output }, result.spawnError));
    }

    if (result.exitCode !== 0) {
      this.logger.error('ffmpeg执行失败', { output, exitCode: result.exitCode, stderr: result.stderr });
      return fail(new ExtractionError(`ffmpeg exited with code ${result.exitCode}`, {
        output,
        seekSeconds,
        exitCode: result.exitCode,
        stderr: result.stderr
      }));
    }

    // 时间点超出视频长度时ffmpeg可能正常退出但不写文件
    try {
      await fs.promises.access(destinationPath, fs.constants.F_OK);
    } catch {
      this.logger.error(`截图文件未生成: ${output}`, { seekSeconds });
      return fail(new ExtractionError('ffmpeg did not write an image', { output, seekSeconds }));
    }

    return ok(undefined);
  }
}
