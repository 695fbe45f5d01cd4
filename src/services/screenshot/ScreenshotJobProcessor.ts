import * as fs from 'fs';
import * as path from 'path';
import { getLogger } from '../../core/logging/LogManager';
import { ILogger } from '../../core/logging/LoggerInterface';
import { AppError, ExtractionError, InvalidParameterError, ResourceError } from '../../core/errors/AppError';
import {
  Artifact,
  CompletedJob,
  IDurationProber,
  Job,
  PlanEntry,
  Result,
  ScreenshotOptions,
  UploadedVideo,
  fail,
  ok
} from './IScreenshotService';
import { JobWorkspace } from './JobWorkspace';
import { ScreenshotScheduler, artifactFilename, validateCount, validateQuality } from './ScreenshotScheduler';

export type JobStage = 'validate' | 'allocate' | 'persist' | 'probe' | 'plan' | 'extract';

export interface JobProcessorOptions {
  allowedExtensions: string[];
  maxCount: number;
  deleteInputOnSuccess: boolean;
  extractionConcurrency: number;
}

/**
 * 上传文件名扩展名检查（仅按文件名，不是安全边界）
 */
export function checkExtension(filename: string, allowedExtensions: string[]): Result<string, InvalidParameterError> {
  const extension = path.extname(filename).toLowerCase();
  if (!allowedExtensions.includes(extension)) {
    return fail(new InvalidParameterError('Unsupported file format', {
      filename: path.basename(filename),
      allowedExtensions
    }));
  }
  return ok(extension);
}

/**
 * 去掉路径部分，避免写出任务目录
 */
function sanitizeFilename(originalName: string): string {
  const baseName = path.basename(originalName.replace(/\\/g, '/'));
  return baseName === '' || baseName === '.' || baseName === '..' ? 'input' : baseName;
}

/**
 * 截图任务处理：分配目录 → 保存视频 → 探测时长 → 计算时间点 → 逐个截帧
 * 任意一步失败都会删除整个任务目录，不返回部分结果
 */
export class ScreenshotJobProcessor {
  private logger = getLogger('ScreenshotJobProcessor');

  constructor(
    private readonly workspace: JobWorkspace,
    private readonly prober: IDurationProber,
    private readonly scheduler: ScreenshotScheduler,
    private readonly options: JobProcessorOptions
  ) {}

  /**
   * 参数校验在分配目录、调用外部工具之前完成
   */
  validate(upload: Pick<UploadedVideo, 'originalName'>, options: ScreenshotOptions): Result<void> {
    const extension = checkExtension(upload.originalName, this.options.allowedExtensions);
    if (!extension.success) return extension;

    const count = validateCount(options.count, this.options.maxCount);
    if (!count.success) return count;

    const quality = validateQuality(options.quality);
    if (!quality.success) return quality;

    return ok(undefined);
  }

  async processJob(upload: UploadedVideo, options: ScreenshotOptions): Promise<Result<CompletedJob>> {
    const validation = this.validate(upload, options);
    if (!validation.success) {
      this.logStageFailure(this.logger, 'validate', validation.error);
      return validation;
    }

    // 1. 分配任务
    const allocation = await this.workspace.allocate();
    if (!allocation.success) {
      this.logStageFailure(this.logger, 'allocate', allocation.error);
      return allocation;
    }
    const job = allocation.value;
    const logger = this.logger.child({ jobId: job.id });
    logger.info('开始处理截图任务', { file: upload.originalName, count: options.count, quality: options.quality });

    // 2. 保存上传的视频
    const inputPath = this.workspace.jobPath(job.id, sanitizeFilename(upload.originalName));
    const persisted = await this.persistInput(upload.sourcePath, inputPath);
    if (!persisted.success) {
      return this.rollback(job, 'persist', persisted.error, logger);
    }
    job.inputPath = inputPath;
    job.state = 'processing';

    // 3. 探测时长
    const probed = await this.prober.probe(inputPath);
    if (!probed.success) {
      return this.rollback(job, 'probe', probed.error, logger);
    }
    const durationSeconds = probed.value;
    logger.info(`视频时长: ${durationSeconds.toFixed(2)}秒`);

    // 4. 计算时间点
    const planned = this.scheduler.plan(durationSeconds, options.count);
    if (!planned.success) {
      return this.rollback(job, 'plan', planned.error, logger);
    }
    logger.debug('截图时间点', { seconds: planned.value.map(entry => entry.seekSeconds) });

    // 5. 截帧
    const extracted = await this.extractAll(job, inputPath, planned.value, options.quality, logger);
    if (!extracted.success) {
      return this.rollback(job, 'extract', extracted.error, logger);
    }
    job.artifacts = extracted.value;

    // 6. 删除原始视频，只保留截图
    if (this.options.deleteInputOnSuccess) {
      try {
        await fs.promises.unlink(inputPath);
        job.inputPath = undefined;
      } catch (error) {
        logger.warn('删除原始视频失败', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    const completed: CompletedJob = {
      ...job,
      state: 'completed',
      durationSeconds,
      count: options.count,
      quality: options.quality
    };
    job.state = 'completed';
    logger.info(`截图任务完成，共 ${completed.artifacts.length} 张`);
    return ok(completed);
  }

  /**
   * 把暂存文件移动到任务目录，跨设备时退化为复制+删除
   */
  private async persistInput(sourcePath: string, inputPath: string): Promise<Result<void>> {
    try {
      await fs.promises.rename(sourcePath, inputPath);
      return ok(undefined);
    } catch (error) {
      if (error instanceof Error && Reflect.get(error, 'code') === 'EXDEV') {
        try {
          await fs.promises.copyFile(sourcePath, inputPath);
          await fs.promises.unlink(sourcePath);
          return ok(undefined);
        } catch (copyError) {
          return fail(new ResourceError('Failed to store uploaded video', {}, copyError instanceof Error ? copyError : undefined));
        }
      }
      return fail(new ResourceError('Failed to store uploaded video', {}, error instanceof Error ? error : undefined));
    }
  }

  /**
   * 按配置的并发数截帧，结果按序号排列
   * 出现第一个失败后不再启动新的截帧，等待进行中的截帧结束后返回该错误
   */
  private async extractAll(
    job: Job,
    inputPath: string,
    plan: PlanEntry[],
    quality: number,
    logger: ILogger
  ): Promise<Result<Artifact[]>> {
    const artifacts: Artifact[] = new Array(plan.length);
    const failure: { error: AppError | null } = { error: null };
    let next = 0;

    const worker = async (): Promise<void> => {
      while (failure.error === null && next < plan.length) {
        const entry = plan[next++];
        const filename = artifactFilename(entry.index);
        const destination = this.workspace.jobPath(job.id, filename);

        const result = await this.scheduler.extractAt(inputPath, entry.seekSeconds, quality, destination);
        if (!result.success) {
          failure.error = failure.error ?? result.error;
          return;
        }

        try {
          const stats = await fs.promises.stat(destination);
          artifacts[entry.index - 1] = { index: entry.index, filename, path: destination, size: stats.size };
        } catch (error) {
          failure.error = failure.error ?? new ExtractionError('Screenshot file is missing', { output: filename },
            error instanceof Error ? error : undefined);
          return;
        }
        logger.info(`Generated screenshot ${entry.index}/${plan.length}`);
      }
    };

    const workers = Math.max(1, Math.min(this.options.extractionConcurrency, plan.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (failure.error) {
      return fail(failure.error);
    }
    return ok(artifacts);
  }

  /**
   * 删除整个任务目录并返回错误
   */
  private async rollback(job: Job, stage: JobStage, error: AppError, logger: ILogger): Promise<Result<CompletedJob>> {
    job.state = 'failed';
    job.artifacts = [];
    this.logStageFailure(logger, stage, error);

    try {
      await this.workspace.remove(job.id);
    } catch (removeError) {
      logger.error('清理任务目录失败', { stage }, removeError instanceof Error ? removeError : undefined);
    }

    return fail(error);
  }

  private logStageFailure(logger: ILogger, stage: JobStage, error: AppError): void {
    const context = { stage, code: error.code, details: error.details };
    if (error.statusCode >= 500) {
      logger.error(`截图任务失败: ${error.message}`, context, error.cause);
    } else {
      logger.warn(`截图任务被拒绝: ${error.message}`, context);
    }
  }
}
