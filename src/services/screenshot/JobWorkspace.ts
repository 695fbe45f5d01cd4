import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { getLogger } from '../../core/logging/LogManager';
import { NotFoundError, ResourceError } from '../../core/errors/AppError';
import { Job, Result, fail, ok } from './IScreenshotService';

const JOB_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export function isJobId(value: string): boolean {
  return JOB_ID_PATTERN.test(value);
}

/**
 * 任务工作目录管理
 * 每个任务一个以UUID命名的独立目录，任务之间不共享文件
 */
export class JobWorkspace {
  private logger = getLogger('JobWorkspace');
  private jobs: Map<string, Job> = new Map();
  readonly rootPath: string;

  constructor(rootPath: string) {
    this.rootPath = path.resolve(rootPath);
  }

  /**
   * 清空并重建根目录，丢弃上次运行遗留的任务
   */
  async initialize(): Promise<void> {
    await fs.promises.rm(this.rootPath, { recursive: true, force: true });
    await fs.promises.mkdir(this.rootPath, { recursive: true });
    this.jobs.clear();
    this.logger.info(`工作目录已重置: ${this.rootPath}`);
  }

  /**
   * 分配任务ID与工作目录
   * mkdir 不带 recursive，目录已存在时直接失败
   */
  async allocate(): Promise<Result<Job, ResourceError>> {
    const id = randomUUID();
    const directory = path.join(this.rootPath, id);

    try {
      await fs.promises.mkdir(directory);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      this.logger.error('创建任务目录失败', { jobId: id, directory }, cause);
      return fail(new ResourceError('Failed to allocate job directory', { jobId: id }, cause));
    }

    const job: Job = {
      id,
      directory,
      state: 'created',
      createdAt: new Date(),
      artifacts: []
    };
    this.jobs.set(id, job);
    this.logger.debug('任务已创建', { jobId: id });
    return ok(job);
  }

  get(jobId: string): Job | undefined {
    return this.jobs.get(jobId);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  list(): Job[] {
    return Array.from(this.jobs.values());
  }

  /**
   * 任务目录内的文件路径，只取文件名部分
   */
  jobPath(jobId: string, filename: string): string {
    return path.join(this.rootPath, jobId, path.basename(filename));
  }

  /**
   * 删除任务目录并注销任务，可重复调用
   */
  async remove(jobId: string): Promise<void> {
    this.jobs.delete(jobId);
    if (!isJobId(jobId)) {
      return;
    }
    await fs.promises.rm(path.join(this.rootPath, jobId), { recursive: true, force: true });
    this.logger.debug('任务目录已删除', { jobId });
  }

  /**
   * 显式清理已完成的任务
   */
  async cleanup(jobId: string): Promise<Result<void, NotFoundError>> {
    const job = this.jobs.get(jobId);
    if (!job || job.state !== 'completed') {
      return fail(new NotFoundError(`Job ${jobId} not found`, { jobId }));
    }

    await this.remove(jobId);
    this.logger.info('任务已清理', { jobId });
    return ok(undefined);
  }
}
