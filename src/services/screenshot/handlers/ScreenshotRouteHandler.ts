import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import express, { Express, Request, Response } from 'express';
import multer from 'multer';
import { getLogger } from '../../../core/logging/LogManager';
import { InvalidParameterError, NotFoundError } from '../../../core/errors/AppError';
import { ErrorMiddleware } from '../../../core/errors/ErrorMiddleware';
import { DeliveryMode } from '../../../core/config/ConfigInterface';
import { CompletedJob, IRouteHandler, Result, fail, ok } from '../IScreenshotService';
import { JobWorkspace, isJobId } from '../JobWorkspace';
import { ScreenshotJobProcessor, checkExtension } from '../ScreenshotJobProcessor';
import { ScreenshotArchiver } from '../ScreenshotArchiver';

export interface ScreenshotRouteOptions {
  uploadPath: string;
  maxUploadBytes: number;
  allowedExtensions: string[];
  defaultCount: number;
  defaultQuality: number;
  delivery: DeliveryMode;
  publicBaseUrl: string;
}

/**
 * 静态交付时的截图列表
 */
export interface ScreenshotListResponse {
  jobId: string;
  count: number;
  quality: number;
  screenshots: Array<{
    index: number;
    filename: string;
    url: string;
    size: number;
  }>;
}

/**
 * 解析整数参数，缺省时返回默认值
 */
export function parseIntegerParam(value: unknown, name: string, fallback: number): Result<number, InvalidParameterError> {
  if (value === undefined || value === null || value === '') {
    return ok(fallback);
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return ok(value);
  }
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
    return ok(parseInt(value.trim(), 10));
  }
  return fail(new InvalidParameterError(`${name} must be an integer`, { [name]: value }));
}

/**
 * 截图处理器：上传视频、返回截图（zip 或 URL 列表）、清理任务
 */
export class ScreenshotRouteHandler implements IRouteHandler {
  readonly name = 'Screenshot Handler';
  readonly path = '/screenshots';

  private logger = getLogger('ScreenshotRouteHandler');
  private upload: multer.Multer;
  private archiver: ScreenshotArchiver;

  constructor(
    private readonly workspace: JobWorkspace,
    private readonly processor: ScreenshotJobProcessor,
    private readonly options: ScreenshotRouteOptions
  ) {
    this.archiver = new ScreenshotArchiver(workspace);

    // 上传先落到暂存目录，任务创建后再移入任务目录
    this.upload = multer({
      storage: multer.diskStorage({
        destination: options.uploadPath,
        filename: (_req, file, cb) => {
          cb(null, `${randomUUID()}${path.extname(file.originalname).toLowerCase()}`);
        }
      }),
      limits: {
        fileSize: options.maxUploadBytes,
        files: 1
      },
      fileFilter: (_req, file, cb) => {
        const extension = checkExtension(file.originalname, options.allowedExtensions);
        if (!extension.success) {
          cb(extension.error);
          return;
        }
        cb(null, true);
      }
    });
  }

  /**
   * 注册Express路由
   */
  registerRoutes(app: Express): void {
    app.post(this.path, this.upload.single('video'), ErrorMiddleware.wrapAsync(this.handleCreate.bind(this)));
    app.delete(`${this.path}/:jobId`, ErrorMiddleware.wrapAsync(this.handleCleanup.bind(this)));

    if (this.options.delivery === 'static') {
      app.use('/files', express.static(this.workspace.rootPath, { index: false, dotfiles: 'deny', fallthrough: true }));
    }
  }

  /**
   * 上传视频并生成截图
   */
  private async handleCreate(req: Request, res: Response): Promise<void> {
    const file = req.file;

    // 处理期间客户端断开时，响应的close事件只会触发这一次
    let clientGone = false;
    const onClose = () => {
      clientGone = true;
    };
    res.once('close', onClose);

    try {
      if (!file) {
        throw new InvalidParameterError('No video file uploaded', { field: 'video' });
      }

      const body: Record<string, unknown> = req.body ?? {};
      const count = parseIntegerParam(body.num_screenshots ?? req.query.num_screenshots, 'num_screenshots', this.options.defaultCount);
      if (!count.success) throw count.error;
      const quality = parseIntegerParam(body.quality ?? req.query.quality, 'quality', this.options.defaultQuality);
      if (!quality.success) throw quality.error;

      this.logger.info(`收到截图请求: ${file.originalname}`, {
        size: file.size,
        count: count.value,
        quality: quality.value
      });

      const result = await this.processor.processJob(
        { originalName: file.originalname, sourcePath: file.path },
        { count: count.value, quality: quality.value }
      );
      if (!result.success) {
        throw result.error;
      }
      res.off('close', onClose);

      if (clientGone || res.destroyed) {
        this.logger.warn('客户端已断开，丢弃截图结果', { jobId: result.value.id });
        await this.workspace.remove(result.value.id);
        return;
      }

      if (this.options.delivery === 'archive') {
        await this.archiver.stream(result.value, res);
      } else {
        res.status(201).json(this.toListResponse(result.value, req));
      }
    } finally {
      res.off('close', onClose);
      // 暂存文件已被移动时此处为空操作
      if (file) {
        await fs.promises.rm(file.path, { force: true });
      }
    }
  }

  /**
   * 删除任务目录
   */
  private async handleCleanup(req: Request, res: Response): Promise<void> {
    const { jobId } = req.params;
    if (!isJobId(jobId)) {
      throw new NotFoundError(`Job ${jobId} not found`, { jobId });
    }

    const result = await this.workspace.cleanup(jobId);
    if (!result.success) {
      throw result.error;
    }

    res.status(204).end();
  }

  private baseUrl(req: Request): string {
    if (this.options.publicBaseUrl) {
      return this.options.publicBaseUrl.replace(/\/+$/, '');
    }
    return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
  }

  private toListResponse(job: CompletedJob, req: Request): ScreenshotListResponse {
    const base = this.baseUrl(req);
    return {
      jobId: job.id,
      count: job.count,
      quality: job.quality,
      screenshots: job.artifacts.map(artifact => ({
        index: artifact.index,
        filename: artifact.filename,
        url: `${base}/files/${job.id}/${artifact.filename}`,
        size: artifact.size
      }))
    };
  }
}
