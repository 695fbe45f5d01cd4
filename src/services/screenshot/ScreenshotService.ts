import * as fs from 'fs';
import * as path from 'path';
import { Server } from 'http';
import express, { Express, Request, Response } from 'express';
import { AppConfig } from '../../core/config/ConfigInterface';
import { ErrorMiddleware } from '../../core/errors/ErrorMiddleware';
import { getLogger } from '../../core/logging/LogManager';
import { IDurationProber, IFrameExtractor, IRouteHandler } from './IScreenshotService';
import { FfprobeDurationProber } from './FfprobeDurationProber';
import { FfmpegFrameExtractor } from './FfmpegFrameExtractor';
import { ScreenshotScheduler } from './ScreenshotScheduler';
import { JobWorkspace } from './JobWorkspace';
import { ScreenshotJobProcessor } from './ScreenshotJobProcessor';
import { ScreenshotRouteHandler } from './handlers/ScreenshotRouteHandler';

/**
 * 可替换的外部工具，测试时注入
 */
export interface ScreenshotServiceDependencies {
  prober?: IDurationProber;
  extractor?: IFrameExtractor;
}

/**
 * 截图HTTP服务
 */
export class ScreenshotService {
  private app: Express;
  private server: Server | null = null;
  private port: number;
  private host: string;
  private logger = getLogger('ScreenshotService');
  private handlers: IRouteHandler[];
  readonly workspace: JobWorkspace;
  readonly processor: ScreenshotJobProcessor;

  constructor(private readonly config: AppConfig, dependencies: ScreenshotServiceDependencies = {}) {
    this.app = express();
    this.port = config.server.port;
    this.host = config.server.host;

    const prober = dependencies.prober ?? new FfprobeDurationProber({
      ffprobePath: config.ffmpeg.ffprobePath,
      timeoutMs: config.ffmpeg.probeTimeoutMs
    });
    const extractor = dependencies.extractor ?? new FfmpegFrameExtractor({
      ffmpegPath: config.ffmpeg.ffmpegPath,
      timeoutMs: config.ffmpeg.extractTimeoutMs
    });

    this.workspace = new JobWorkspace(config.storage.tempPath);
    this.processor = new ScreenshotJobProcessor(this.workspace, prober, new ScreenshotScheduler(extractor), {
      allowedExtensions: config.screenshots.allowedExtensions,
      maxCount: config.screenshots.maxCount,
      deleteInputOnSuccess: config.screenshots.deleteInputOnSuccess,
      extractionConcurrency: config.screenshots.extractionConcurrency
    });

    this.handlers = [
      new ScreenshotRouteHandler(this.workspace, this.processor, {
        uploadPath: path.resolve(config.storage.uploadPath),
        maxUploadBytes: config.screenshots.maxUploadBytes,
        allowedExtensions: config.screenshots.allowedExtensions,
        defaultCount: config.screenshots.defaultCount,
        defaultQuality: config.screenshots.defaultQuality,
        delivery: config.screenshots.delivery,
        publicBaseUrl: config.server.publicBaseUrl
      })
    ];

    this.configureMiddleware();
    this.registerHandlers();
    this.configureFallbacks();
  }

  /**
   * 重置任务目录与上传暂存目录
   */
  async initialize(): Promise<void> {
    await this.workspace.initialize();
    const uploadPath = path.resolve(this.config.storage.uploadPath);
    await fs.promises.rm(uploadPath, { recursive: true, force: true });
    await fs.promises.mkdir(uploadPath, { recursive: true });
  }

  /**
   * 启动服务器
   */
  async start(): Promise<void> {
    await this.initialize();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = server.address();
        if (address && typeof address !== 'string') {
          this.port = address.port;
        }
        this.logger.info('==================================================');
        this.logger.info('截图服务已启动');
        this.logger.info(`地址: ${this.getServerUrl()}`);
        this.logger.info(`交付方式: ${this.config.screenshots.delivery}`);
        this.logger.info('==================================================');
        resolve();
      });

      server.on('error', (error: Error) => {
        this.logger.error(`启动截图服务器时出错: ${error.message}`, {}, error);
        reject(error);
      });

      this.server = server;
    });
  }

  /**
   * 停止服务器
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error?: Error) => {
        if (error) {
          this.logger.error(`停止截图服务器时出错: ${error.message}`, {}, error);
          reject(error);
          return;
        }
        this.server = null;
        this.logger.info('截图服务已停止');
        resolve();
      });
    });
  }

  getPort(): number {
    return this.port;
  }

  getServerUrl(): string {
    return `http://${this.host}:${this.port}`;
  }

  getStatus(): { running: boolean; port: number; host: string; jobs: number; delivery: string } {
    return {
      running: this.server !== null,
      port: this.port,
      host: this.host,
      jobs: this.workspace.list().length,
      delivery: this.config.screenshots.delivery
    };
  }

  /**
   * 配置中间件
   */
  private configureMiddleware(): void {
    this.app.use(ErrorMiddleware.cors());
    this.app.use(ErrorMiddleware.requestLogger());

    // 健康检查端点
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        service: this.config.app.name,
        version: this.config.app.version,
        timestamp: new Date().toISOString()
      });
    });

    // 状态端点
    this.app.get('/status', (_req: Request, res: Response) => {
      res.json(this.getStatus());
    });
  }

  /**
   * 注册处理器路由
   */
  private registerHandlers(): void {
    for (const handler of this.handlers) {
      handler.registerRoutes(this.app);
      this.logger.info(`注册处理器: ${handler.name} (${handler.path})`);
    }
  }

  private configureFallbacks(): void {
    this.app.use(ErrorMiddleware.notFoundHandler());
    this.app.use(ErrorMiddleware.errorHandler());
  }
}
