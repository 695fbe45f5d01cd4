#!/usr/bin/env node

import { ScreenshotService } from '../services/screenshot/ScreenshotService';
import { LogManager, getLogger } from '../core/logging/LogManager';
import { ILogger } from '../core/logging/LoggerInterface';
import { ConfigProvider } from '../core/config/ConfigProvider';
import { AppConfig } from '../core/config/ConfigInterface';
import { ErrorHandler } from '../core/errors/ErrorHandler';

export interface CommandLineOptions {
  port?: number;
  host?: string;
  config?: string;
  help?: boolean;
}

/**
 * 主应用程序
 */
class MainApplication {
  private logger: ILogger = getLogger('MainApplication');
  private service: ScreenshotService | null = null;
  private isShuttingDown = false;

  /**
   * 启动应用程序
   */
  async start(options: CommandLineOptions = {}): Promise<void> {
    try {
      const config = await ConfigProvider.initialize(options.config ? { configPath: options.config } : undefined);

      // 命令行参数优先于配置文件与环境变量
      this.applyOptions(config, options);

      LogManager.initialize(config);
      this.logger = getLogger('MainApplication');
      this.logger.info('正在启动视频截图服务...');

      this.setupGracefulShutdown();

      this.service = new ScreenshotService(config);
      await this.service.start();

      this.logApplicationInfo(config);
    } catch (error) {
      const appError = ErrorHandler.handle(error, { logError: false });
      this.logger.error(`应用程序启动失败: ${appError.message}`, { code: appError.code, details: appError.details }, appError);
      await this.shutdown(1);
    }
  }

  /**
   * 停止应用程序
   */
  async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('正在停止应用程序...');

    try {
      await this.service?.stop();
      this.logger.info('应用程序已停止');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`停止应用程序时出错: ${message}`, {}, error instanceof Error ? error : undefined);
    } finally {
      await LogManager.closeAll();
    }
  }

  private applyOptions(config: AppConfig, options: CommandLineOptions): void {
    if (options.port !== undefined) {
      config.server.port = options.port;
      this.logger.info(`命令行参数：端口设置为 ${options.port}`);
    }

    if (options.host !== undefined) {
      config.server.host = options.host;
      this.logger.info(`命令行参数：主机设置为 ${options.host}`);
    }
  }

  /**
   * 设置优雅关闭处理
   */
  private setupGracefulShutdown(): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

    for (const signal of signals) {
      process.once(signal, () => {
        this.logger.info(`收到 ${signal} 信号，正在优雅关闭...`);
        void this.shutdown(0);
      });
    }

    process.on('uncaughtException', (error: Error) => {
      this.logger.error(`未捕获的异常: ${error.message}`, {}, error);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error(`未处理的Promise拒绝: ${String(reason)}`, {}, reason instanceof Error ? reason : undefined);
    });
  }

  private async shutdown(exitCode: number): Promise<void> {
    await this.stop();
    process.exit(exitCode);
  }

  private logApplicationInfo(config: AppConfig): void {
    this.logger.info('==================================================');
    this.logger.info(`${config.app.name} ${config.app.version}`);
    this.logger.info(`环境: ${config.app.environment}`);
    this.logger.info(`日志级别: ${config.app.logLevel}`);
    this.logger.info(`配置文件: ${ConfigProvider.getConfigPath() ?? '(默认值)'}`);
    this.logger.info(`任务目录: ${config.storage.tempPath}`);
    this.logger.info('==================================================');
  }
}

/**
 * 解析命令行参数
 */
export function parseCommandLineArgs(rawArgs: string[]): CommandLineOptions {
  const options: CommandLineOptions = {};

  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    const nextArg = rawArgs[i + 1];
    const hasValue = nextArg !== undefined && !nextArg.startsWith('--');

    switch (arg) {
      case '--port':
        if (hasValue) {
          const port = parseInt(nextArg, 10);
          if (Number.isInteger(port) && port >= 0 && port <= 65535) {
            options.port = port;
          }
          i++; // 跳过下一个参数
        }
        break;
      case '--host':
        if (hasValue) {
          options.host = nextArg;
          i++;
        }
        break;
      case '--config':
        if (hasValue) {
          options.config = nextArg;
          i++;
        }
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
    }
  }

  return options;
}

/**
 * 显示帮助信息
 */
function showHelp(): void {
  console.log(`
视频截图服务

用法:
  node dist/app/main.js [选项]

选项:
  --port <端口>       设置服务端口（默认: 8000）
  --host <主机>       设置服务主机（默认: 0.0.0.0）
  --config <路径>     指定配置文件
  --help              显示此帮助信息

端点:
  POST   /screenshots?num_screenshots=10&quality=2   上传视频（字段 video）
  DELETE /screenshots/:jobId                         删除任务（static 交付方式）
  GET    /files/:jobId/:filename                     下载截图（static 交付方式）
  GET    /health                                     健康检查
  `);
}

async function main(): Promise<void> {
  const options = parseCommandLineArgs(process.argv.slice(2));

  if (options.help) {
    showHelp();
    return;
  }

  const app = new MainApplication();
  await app.start(options);
}

// 启动应用程序
if (require.main === module) {
  main().catch(error => {
    console.error('应用程序错误:', error);
    process.exit(1);
  });
}

export { MainApplication };
