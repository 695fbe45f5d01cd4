import { Logger } from './Logger';
import { ILogger, LogContext } from './LoggerInterface';
import { AppConfig } from '../config/ConfigInterface';

/**
 * 未初始化时使用的控制台日志器
 */
class ConsoleFallbackLogger implements ILogger {
  constructor(private readonly source: string, private readonly context: LogContext = {}) {}

  private prefix(level: string): string {
    return `[${level}] ${this.source}:`;
  }

  private extra(context?: LogContext): unknown[] {
    const merged = { ...this.context, ...context };
    return Object.keys(merged).length > 0 ? [merged] : [];
  }

  error(message: string, context?: LogContext, error?: Error): void {
    console.error(this.prefix('ERROR'), message, ...this.extra(context), ...(error ? [error] : []));
  }

  warn(message: string, context?: LogContext): void {
    console.warn(this.prefix('WARN'), message, ...this.extra(context));
  }

  info(message: string, context?: LogContext): void {
    console.log(this.prefix('INFO'), message, ...this.extra(context));
  }

  debug(message: string, context?: LogContext): void {
    console.debug(this.prefix('DEBUG'), message, ...this.extra(context));
  }

  verbose(message: string, context?: LogContext): void {
    console.debug(this.prefix('VERBOSE'), message, ...this.extra(context));
  }

  child(context: LogContext): ILogger {
    return new ConsoleFallbackLogger(this.source, { ...this.context, ...context });
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {}
}

/**
 * 日志管理器
 * 提供全局日志器访问
 */
export class LogManager {
  private static defaultLogger: ILogger | null = null;
  private static loggers: Map<string, ILogger> = new Map();

  /**
   * 初始化默认日志器
   */
  static initialize(config: AppConfig): void {
    if (this.defaultLogger) {
      return;
    }

    this.defaultLogger = Logger.createDefault(config);
    this.loggers.clear();
    this.defaultLogger.info('LogManager initialized', { level: config.app.logLevel });
  }

  static isInitialized(): boolean {
    return this.defaultLogger !== null;
  }

  /**
   * 获取指定源的日志器
   */
  static getLoggerFor(source: string): ILogger {
    if (!this.defaultLogger) {
      return new ConsoleFallbackLogger(source);
    }

    let logger = this.loggers.get(source);
    if (!logger) {
      logger = this.defaultLogger.child({ source });
      this.loggers.set(source, logger);
    }

    return logger;
  }

  /**
   * 关闭所有日志器
   */
  static async closeAll(): Promise<void> {
    if (this.defaultLogger) {
      // 子日志器与默认日志器共享传输器
      await this.defaultLogger.flush();
      await this.defaultLogger.close();
    }
    this.loggers.clear();
    this.defaultLogger = null;
  }
}

/**
 * 获取日志器，LogManager初始化前返回控制台日志器
 */
export function getLogger(source?: string): ILogger {
  return LogManager.getLoggerFor(source || 'default');
}
