import * as path from 'path';
import { LogLevel, LogEntry, LoggerConfig, ILogger, LogContext, LogTransport } from './LoggerInterface';
import { ColorConsoleFormatter, JsonLogFormatter } from './LogFormatter';
import { ConsoleTransport, RotatingFileTransport } from './LogTransport';
import { AppConfig } from '../config/ConfigInterface';

/**
 * 日志级别数值映射
 */
const LogLevelValue: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
  [LogLevel.VERBOSE]: 4
};

/**
 * 主日志器实现
 */
export class Logger implements ILogger {
  private config: LoggerConfig;
  private context: LogContext;
  private source?: string;

  constructor(config: LoggerConfig, source?: string) {
    this.config = {
      level: config.level,
      transports: config.transports,
      context: config.context || {}
    };
    this.context = { ...this.config.context };
    this.source = source;
  }

  /**
   * 根据应用配置创建默认日志器
   */
  static createDefault(config: AppConfig, source?: string): Logger {
    const formatter = config.app.logFormat === 'json'
      ? new JsonLogFormatter()
      : new ColorConsoleFormatter();

    const transports: LogTransport[] = [new ConsoleTransport(formatter)];

    // 生产环境额外写轮转文件
    if (config.app.environment === 'production') {
      const logPath = path.join(config.storage.logPath, 'app.log');
      transports.push(new RotatingFileTransport(logPath, new JsonLogFormatter(), 10 * 1024 * 1024, 5));
    }

    return new Logger({ level: config.app.logLevel, transports }, source);
  }

  private shouldLog(level: LogLevel): boolean {
    return LogLevelValue[level] <= LogLevelValue[this.config.level];
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      context: { ...this.context, ...context },
      error,
      source: this.source
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        // 传输器失败不影响业务
        console.error(`Log transport failed: ${String(transportError)}`);
      }
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  verbose(message: string, context?: LogContext): void {
    this.log(LogLevel.VERBOSE, message, context);
  }

  /**
   * 创建子日志器，共享传输器，合并上下文
   */
  child(context: LogContext): ILogger {
    const { source, ...rest } = context;
    const childLogger = new Logger(this.config, typeof source === 'string' ? source : this.source);
    childLogger.context = { ...this.context, ...rest };
    return childLogger;
  }

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(transport => transport.flush?.()));
  }

  async close(): Promise<void> {
    await Promise.all(this.config.transports.map(transport => transport.close?.()));
  }
}
