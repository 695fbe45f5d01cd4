/**
 * 日志级别
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  VERBOSE = 'verbose'
}

export type LogContext = Record<string, unknown>;

/**
 * 日志条目
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: Error;
  source?: string;
}

/**
 * 日志格式化器接口
 */
export interface LogFormatter {
  format(entry: LogEntry): string;
}

/**
 * 日志传输器接口
 */
export interface LogTransport {
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

/**
 * 日志配置
 */
export interface LoggerConfig {
  level: LogLevel;
  transports: LogTransport[];
  context?: LogContext;
}

/**
 * 日志器接口
 */
export interface ILogger {
  error(message: string, context?: LogContext, error?: Error): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  verbose(message: string, context?: LogContext): void;
  child(context: LogContext): ILogger;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * 判断字符串是否为合法日志级别
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.values(LogLevel).some(level => level === value);
}
