import { LogEntry, LogFormatter as ILogFormatter, LogLevel } from './LoggerInterface';

/**
 * JSON日志格式化器
 */
export class JsonLogFormatter implements ILogFormatter {
  format(entry: LogEntry): string {
    const logObject = {
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      source: entry.source,
      message: entry.message,
      context: entry.context,
      error: entry.error ? {
        message: entry.error.message,
        stack: entry.error.stack,
        name: entry.error.name
      } : undefined
    };

    return JSON.stringify(logObject);
  }
}

/**
 * 彩色控制台格式化器
 */
export class ColorConsoleFormatter implements ILogFormatter {
  private colors: Record<LogLevel, string> = {
    [LogLevel.ERROR]: '\x1b[31m', // 红色
    [LogLevel.WARN]: '\x1b[33m',  // 黄色
    [LogLevel.INFO]: '\x1b[32m',  // 绿色
    [LogLevel.DEBUG]: '\x1b[36m', // 青色
    [LogLevel.VERBOSE]: '\x1b[90m' // 灰色
  };

  private resetColor = '\x1b[0m';

  format(entry: LogEntry): string {
    const color = this.colors[entry.level];
    const { jobId, ...rest } = entry.context ?? {};

    // 任务ID取前8位，放在消息前
    const job = typeof jobId === 'string' ? `<${jobId.slice(0, 8)}> ` : '';
    const source = entry.source ? `[${entry.source}] ` : '';
    const head = `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(7)} ${source}${job}`;

    const lines = [`${color}${head}${entry.message}${this.resetColor}`];
    if (Object.keys(rest).length > 0) {
      lines[0] += ` ${JSON.stringify(rest)}`;
    }
    if (entry.error) {
      lines.push(`${color}${entry.error.name}: ${entry.error.message}${this.resetColor}`);
      if (entry.error.stack) {
        lines.push(entry.error.stack);
      }
    }

    return lines.join('\n');
  }
}
