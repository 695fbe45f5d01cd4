import { Logger } from './Logger';
import { ColorConsoleFormatter, JsonLogFormatter } from './LogFormatter';
import { LogEntry, LogLevel, LogTransport, isLogLevel } from './LoggerInterface';

class MemoryTransport implements LogTransport {
  entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

describe('Logger', () => {
  let transport: MemoryTransport;

  beforeEach(() => {
    transport = new MemoryTransport();
  });

  it('低于配置级别的日志被丢弃', () => {
    const logger = new Logger({ level: LogLevel.WARN, transports: [transport] }, 'Test');

    logger.error('e');
    logger.warn('w');
    logger.info('i');
    logger.debug('d');
    logger.verbose('v');

    expect(transport.entries.map(entry => entry.level)).toEqual([LogLevel.ERROR, LogLevel.WARN]);
  });

  it('子日志器合并上下文并可替换来源', () => {
    const logger = new Logger({ level: LogLevel.DEBUG, transports: [transport], context: { service: 'screenshots' } });

    const jobLogger = logger.child({ source: 'ScreenshotJobProcessor' }).child({ jobId: 'job-1' });
    jobLogger.info('开始处理截图任务', { count: 3 });

    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]).toMatchObject({
      level: LogLevel.INFO,
      message: '开始处理截图任务',
      source: 'ScreenshotJobProcessor',
      context: { service: 'screenshots', jobId: 'job-1', count: 3 }
    });
  });

  it('传输器抛错不影响调用方', () => {
    const failing: LogTransport = {
      write: () => {
        throw new Error('disk full');
      }
    };
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger({ level: LogLevel.INFO, transports: [failing, transport] });

    expect(() => logger.info('still logged')).not.toThrow();
    expect(transport.entries).toHaveLength(1);
    expect(consoleError).toHaveBeenCalledWith('Log transport failed: Error: disk full');

    consoleError.mockRestore();
  });
});

describe('LogFormatter', () => {
  const entry: LogEntry = {
    timestamp: new Date('2024-05-01T08:30:00.000Z'),
    level: LogLevel.WARN,
    message: 'Client Error: Unsupported file format',
    context: { statusCode: 400 },
    source: 'ErrorMiddleware'
  };

  it('ColorConsoleFormatter输出带颜色的单行文本', () => {
    expect(new ColorConsoleFormatter().format(entry))
      .toBe('\x1b[33m2024-05-01T08:30:00.000Z WARN    [ErrorMiddleware] Client Error: Unsupported file format\x1b[0m {"statusCode":400}');
  });

  it('ColorConsoleFormatter把jobId放到消息前', () => {
    const jobEntry: LogEntry = {
      timestamp: new Date('2024-05-01T08:30:00.000Z'),
      level: LogLevel.INFO,
      message: '截图完成',
      context: { jobId: 'e047f009-1540-4aab-9c47-ed3d2326c4e2', count: 3 },
      source: 'ScreenshotJobProcessor'
    };

    expect(new ColorConsoleFormatter().format(jobEntry))
      .toBe('\x1b[32m2024-05-01T08:30:00.000Z INFO    [ScreenshotJobProcessor] <e047f009> 截图完成\x1b[0m {"count":3}');
  });

  it('ColorConsoleFormatter在错误后附加堆栈', () => {
    const error = new Error('ffprobe exited with code 1');
    error.stack = 'Error: ffprobe exited with code 1\n    at probe';

    expect(new ColorConsoleFormatter().format({ ...entry, level: LogLevel.ERROR, context: undefined, error }))
      .toBe([
        '\x1b[31m2024-05-01T08:30:00.000Z ERROR   [ErrorMiddleware] Client Error: Unsupported file format\x1b[0m',
        '\x1b[31mError: ffprobe exited with code 1\x1b[0m',
        'Error: ffprobe exited with code 1\n    at probe'
      ].join('\n'));
  });

  it('JsonLogFormatter输出JSON', () => {
    expect(JSON.parse(new JsonLogFormatter().format(entry))).toEqual({
      timestamp: '2024-05-01T08:30:00.000Z',
      level: 'warn',
      source: 'ErrorMiddleware',
      message: 'Client Error: Unsupported file format',
      context: { statusCode: 400 }
    });
  });
});

describe('isLogLevel', () => {
  it('只接受已定义的级别', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
