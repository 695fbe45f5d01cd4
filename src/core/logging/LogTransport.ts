import * as fs from 'fs';
import * as path from 'path';
import { LogEntry, LogTransport as ILogTransport, LogFormatter, LogLevel } from './LoggerInterface';

/**
 * 控制台传输器
 */
export class ConsoleTransport implements ILogTransport {
  constructor(private readonly formatter: LogFormatter) {}

  write(entry: LogEntry): void {
    const formatted = this.formatter.format(entry);

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.INFO:
        console.info(formatted);
        break;
      default:
        console.debug(formatted);
    }
  }
}

/**
 * 轮转文件传输器
 * app.log 写满后依次写入 app.1.log、app.2.log ...，只保留最新的 maxFiles 个文件
 */
export class RotatingFileTransport implements ILogTransport {
  private basePath: string;
  private maxSize: number;
  private maxFiles: number;
  private currentSize = 0;
  private currentFileIndex = 0;
  private currentStream: fs.WriteStream | null = null;
  private formatter: LogFormatter;

  constructor(basePath: string, formatter: LogFormatter, maxSize: number = 10 * 1024 * 1024, maxFiles: number = 5) {
    this.basePath = basePath;
    this.maxSize = maxSize;
    this.maxFiles = maxFiles;
    this.formatter = formatter;

    fs.mkdirSync(path.dirname(basePath), { recursive: true });

    this.initializeCurrentFile();
  }

  private get baseName(): string {
    return path.basename(this.basePath, '.log');
  }

  private indexOf(fileName: string): number {
    const match = fileName.match(new RegExp(`^${this.baseName}\\.(\\d+)\\.log$`));
    return match ? parseInt(match[1], 10) : 0;
  }

  private listLogFiles(): string[] {
    const dir = path.dirname(this.basePath);
    return fs.readdirSync(dir)
      .filter(file => file.startsWith(this.baseName) && file.endsWith('.log'));
  }

  private initializeCurrentFile(): void {
    const indices = this.listLogFiles().map(file => this.indexOf(file));
    this.currentFileIndex = indices.length > 0 ? Math.max(...indices) : 0;
    this.openCurrentFile();

    if (this.currentSize >= this.maxSize) {
      this.currentFileIndex++;
      this.openCurrentFile();
    }
  }

  private openCurrentFile(): void {
    const filePath = this.getCurrentFilePath();

    if (this.currentStream) {
      this.currentStream.end();
    }

    this.currentStream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });

    try {
      this.currentSize = fs.statSync(filePath).size;
    } catch {
      // 新文件尚未落盘
      this.currentSize = 0;
    }
  }

  private getCurrentFilePath(): string {
    if (this.currentFileIndex === 0) {
      return this.basePath;
    }
    return path.join(path.dirname(this.basePath), `${this.baseName}.${this.currentFileIndex}.log`);
  }

  private rotateIfNeeded(): void {
    if (this.currentSize >= this.maxSize) {
      this.currentFileIndex++;
      this.openCurrentFile();
      this.cleanupOldFiles();
    }
  }

  private cleanupOldFiles(): void {
    const dir = path.dirname(this.basePath);
    const files = this.listLogFiles().sort((a, b) => this.indexOf(b) - this.indexOf(a));

    for (const file of files.slice(this.maxFiles)) {
      const filePath = path.join(dir, file);
      try {
        fs.unlinkSync(filePath);
      } catch (error) {
        console.warn(`Failed to delete old log file: ${filePath}`, error);
      }
    }
  }

  write(entry: LogEntry): void {
    const line = this.formatter.format(entry) + '\n';

    this.rotateIfNeeded();

    if (this.currentStream) {
      this.currentStream.write(line, 'utf8');
      this.currentSize += Buffer.byteLength(line, 'utf8');
    }
  }

  async flush(): Promise<void> {
    const stream = this.currentStream;
    if (!stream) {
      return;
    }
    await new Promise<void>((resolve) => {
      stream.write('', () => resolve());
    });
  }

  async close(): Promise<void> {
    const stream = this.currentStream;
    if (!stream) {
      return;
    }
    await new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
    this.currentStream = null;
  }
}
