/**
 * 应用错误基类
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.cause = cause;

    // 保持正确的堆栈跟踪
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // 如果有原因错误，合并堆栈
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * 转换为JSON对象
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      details: this.details,
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack
      } : undefined
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * 参数错误（截图数量、画质、文件类型等调用方错误）
 */
export class InvalidParameterError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'INVALID_PARAMETER', 400, true, details, cause);
  }
}

/**
 * 配置错误
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'CONFIGURATION_ERROR', 500, true, details, cause);
  }
}

/**
 * 资源未找到错误
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'NOT_FOUND_ERROR', 404, true, details, cause);
  }
}

/**
 * 媒体不可处理：探测成功但时长无效（损坏文件、纯音频等）
 */
export class UnprocessableMediaError extends AppError {
  constructor(
    message: string = 'Media cannot be processed',
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'UNPROCESSABLE_MEDIA', 422, true, details, cause);
  }
}

/**
 * 时长探测失败（ffprobe退出码非0或输出非数字）
 */
export class ProbeError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'PROBE_ERROR', 500, true, details, cause);
  }
}

/**
 * 截帧失败（ffmpeg退出码非0或未生成文件）
 */
export class ExtractionError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'EXTRACTION_ERROR', 500, true, details, cause);
  }
}

/**
 * 文件系统资源错误（工作目录创建失败、磁盘耗尽等）
 */
export class ResourceError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'RESOURCE_ERROR', 500, true, details, cause);
  }
}

/**
 * 外部进程超时
 */
export class TimeoutError extends AppError {
  constructor(
    message: string = 'Operation timeout',
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'TIMEOUT_ERROR', 504, true, details, cause);
  }
}
