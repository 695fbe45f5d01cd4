import { AppError, InvalidParameterError } from './AppError';
import { getLogger } from '../logging/LogManager';
import { ILogger } from '../logging/LoggerInterface';

/**
 * 错误处理选项
 */
export interface ErrorHandlerOptions {
  logError?: boolean;
  rethrow?: boolean;
  includeStack?: boolean;
}

/**
 * 错误响应体
 */
export interface ErrorResponseBody {
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: Record<string, unknown>;
    stack?: string;
  };
}

/**
 * 5xx 对外只暴露的通用信息，工具诊断只进日志
 */
export const GENERIC_SERVER_MESSAGE = 'Error processing video';

// multer 上传错误码
const UPLOAD_ERROR_CODES = new Set([
  'LIMIT_PART_COUNT',
  'LIMIT_FILE_SIZE',
  'LIMIT_FILE_COUNT',
  'LIMIT_FIELD_KEY',
  'LIMIT_FIELD_VALUE',
  'LIMIT_FIELD_COUNT',
  'LIMIT_UNEXPECTED_FILE'
]);

function readStringProperty(value: object, key: string): string | undefined {
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
}

/**
 * 错误处理器
 */
export class ErrorHandler {
  private static defaultOptions: ErrorHandlerOptions = {
    logError: true,
    rethrow: false,
    includeStack: process.env.NODE_ENV !== 'production'
  };

  /**
   * 处理错误
   */
  static handle(error: unknown, options: ErrorHandlerOptions = {}): AppError {
    const mergedOptions = { ...this.defaultOptions, ...options };
    const logger = getLogger('ErrorHandler');

    const appError = this.normalizeError(error);

    if (mergedOptions.logError) {
      this.logError(appError, logger);
    }

    if (mergedOptions.rethrow) {
      throw appError;
    }

    return appError;
  }

  /**
   * 规范化错误为AppError
   */
  static normalizeError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (error instanceof Error) {
      // multer 的 MulterError 带有 LIMIT_* 错误码，属于调用方错误
      const code = readStringProperty(error, 'code');
      if (code && UPLOAD_ERROR_CODES.has(code)) {
        return new InvalidParameterError(error.message, { uploadError: code }, error);
      }

      return new AppError(
        error.message,
        'INTERNAL_ERROR',
        500,
        false,
        { originalError: error.name },
        error
      );
    }

    if (typeof error === 'string') {
      return new AppError(error, 'INTERNAL_ERROR', 500, false);
    }

    if (error && typeof error === 'object') {
      const message = readStringProperty(error, 'message') ?? readStringProperty(error, 'error') ?? 'Unknown error';
      const code = readStringProperty(error, 'code') ?? 'INTERNAL_ERROR';
      const status: unknown = Reflect.get(error, 'statusCode') ?? Reflect.get(error, 'status');
      const statusCode = typeof status === 'number' ? status : 500;

      return new AppError(message, code, statusCode, false);
    }

    return new AppError('Unknown error occurred', 'UNKNOWN_ERROR', 500, false);
  }

  /**
   * 记录错误
   */
  private static logError(error: AppError, logger: ILogger): void {
    const logContext = {
      code: error.code,
      statusCode: error.statusCode,
      isOperational: error.isOperational,
      details: error.details
    };

    if (error.statusCode >= 500) {
      logger.error(`Server Error: ${error.message}`, logContext, error.cause ?? error);
    } else {
      logger.warn(`Client Error: ${error.message}`, logContext);
    }
  }

  /**
   * 创建错误响应
   * 服务端错误只返回通用信息，客户端错误返回具体信息和详情
   */
  static createErrorResponse(error: AppError, options: ErrorHandlerOptions = {}): ErrorResponseBody {
    const mergedOptions = { ...this.defaultOptions, ...options };
    const isServerError = error.statusCode >= 500;

    const response: ErrorResponseBody = {
      error: {
        message: isServerError ? GENERIC_SERVER_MESSAGE : error.message,
        code: error.code,
        statusCode: error.statusCode
      }
    };

    if (!isServerError && error.details && Object.keys(error.details).length > 0) {
      response.error.details = error.details;
    }

    if (mergedOptions.includeStack && error.stack) {
      response.error.stack = error.stack;
    }

    return response;
  }

  static isServerError(error: Error): boolean {
    return this.getStatusCode(error) >= 500;
  }

  static getStatusCode(error: Error): number {
    if (error instanceof AppError) {
      return error.statusCode;
    }
    return 500;
  }
}
