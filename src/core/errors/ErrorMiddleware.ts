import { NextFunction, Request, RequestHandler, Response, ErrorRequestHandler } from 'express';
import { NotFoundError } from './AppError';
import { ErrorHandler } from './ErrorHandler';
import { getLogger } from '../logging/LogManager';

/**
 * Express错误处理中间件
 */
export class ErrorMiddleware {
  /**
   * 错误处理中间件
   */
  static errorHandler(): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const logger = getLogger('ErrorMiddleware');

      const appError = ErrorHandler.normalizeError(error);

      const logContext = {
        method: req.method,
        url: req.originalUrl,
        ip: req.ip,
        errorCode: appError.code,
        statusCode: appError.statusCode,
        isOperational: appError.isOperational,
        details: appError.details
      };

      if (ErrorHandler.isServerError(appError)) {
        logger.error(`Server Error: ${appError.message}`, logContext, appError.cause ?? appError);
      } else {
        logger.warn(`Client Error: ${appError.message}`, logContext);
      }

      // 响应已开始发送（例如压缩包流中途出错）时只能断开连接
      if (res.headersSent) {
        res.destroy();
        return;
      }

      const includeStack = process.env.NODE_ENV === 'development';
      const errorResponse = ErrorHandler.createErrorResponse(appError, { includeStack });

      res.status(appError.statusCode).json(errorResponse);
    };
  }

  /**
   * 404处理中间件
   */
  static notFoundHandler(): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
      next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
    };
  }

  /**
   * 异步错误包装器
   */
  static wrapAsync(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      fn(req, res, next).catch(next);
    };
  }

  /**
   * 跨域中间件：允许任意来源
   */
  static cors(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      res.setHeader('Access-Control-Allow-Origin', '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET,POST,DELETE,OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', req.get('access-control-request-headers') ?? 'Content-Type');

      if (req.method === 'OPTIONS') {
        res.sendStatus(204);
        return;
      }

      next();
    };
  }

  /**
   * 请求日志中间件
   */
  static requestLogger(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const logger = getLogger('RequestLogger');
      const startTime = Date.now();

      logger.debug(`Request started: ${req.method} ${req.originalUrl}`, {
        method: req.method,
        url: req.originalUrl,
        ip: req.ip
      });

      res.on('finish', () => {
        const duration = Date.now() - startTime;
        const context = {
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration: `${duration}ms`
        };

        if (res.statusCode >= 400) {
          logger.warn(`Request completed: ${req.method} ${req.originalUrl}`, context);
        } else {
          logger.info(`Request completed: ${req.method} ${req.originalUrl}`, context);
        }
      });

      next();
    };
  }
}
