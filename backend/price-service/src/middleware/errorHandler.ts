import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '@/utils/logger';

// 自定义错误类
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number = 500, errorCode: string = 'INTERNAL_ERROR', isOperational: boolean = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

// 业务错误类
export class BusinessError extends AppError {
  constructor(message: string, errorCode: string = 'BUSINESS_ERROR') {
    super(message, 400, errorCode);
  }
}

// 资源未找到错误类
export class NotFoundError extends AppError {
  constructor(resource: string = '资源') {
    super(`${resource}未找到`, 404, 'RESOURCE_NOT_FOUND');
  }
}

export interface FieldError {
  field: string;
  code: string;
  message: string;
}

// 验证错误类
export class ValidationError extends AppError {
  public readonly errors: FieldError[];

  constructor(errors: FieldError[], message: string = '数据验证失败') {
    super(message, 422, 'VALIDATION_ERROR');
    this.errors = errors;
  }
}

// 依赖服务（数据库/缓存）不可用
export class ServiceUnavailableError extends AppError {
  constructor(service: string) {
    super(`${service}服务不可用`, 503, 'SERVICE_UNAVAILABLE');
  }
}

// 第三方行情API错误
export class ExternalApiError extends AppError {
  public readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number) {
    super(message, 502, 'EXTERNAL_API_ERROR');
    this.upstreamStatus = upstreamStatus;
  }
}

interface ErrorResponse {
  success: false;
  code: number;
  message: string;
  error_code: string;
  timestamp: string;
  request_id?: string | string[];
  errors?: FieldError[];
  stack?: string;
}

/**
 * 未捕获异常处理
 */
export const handleUncaughtException = (error: Error): void => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
};

/**
 * 未处理的Promise拒绝
 */
export const handleUnhandledRejection = (reason: unknown): void => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
};

/**
 * 404错误处理中间件
 */
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
  next(new NotFoundError(`路径 ${req.originalUrl} `));
};

const isJsonParseError = (error: Error): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

/**
 * 全局错误处理中间件
 */
export const globalErrorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express 依靠四个参数识别错误处理中间件
  _next: NextFunction
): void => {
  let appError: AppError;

  if (error instanceof AppError) {
    appError = error;
  } else if (isJsonParseError(error)) {
    appError = new BusinessError('JSON格式错误，请检查请求体', 'JSON_PARSE_ERROR');
  } else {
    logger.error('Unhandled error:', {
      name: error.name,
      message: error.message,
      stack: error.stack,
      path: req.path,
      method: req.method,
      query: req.query,
    });

    appError = new AppError(
      process.env.NODE_ENV === 'production' ? '服务器内部错误' : error.message,
      500,
      'INTERNAL_SERVER_ERROR'
    );
  }

  if (appError.statusCode >= 500) {
    logger.error('Server error:', {
      error: appError.message,
      errorCode: appError.errorCode,
      statusCode: appError.statusCode,
      stack: appError.stack,
      path: req.path,
      method: req.method,
    });
  } else {
    logger.warn('Client error:', {
      error: appError.message,
      errorCode: appError.errorCode,
      statusCode: appError.statusCode,
      path: req.path,
      method: req.method,
    });
  }

  const response: ErrorResponse = {
    success: false,
    code: appError.statusCode,
    message: appError.message,
    error_code: appError.errorCode,
    timestamp: new Date().toISOString(),
    request_id: req.headers['x-request-id'],
  };

  if (appError instanceof ValidationError) {
    response.errors = appError.errors;
  }

  if (process.env.NODE_ENV === 'development' && appError.stack) {
    response.stack = appError.stack;
  }

  res.status(appError.statusCode).json(response);
};

/**
 * 异步错误包装器
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

/**
 * 错误信息提取（日志与检查报告共用）
 */
export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
