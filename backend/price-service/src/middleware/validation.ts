import type { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { type FieldError, ValidationError } from '@/middleware/errorHandler';
import { logger, logRequest } from '@/utils/logger';

const validationOptions: Joi.ValidationOptions = {
  abortEarly: false,
  stripUnknown: true,
  convert: true,
};

export const toFieldErrors = (error: Joi.ValidationError): FieldError[] =>
  error.details.map(detail => ({
    field: detail.path.join('.'),
    code: detail.type.toUpperCase().replace(/\./g, '_'),
    message: detail.message,
  }));

/**
 * 校验并转换查询参数，失败抛出 ValidationError（422）
 */
export const parseQuery = <T>(schema: Joi.ObjectSchema<T>, req: Request): T => {
  const { error, value } = schema.validate(req.query, validationOptions);

  if (error) {
    const errors = toFieldErrors(error);
    logger.warn('Query parameters validation failed:', {
      path: req.path,
      method: req.method,
      errors,
      query: req.query,
    });
    throw new ValidationError(errors, '查询参数验证失败');
  }

  return value;
};

/**
 * 校验请求体，返回 Joi 结果由调用方决定错误类型
 */
export const checkBody = <T>(schema: Joi.ObjectSchema<T>, req: Request): Joi.ValidationResult<T> => {
  const result = schema.validate(req.body ?? {}, validationOptions);
  if (result.error) {
    logger.warn('Request body validation failed:', {
      path: req.path,
      method: req.method,
      errors: toFieldErrors(result.error),
    });
  }
  return result;
};

/**
 * 请求ID生成中间件
 */
export const generateRequestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.length > 0
    ? incoming
    : `req_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;

  req.headers['x-request-id'] = requestId;
  res.set('X-Request-ID', requestId);

  next();
};

/**
 * 请求日志中间件
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  logger.debug('Request started', {
    method: req.method,
    path: req.path,
    query: req.query,
    ip: req.ip,
    requestId: req.headers['x-request-id'],
  });

  res.on('finish', () => {
    logRequest(req, res, Date.now() - startTime);
  });

  next();
};
