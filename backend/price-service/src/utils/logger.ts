import winston from 'winston';
import path from 'path';
import type { Request, Response } from 'express';

// 日志级别
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// 日志颜色
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

// 控制台格式
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const scope = info.scope ? `[${info.scope}] ` : '';
    if (info.stack) {
      return `${info.timestamp} ${info.level}: ${scope}${info.message}\n${info.stack}`;
    }
    return `${info.timestamp} ${info.level}: ${scope}${info.message}`;
  })
);

// 文件日志格式（不包含颜色）
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const env = process.env.NODE_ENV || 'development';
const isTest = env === 'test';

const level = (): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return env === 'development' ? 'debug' : 'info';
};

const logDir = path.join(process.cwd(), 'logs');

const transports: winston.transport[] = [];

if (env !== 'production' || process.env.LOG_TO_CONSOLE === 'true') {
  transports.push(
    new winston.transports.Console({
      level: level(),
      format,
    })
  );
}

// 测试环境不写日志文件
if (!isTest) {
  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      format: fileFormat,
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: level(),
  levels,
  format: fileFormat,
  transports,
  silent: isTest,
  exitOnError: false,
});

// HTTP访问日志
export const httpLogger = winston.createLogger({
  level: 'http',
  levels,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  silent: isTest,
  transports: isTest
    ? [new winston.transports.Console()]
    : [
        new winston.transports.File({
          filename: path.join(logDir, 'access.log'),
          maxsize: 5242880,
          maxFiles: 5,
        }),
      ],
});

export { logger };

/**
 * 模块专用logger，日志行带上模块前缀
 */
export const getLogger = (scope: string): winston.Logger => logger.child({ scope });

export const logRequest = (req: Request, res: Response, responseTime?: number): void => {
  const logData = {
    method: req.method,
    url: req.originalUrl,
    status: res.statusCode,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
    responseTime: responseTime !== undefined ? `${responseTime}ms` : undefined,
    requestId: req.headers['x-request-id'],
  };

  if (res.statusCode >= 400) {
    logger.warn('HTTP Request Error', logData);
  } else {
    httpLogger.http('HTTP Request', logData);
  }
};

export const logSystemInfo = (): void => {
  logger.info('System Information', {
    nodeVersion: process.version,
    platform: process.platform,
    arch: process.arch,
    memory: process.memoryUsage(),
    uptime: process.uptime(),
  });
};
