import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CacheStore } from '@/types/cache';
import { logger } from '@/utils/logger';

interface RateLimitOptions {
  windowMs: number; // 时间窗口（毫秒）
  maxRequests: number; // 窗口内最大请求次数
  name: string; // 限流分组，用于生成key
  message?: string;
  keyGenerator?: (req: Request) => string;
}

/**
 * 通用限流中间件工厂（Redis 计数，固定窗口）
 *
 * Redis 不可用时放行请求。
 */
export const createRateLimit = (store: CacheStore, options: RateLimitOptions): RequestHandler => {
  const {
    windowMs,
    maxRequests,
    name,
    message = '请求过于频繁，请稍后再试',
    keyGenerator = (req: Request) => req.ip || 'unknown',
  } = options;

  const windowSeconds = Math.ceil(windowMs / 1000);

  return async (req: Request, res: Response, next: NextFunction) => {
    let current: number;
    let ttl: number;
    const key = `rate_limit:${name}:${keyGenerator(req)}`;

    try {
      current = await store.incr(key);
      if (current === 1) {
        await store.expire(key, windowSeconds);
      }
      ttl = await store.ttl(key);
    } catch (error) {
      logger.error('Rate limit middleware error:', error);
      return next();
    }

    const retryAfter = ttl > 0 ? ttl : windowSeconds;

    res.set({
      'X-RateLimit-Limit': maxRequests.toString(),
      'X-RateLimit-Remaining': Math.max(0, maxRequests - current).toString(),
      'X-RateLimit-Reset': new Date(Date.now() + retryAfter * 1000).toISOString(),
    });

    if (current > maxRequests) {
      logger.warn('Rate limit exceeded', {
        key,
        current,
        limit: maxRequests,
        ip: req.ip,
        path: req.path,
      });

      res.set('Retry-After', retryAfter.toString());
      res.status(429).json({
        success: false,
        code: 429,
        message,
        error_code: 'RATE_LIMIT_EXCEEDED',
        retry_after: retryAfter,
        timestamp: new Date().toISOString(),
        request_id: req.headers['x-request-id'],
      });
      return;
    }

    next();
  };
};

export interface ApiRateLimits {
  latestPrices: RequestHandler;
  priceHistory: RequestHandler;
  chartData: RequestHandler;
  seriesData: RequestHandler;
  klineData: RequestHandler;
  analysis: RequestHandler;
  refreshCharts: RequestHandler;
}

const passThrough: RequestHandler = (_req, _res, next) => next();

const perMinute = (store: CacheStore, name: string, maxRequests: number): RequestHandler =>
  createRateLimit(store, { name, windowMs: 60 * 1000, maxRequests });

/**
 * 各API的限流配置（每分钟）
 */
export const createApiRateLimits = (store: CacheStore, enabled: boolean): ApiRateLimits => {
  if (!enabled) {
    return {
      latestPrices: passThrough,
      priceHistory: passThrough,
      chartData: passThrough,
      seriesData: passThrough,
      klineData: passThrough,
      analysis: passThrough,
      refreshCharts: passThrough,
    };
  }

  return {
    latestPrices: perMinute(store, 'latest_prices', 30),
    priceHistory: perMinute(store, 'price_history', 20),
    chartData: perMinute(store, 'chart_data', 20),
    seriesData: perMinute(store, 'series_data', 15),
    klineData: perMinute(store, 'kline_data', 10),
    analysis: perMinute(store, 'analysis', 10),
    refreshCharts: perMinute(store, 'refresh_charts', 5),
  };
};
