import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import path from 'path';

import type { AppConfig } from '@/config/env';
import { AppError, globalErrorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { generateRequestId, requestLogger } from '@/middleware/validation';
import { createApiRateLimits } from '@/middleware/rateLimit';

import { MarketService } from '@/services/market.service';
import { AnalysisService } from '@/services/analysis.service';
import { PriceCollector } from '@/services/collector.service';
import { CryptoCacheService } from '@/services/cache.service';
import { SystemStatusService } from '@/services/systemStatus.service';
import type { CacheStore } from '@/types/cache';

import MarketController from '@/controllers/market';
import SystemController from '@/controllers/system';
import PageController from '@/controllers/pages';
import { createApiRouter } from '@/routes/api';
import { createPageRouter } from '@/routes/pages';

export interface AppDependencies {
  config: Pick<AppConfig, 'allowedOrigins' | 'frontendDir' | 'rateLimitEnabled'>;
  market: MarketService;
  analysis: AnalysisService;
  collector: PriceCollector;
  cache: CryptoCacheService;
  status: SystemStatusService;
  // 限流计数存储
  rateLimitStore: CacheStore;
}

/**
 * 组装 Express 应用（不监听端口，测试直接使用）
 */
export const createApp = (deps: AppDependencies): express.Application => {
  const app = express();
  const { config } = deps;

  // 安全中间件
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", "data:"],
        connectSrc: ["'self'"],
      },
    },
  }));

  // CORS配置
  app.use(cors({
    origin: (origin, callback) => {
      // 允许无origin的请求（同源页面、curl、检查脚本）
      if (!origin) return callback(null, true);

      if (config.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new AppError('Not allowed by CORS', 403, 'CORS_NOT_ALLOWED'));
      }
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Origin', 'X-Requested-With', 'Content-Type', 'Accept', 'X-Request-ID'],
  }));

  // 基础中间件
  app.use(express.json({ limit: '1mb' }));

  // 自定义中间件
  app.use(generateRequestId);
  app.use(requestLogger);

  // 信任代理（用于获取真实IP）
  app.set('trust proxy', 1);

  // 静态文件服务
  const frontendDir = path.resolve(config.frontendDir);
  app.use('/static', express.static(path.join(frontendDir, 'static')));

  const marketController = new MarketController(deps.market, deps.analysis, deps.collector, deps.cache);
  const systemController = new SystemController(deps.status, deps.cache);
  const pageController = new PageController(frontendDir);
  const limits = createApiRateLimits(deps.rateLimitStore, config.rateLimitEnabled);

  // 注册路由
  app.use('/', createPageRouter(pageController));
  app.use('/api', createApiRouter(marketController, systemController, limits));

  // 404处理
  app.use(notFoundHandler);

  // 全局错误处理
  app.use(globalErrorHandler);

  return app;
};
