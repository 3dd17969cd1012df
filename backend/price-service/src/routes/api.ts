import { Router } from 'express';
import { asyncHandler } from '@/middleware/errorHandler';
import type { ApiRateLimits } from '@/middleware/rateLimit';
import MarketController from '@/controllers/market';
import SystemController from '@/controllers/system';

export const createApiRouter = (
  market: MarketController,
  system: SystemController,
  limits: ApiRateLimits
): Router => {
  const router = Router();

  // 健康检查与系统状态
  router.get('/health', asyncHandler(system.health));
  router.get('/system/status', asyncHandler(system.systemStatus));

  // 行情数据
  router.get('/latest_prices', limits.latestPrices, asyncHandler(market.latestPrices));
  router.get('/price_history', limits.priceHistory, asyncHandler(market.priceHistory));
  router.get('/chart_data', limits.chartData, asyncHandler(market.chartData));
  router.get('/btc_data', limits.seriesData, asyncHandler(market.btcData));
  router.get('/eth_data', limits.seriesData, asyncHandler(market.ethData));
  router.get('/kline_data', limits.klineData, asyncHandler(market.klineData));

  // 分析报告
  router.get('/analysis_report', limits.analysis, asyncHandler(market.analysisReport));
  router.get('/analysis', limits.analysis, asyncHandler(market.analysisReport));

  router.post('/refresh_charts', limits.refreshCharts, asyncHandler(market.refreshCharts));

  // 缓存管理
  router.get('/cache/status', asyncHandler(system.cacheStats));
  router.get('/cache/stats', asyncHandler(system.cacheStats));
  router.post('/cache/clear', asyncHandler(system.cacheClear));

  return router;
};
