import { config } from '@/config/env';
import { db } from '@/config/database';
import { redis } from '@/config/redis';
import { createPostgresPriceRepository } from '@/repositories/postgres/price-repository';
import { CryptoCacheService } from '@/services/cache.service';
import { MarketService } from '@/services/market.service';
import { AnalysisService } from '@/services/analysis.service';
import { PriceCollector } from '@/services/collector.service';
import { BinanceMarketClient } from '@/services/marketApi.service';
import { SystemStatusService } from '@/services/systemStatus.service';
import { type DailyTask, type IntervalTask, TaskScheduler } from '@/services/scheduler.service';

export interface Services {
  cache: CryptoCacheService;
  market: MarketService;
  analysis: AnalysisService;
  collector: PriceCollector;
  status: SystemStatusService;
}

/**
 * 基于数据库与Redis单例组装服务
 */
export const createServices = (): Services => {
  const repository = createPostgresPriceRepository(db.getClient());
  const cache = new CryptoCacheService(redis, {
    priceTtlSeconds: config.cache.ttlSeconds,
    chartTtlSeconds: config.cache.chartTtlSeconds,
  });
  const source = new BinanceMarketClient(config.priceApi.baseUrl, config.priceApi.timeoutMs);

  return {
    cache,
    market: new MarketService(repository, cache),
    analysis: new AnalysisService(repository, cache),
    collector: new PriceCollector(source, repository, cache),
    status: new SystemStatusService(db, redis),
  };
};

/**
 * 定时任务：实时报价、K线采集、分析报告，以及每日凌晨2点全量更新
 *
 * 全量更新复用 history / analysis 任务名执行，与对应的定时任务互不重叠。
 */
export const createScheduler = ({ collector, analysis }: Pick<Services, 'collector' | 'analysis'>): TaskScheduler => {
  const collectHistory = () => collector.collectHistory();
  const refreshReport = () => analysis.refreshReport();

  const intervalTasks: IntervalTask[] = [
    {
      name: 'realtime',
      intervalMs: config.scheduler.realtimeIntervalSeconds * 1000,
      run: () => collector.collectRealtime(),
      runOnStart: true,
    },
    {
      name: 'history',
      intervalMs: config.scheduler.updateIntervalSeconds * 1000,
      run: collectHistory,
      runOnStart: true,
    },
    {
      name: 'analysis',
      intervalMs: 60 * 60 * 1000,
      run: refreshReport,
    },
  ];

  const dailyTasks: DailyTask[] = [
    {
      name: 'daily-full-update',
      at: '02:00',
      run: async () => {
        await scheduler.trigger('history', collectHistory);
        await scheduler.trigger('analysis', refreshReport);
      },
    },
  ];

  const scheduler = new TaskScheduler(intervalTasks, dailyTasks);
  return scheduler;
};
