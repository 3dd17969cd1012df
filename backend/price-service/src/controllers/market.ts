import type { Request, Response } from 'express';
import { MarketService } from '@/services/market.service';
import { AnalysisService } from '@/services/analysis.service';
import { PriceCollector } from '@/services/collector.service';
import { CryptoCacheService } from '@/services/cache.service';
import { ExternalApiError } from '@/middleware/errorHandler';
import { parseQuery } from '@/middleware/validation';
import type { CryptoSymbol } from '@/types/market';
import { sendSuccess } from '@/utils/response';
import {
  chartQuerySchema,
  klineQuerySchema,
  priceHistoryQuerySchema,
  seriesQuerySchema,
} from '@/utils/validation';

/**
 * 行情数据接口
 */
class MarketController {
  constructor(
    private readonly market: MarketService,
    private readonly analysis: AnalysisService,
    private readonly collector: PriceCollector,
    private readonly cache: CryptoCacheService
  ) {}

  /**
   * 最新价格（缓存优先）
   */
  latestPrices = async (req: Request, res: Response) => {
    const prices = await this.market.getLatestPrices();
    sendSuccess(req, res, prices);
  };

  /**
   * 价格历史
   */
  priceHistory = async (req: Request, res: Response) => {
    const { crypto, timeframe } = parseQuery(priceHistoryQuerySchema, req);
    const history = await this.market.getPriceHistory(crypto, timeframe);
    sendSuccess(req, res, history);
  };

  /**
   * 图表K线数据（未指定币种返回空列表）
   */
  chartData = async (req: Request, res: Response) => {
    const { symbol, timeframe, limit } = parseQuery(chartQuerySchema, req);
    const candles = await this.market.getChartData(symbol, timeframe, limit);
    sendSuccess(req, res, candles);
  };

  private seriesFor = (symbol: CryptoSymbol) => async (req: Request, res: Response) => {
    const { timeframe, limit } = parseQuery(seriesQuerySchema, req);
    const series = await this.market.getChartSeries(symbol, timeframe, limit);
    sendSuccess(req, res, series);
  };

  btcData = this.seriesFor('BTC');

  ethData = this.seriesFor('ETH');

  /**
   * K线与技术指标
   */
  klineData = async (req: Request, res: Response) => {
    const { symbol, timeframe, limit } = parseQuery(klineQuerySchema, req);
    const kline = await this.market.getKlineData(symbol, timeframe, limit);
    sendSuccess(req, res, kline);
  };

  analysisReport = async (req: Request, res: Response) => {
    const report = await this.analysis.getReport();
    sendSuccess(req, res, report);
  };

  /**
   * 手动刷新K线数据并清理图表缓存
   */
  refreshCharts = async (req: Request, res: Response) => {
    const result = await this.collector.collectHistory();
    if (!result.success) {
      throw new ExternalApiError('行情数据刷新失败');
    }

    const cleared = await this.cache.invalidateCharts();

    sendSuccess(req, res, {
      candles_stored: result.candlesStored,
      failures: result.failures,
      counts: result.counts,
      cleared_cache_keys: cleared,
    }, '图表数据已刷新');
  };
}

export default MarketController;
