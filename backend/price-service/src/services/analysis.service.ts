import type { PriceRepository } from '@/repositories/interfaces/price-repository';
import { CryptoCacheService } from '@/services/cache.service';
import type { Clock } from '@/services/market.service';
import { ServiceUnavailableError } from '@/middleware/errorHandler';
import { type AnalysisReport, type Candle, type CryptoSymbol, SYMBOLS, SYMBOL_NAMES, type SymbolAnalysis, type TrendSignal } from '@/types/market';
import { calculateRSI, calculateSMA, mean, populationStdDev } from '@/utils/technicalIndicators';
import { getLogger } from '@/utils/logger';

const logger = getLogger('analysis');

// 一周小时K线
const ANALYSIS_WINDOW = 168;
const MIN_TREND_POINTS = 20;

const last = <T>(values: T[]): T | undefined => values[values.length - 1];

export const classifyTrend = (close: number, ma20: number | null, rsi: number | null): TrendSignal => {
  if (ma20 === null || rsi === null) return 'insufficient';
  if (close > ma20 && rsi >= 50) return 'bullish';
  if (close < ma20 && rsi <= 50) return 'bearish';
  return 'neutral';
};

export const analyzeSymbol = (symbol: CryptoSymbol, candles: Candle[]): SymbolAnalysis => {
  const lastCandle = last(candles);
  if (!lastCandle) {
    return {
      symbol,
      name: SYMBOL_NAMES[symbol],
      latest_price: null,
      change_24h: null,
      period_high: null,
      period_low: null,
      volatility_percent: null,
      rsi: null,
      ma20: null,
      trend: 'insufficient',
      data_points: 0,
    };
  }

  const closes = candles.map(candle => candle.close);

  // 24根小时K线之前的收盘价
  const reference = candles.length > 24 ? candles[candles.length - 25].close : null;
  const change24h = reference ? ((lastCandle.close - reference) / reference) * 100 : null;

  const recent = closes.slice(-24);
  const recentMean = mean(recent);
  const volatilityPercent = recentMean > 0 ? (populationStdDev(recent, recentMean) / recentMean) * 100 : null;

  const rsi = last(calculateRSI(closes)) ?? null;
  const ma20 = candles.length >= MIN_TREND_POINTS ? last(calculateSMA(closes, 20)) ?? null : null;

  return {
    symbol,
    name: SYMBOL_NAMES[symbol],
    latest_price: lastCandle.close,
    change_24h: change24h,
    period_high: Math.max(...candles.map(candle => candle.high)),
    period_low: Math.min(...candles.map(candle => candle.low)),
    volatility_percent: volatilityPercent,
    rsi,
    ma20,
    trend: classifyTrend(lastCandle.close, ma20, rsi),
    data_points: candles.length,
  };
};

/**
 * 分析报告：基于最近一周小时K线，按小时刷新并缓存
 */
export class AnalysisService {
  constructor(
    private readonly repository: PriceRepository,
    private readonly cache: CryptoCacheService,
    private readonly clock: Clock = () => new Date()
  ) {}

  public async buildReport(): Promise<AnalysisReport> {
    const symbols: SymbolAnalysis[] = [];
    for (const symbol of SYMBOLS) {
      let candles: Candle[];
      try {
        candles = await this.repository.getCandles(symbol, 'hour', ANALYSIS_WINDOW);
      } catch (error) {
        logger.error(`Failed to load candles for ${symbol} analysis`, { error });
        throw new ServiceUnavailableError('数据库');
      }
      symbols.push(analyzeSymbol(symbol, candles));
    }

    return {
      generated_at: this.clock().toISOString(),
      symbols,
    };
  }

  public async refreshReport(): Promise<AnalysisReport> {
    const report = await this.buildReport();
    await this.cache.cacheAnalysisReport(report);
    logger.info('Analysis report refreshed', {
      symbols: report.symbols.map(item => `${item.symbol}:${item.trend}`),
    });
    return report;
  }

  public async getReport(): Promise<AnalysisReport> {
    const cached = await this.cache.getAnalysisReport();
    if (cached) return cached;
    return this.refreshReport();
  }
}
