import type { PriceRepository } from '@/repositories/interfaces/price-repository';
import { CryptoCacheService } from '@/services/cache.service';
import type { MarketDataSource, Ticker } from '@/services/marketApi.service';
import type { Clock } from '@/services/market.service';
import { errorMessage } from '@/middleware/errorHandler';
import { type CryptoSymbol, SYMBOLS, TIMEFRAMES, type Timeframe } from '@/types/market';
import { getLogger } from '@/utils/logger';

const logger = getLogger('collector');

// 数据新鲜度阈值
const FRESH_MS = 2 * 60 * 1000;
const STALE_MS = 5 * 60 * 1000;
export const MIN_QUALITY_SCORE = 0.5;

/**
 * 报价新鲜度评分：2分钟内 1.0，5分钟内 0.5，更旧为 0
 */
export const dataQualityScore = (timestamp: Date, now: Date): number => {
  const age = Math.max(0, now.getTime() - timestamp.getTime());
  if (age <= FRESH_MS) return 1;
  if (age <= STALE_MS) return 0.5;
  return 0;
};

export interface RealtimeResult {
  success: boolean;
  stored: CryptoSymbol[];
  skipped: CryptoSymbol[];
  failed: CryptoSymbol[];
}

export interface HistoryResult {
  success: boolean;
  candlesStored: number;
  failures: string[];
  counts: Record<Timeframe, number>;
}

export interface CollectorOptions {
  historyLimit: number;
  clock: Clock;
}

/**
 * 行情采集：实时报价与历史K线
 */
export class PriceCollector {
  private readonly options: CollectorOptions;

  constructor(
    private readonly source: MarketDataSource,
    private readonly repository: PriceRepository,
    private readonly cache: CryptoCacheService,
    options: Partial<CollectorOptions> = {}
  ) {
    this.options = {
      historyLimit: options.historyLimit ?? 100,
      clock: options.clock ?? (() => new Date()),
    };
  }

  public async collectRealtime(): Promise<RealtimeResult> {
    logger.info('Realtime collection started');
    const result: RealtimeResult = { success: false, stored: [], skipped: [], failed: [] };
    const tickers: Ticker[] = [];

    for (const symbol of SYMBOLS) {
      try {
        tickers.push(await this.source.fetchTicker(symbol));
      } catch (error) {
        logger.error(`Failed to fetch ${symbol} ticker: ${errorMessage(error)}`);
        result.failed.push(symbol);
      }
    }

    if (tickers.length === 0) {
      logger.warn('No realtime data fetched');
      return result;
    }

    const now = this.options.clock();

    for (const ticker of tickers) {
      const score = dataQualityScore(ticker.timestamp, now);
      if (score < MIN_QUALITY_SCORE) {
        logger.warn(`Skipping stale ${ticker.symbol} quote (score ${score.toFixed(2)})`);
        result.skipped.push(ticker.symbol);
        continue;
      }

      try {
        await this.repository.insertQuote({
          symbol: ticker.symbol,
          name: ticker.name,
          price: ticker.price,
          change24h: ticker.change_24h,
          timestamp: ticker.timestamp,
        });
        result.stored.push(ticker.symbol);
        logger.info(`Stored ${ticker.symbol} quote: $${ticker.price.toFixed(2)} (score ${score.toFixed(2)})`);
      } catch (error) {
        logger.error(`Failed to store ${ticker.symbol} quote: ${errorMessage(error)}`);
        result.failed.push(ticker.symbol);
        continue;
      }

      await this.cache.cachePrice({
        name: ticker.name,
        symbol: ticker.symbol,
        price: ticker.price,
        change_24h: ticker.change_24h,
        timestamp_ms: ticker.timestamp.getTime(),
        date: ticker.timestamp.toISOString(),
      });
    }

    result.success = result.stored.length > 0;
    logger.info('Realtime collection finished', {
      stored: result.stored,
      skipped: result.skipped,
      failed: result.failed,
    });
    return result;
  }

  public async collectHistory(): Promise<HistoryResult> {
    logger.info('History collection started');
    let candlesStored = 0;
    const failures: string[] = [];

    for (const symbol of SYMBOLS) {
      let symbolUpdated = false;
      for (const timeframe of TIMEFRAMES) {
        try {
          const candles = await this.source.fetchCandles(symbol, timeframe, this.options.historyLimit);
          candlesStored += await this.repository.upsertCandles(timeframe, candles);
          symbolUpdated = symbolUpdated || candles.length > 0;
        } catch (error) {
          logger.error(`Failed to collect ${symbol} ${timeframe} candles: ${errorMessage(error)}`);
          failures.push(`${symbol}:${timeframe}`);
        }
      }

      if (symbolUpdated) {
        await this.cache.invalidateCharts(symbol);
      }
    }

    const counts = await this.summarize();
    logger.info('History collection finished', { candlesStored, failures, counts });

    return {
      success: failures.length < SYMBOLS.length * TIMEFRAMES.length,
      candlesStored,
      failures,
      counts,
    };
  }

  private async summarize(): Promise<Record<Timeframe, number>> {
    const counts: Record<Timeframe, number> = { minute: 0, hour: 0, day: 0 };
    for (const timeframe of TIMEFRAMES) {
      try {
        counts[timeframe] = await this.repository.countCandles(timeframe);
      } catch (error) {
        logger.warn(`Failed to count ${timeframe} candles: ${errorMessage(error)}`);
      }
    }
    return counts;
  }
}
