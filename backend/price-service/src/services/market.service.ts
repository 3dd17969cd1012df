import type { PriceRepository, StoredQuote } from '@/repositories/interfaces/price-repository';
import { CryptoCacheService } from '@/services/cache.service';
import { ServiceUnavailableError } from '@/middleware/errorHandler';
import { type Candle, type ChartSeries, type CryptoSymbol, type KlineResponse, type PriceQuote, SYMBOLS, SYMBOL_NAMES, type Timeframe } from '@/types/market';
import { buildChartSeries, calculateKlineIndicators } from '@/utils/technicalIndicators';
import { getLogger } from '@/utils/logger';

const logger = getLogger('market');

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

// 按时间分桶降采样，每桶保留最后一条报价
export const HISTORY_WINDOWS = {
  '24h': { durationMs: DAY_MS, bucketMs: MINUTE_MS },
  '7d': { durationMs: 7 * DAY_MS, bucketMs: 15 * MINUTE_MS },
  '30d': { durationMs: 30 * DAY_MS, bucketMs: HOUR_MS },
} as const;

export type HistoryWindow = keyof typeof HISTORY_WINDOWS;

export type Clock = () => Date;

export const toPriceQuote = (quote: StoredQuote, change24h: number): PriceQuote => ({
  name: quote.name || SYMBOL_NAMES[quote.symbol],
  symbol: quote.symbol,
  price: quote.price,
  change_24h: change24h,
  timestamp_ms: quote.timestamp.getTime(),
  date: quote.timestamp.toISOString(),
});

/**
 * 行情读取服务：缓存优先，未命中回源数据库并回填缓存
 */
export class MarketService {
  constructor(
    private readonly repository: PriceRepository,
    private readonly cache: CryptoCacheService,
    private readonly clock: Clock = () => new Date()
  ) {}

  private async fromDatabase<T>(what: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      logger.error(`Database query failed: ${what}`, { error });
      throw new ServiceUnavailableError('数据库');
    }
  }

  /**
   * 基于小时K线计算24小时涨跌幅，找不到24小时前的数据时返回 null
   */
  public async calculate24hChange(symbol: CryptoSymbol, currentPrice: number): Promise<number | null> {
    const dayAgo = new Date(this.clock().getTime() - DAY_MS);
    const price24hAgo = await this.repository.getHourlyCloseAtOrBefore(symbol, dayAgo);

    if (price24hAgo === null || price24hAgo === 0) {
      logger.debug(`${symbol}: no hourly close 24h ago, using stored change`);
      return null;
    }

    return ((currentPrice - price24hAgo) / price24hAgo) * 100;
  }

  public async getLatestPrices(): Promise<PriceQuote[]> {
    // 实时采集写入的单币种缓存齐全时直接返回
    const perSymbol = await Promise.all(SYMBOLS.map(symbol => this.cache.getPrice(symbol)));
    const cachedQuotes = perSymbol.filter((quote): quote is PriceQuote => quote !== null);
    if (cachedQuotes.length === SYMBOLS.length) {
      return cachedQuotes;
    }

    const cachedList = await this.cache.getLatestPrices();
    if (cachedList) {
      logger.debug('Latest prices served from cache');
      return cachedList;
    }

    const result = await this.fromDatabase('latest prices', async () => {
      const stored = await this.repository.getLatestQuotes();
      const quotes: PriceQuote[] = [];
      for (const quote of stored) {
        const calculated = await this.calculate24hChange(quote.symbol, quote.price);
        quotes.push(toPriceQuote(quote, calculated ?? quote.change24h ?? 0));
      }
      return quotes;
    });

    if (result.length === 0) {
      logger.warn('No price data in database');
      return result;
    }

    await this.cache.cacheLatestPrices(result);
    return result;
  }

  public async getPriceHistory(symbol: CryptoSymbol, window: HistoryWindow): Promise<PriceQuote[]> {
    const { durationMs, bucketMs } = HISTORY_WINDOWS[window];
    const since = new Date(this.clock().getTime() - durationMs);
    const stored = await this.fromDatabase(`price history ${symbol} ${window}`, () =>
      this.repository.getQuotesSince(symbol, since, bucketMs)
    );
    return stored.map(quote => toPriceQuote(quote, quote.change24h ?? 0));
  }

  public async getChartData(symbol: CryptoSymbol | undefined, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    if (!symbol) {
      logger.warn('Chart data requested without symbol');
      return [];
    }

    const cached = await this.cache.getChartData(symbol, timeframe, limit);
    if (cached) {
      return cached;
    }

    const candles = await this.fromDatabase(`chart data ${symbol} ${timeframe}`, () =>
      this.repository.getCandles(symbol, timeframe, limit)
    );

    if (candles.length === 0) {
      logger.warn(`No ${timeframe} candles for ${symbol}`);
      return candles;
    }

    await this.cache.cacheChartData(symbol, timeframe, limit, candles);
    return candles;
  }

  public async getChartSeries(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<ChartSeries> {
    const candles = await this.getChartData(symbol, timeframe, limit);
    return buildChartSeries(candles);
  }

  public async getKlineData(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<KlineResponse> {
    const klines = await this.getChartData(symbol, timeframe, limit);
    return {
      symbol,
      timeframe,
      klines,
      indicators: calculateKlineIndicators(klines),
    };
  }
}
