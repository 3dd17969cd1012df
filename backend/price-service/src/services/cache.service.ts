import type { CacheStore } from '@/types/cache';
import type { AnalysisReport, Candle, CryptoSymbol, PriceQuote, Timeframe } from '@/types/market';
import { getLogger } from '@/utils/logger';

const logger = getLogger('cache');

const KEY_PREFIX = 'crypto';

export const CACHE_KEYS = {
  latestPrices: `${KEY_PREFIX}:latest_prices`,
  price: (symbol: CryptoSymbol) => `${KEY_PREFIX}:price:${symbol}`,
  chart: (symbol: CryptoSymbol, timeframe: Timeframe, limit: number) =>
    `${KEY_PREFIX}:chart:${symbol}:${timeframe}:${limit}`,
  analysis: `${KEY_PREFIX}:analysis_report`,
  hits: `${KEY_PREFIX}:stats:hits`,
  misses: `${KEY_PREFIX}:stats:misses`,
} as const;

const PATTERNS = {
  prices: [`${KEY_PREFIX}:latest_prices`, `${KEY_PREFIX}:price:*`],
  charts: [`${KEY_PREFIX}:chart:*`],
  analysis: [CACHE_KEYS.analysis],
  all: [`${KEY_PREFIX}:*`],
} as const;

export type CacheClearType = 'all' | 'prices' | 'charts';

export const CACHE_CLEAR_TYPES: readonly CacheClearType[] = ['all', 'prices', 'charts'];

export interface CacheStats {
  price_keys: number;
  chart_keys: number;
  analysis_cached: boolean;
  hits: number;
  misses: number;
  hit_rate: number;
  total_keys: number;
}

export interface CacheTtls {
  priceTtlSeconds: number;
  chartTtlSeconds: number;
}

/**
 * 加密货币数据缓存管理
 *
 * 缓存读写失败只记录告警并按未命中处理，调用方随后回源数据库。
 */
export class CryptoCacheService {
  constructor(
    private readonly store: CacheStore,
    private readonly ttls: CacheTtls
  ) {}

  private async readJson<T>(key: string, isValid: (value: unknown) => value is T): Promise<T | null> {
    try {
      const raw = await this.store.get(key);
      if (raw === null) {
        await this.count(CACHE_KEYS.misses);
        return null;
      }
      const parsed: unknown = JSON.parse(raw);
      if (!isValid(parsed)) {
        logger.warn(`Discarding malformed cache entry ${key}`);
        await this.store.del(key);
        await this.count(CACHE_KEYS.misses);
        return null;
      }
      await this.count(CACHE_KEYS.hits);
      return parsed;
    } catch (error) {
      logger.warn(`Cache read failed for ${key}`, { error });
      return null;
    }
  }

  private async writeJson(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
    try {
      await this.store.set(key, JSON.stringify(value), ttlSeconds);
      return true;
    } catch (error) {
      logger.warn(`Cache write failed for ${key}`, { error });
      return false;
    }
  }

  private async count(key: string): Promise<void> {
    try {
      await this.store.incr(key);
    } catch (error) {
      logger.debug(`Cache stats counter ${key} not updated`, { error });
    }
  }

  // 价格缓存
  public async getLatestPrices(): Promise<PriceQuote[] | null> {
    return this.readJson(CACHE_KEYS.latestPrices, isQuoteList);
  }

  public async cacheLatestPrices(quotes: PriceQuote[]): Promise<boolean> {
    return this.writeJson(CACHE_KEYS.latestPrices, quotes, this.ttls.priceTtlSeconds);
  }

  public async getPrice(symbol: CryptoSymbol): Promise<PriceQuote | null> {
    return this.readJson(CACHE_KEYS.price(symbol), isQuote);
  }

  public async cachePrice(quote: PriceQuote): Promise<boolean> {
    return this.writeJson(CACHE_KEYS.price(quote.symbol), quote, this.ttls.priceTtlSeconds);
  }

  // 图表缓存
  public async getChartData(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<Candle[] | null> {
    return this.readJson(CACHE_KEYS.chart(symbol, timeframe, limit), isCandleList);
  }

  public async cacheChartData(symbol: CryptoSymbol, timeframe: Timeframe, limit: number, candles: Candle[]): Promise<boolean> {
    return this.writeJson(CACHE_KEYS.chart(symbol, timeframe, limit), candles, this.ttls.chartTtlSeconds);
  }

  /**
   * 删除某币种（或全部币种）的图表缓存
   */
  public async invalidateCharts(symbol?: CryptoSymbol): Promise<number> {
    const pattern = symbol ? `${KEY_PREFIX}:chart:${symbol}:*` : `${KEY_PREFIX}:chart:*`;
    try {
      const keys = await this.store.keys(pattern);
      return await this.store.del(keys);
    } catch (error) {
      logger.warn(`Chart cache invalidation failed for ${pattern}`, { error });
      return 0;
    }
  }

  // 分析报告缓存
  public async getAnalysisReport(): Promise<AnalysisReport | null> {
    return this.readJson(CACHE_KEYS.analysis, isAnalysisReport);
  }

  public async cacheAnalysisReport(report: AnalysisReport): Promise<boolean> {
    return this.writeJson(CACHE_KEYS.analysis, report, this.ttls.chartTtlSeconds);
  }

  public async getStats(): Promise<CacheStats> {
    const [priceKeys, chartKeys, analysisKeys, hitsRaw, missesRaw, totalKeys] = await Promise.all([
      this.keysFor(PATTERNS.prices),
      this.keysFor(PATTERNS.charts),
      this.keysFor(PATTERNS.analysis),
      this.store.get(CACHE_KEYS.hits),
      this.store.get(CACHE_KEYS.misses),
      this.store.dbSize(),
    ]);

    const hits = Number(hitsRaw ?? 0);
    const misses = Number(missesRaw ?? 0);
    const lookups = hits + misses;

    return {
      price_keys: priceKeys.length,
      chart_keys: chartKeys.length,
      analysis_cached: analysisKeys.length > 0,
      hits,
      misses,
      hit_rate: lookups === 0 ? 0 : Math.round((hits / lookups) * 10000) / 100,
      total_keys: totalKeys,
    };
  }

  /**
   * 按类型清理缓存，返回删除的键数量
   */
  public async clear(type: CacheClearType): Promise<number> {
    const keys = await this.keysFor(PATTERNS[type]);
    const cleared = await this.store.del(keys);
    logger.info(`Cleared ${cleared} ${type} cache keys`);
    return cleared;
  }

  private async keysFor(patterns: readonly string[]): Promise<string[]> {
    const found = new Set<string>();
    for (const pattern of patterns) {
      const matched = pattern.includes('*') ? await this.store.keys(pattern) : await this.exactKey(pattern);
      matched.forEach(key => found.add(key));
    }
    return [...found];
  }

  private async exactKey(key: string): Promise<string[]> {
    const value = await this.store.get(key);
    return value === null ? [] : [key];
  }

  public async healthCheck(): Promise<boolean> {
    return this.store.healthCheck();
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isQuote = (value: unknown): value is PriceQuote =>
  isRecord(value) &&
  typeof value.symbol === 'string' &&
  typeof value.price === 'number' &&
  typeof value.change_24h === 'number' &&
  typeof value.timestamp_ms === 'number';

const isQuoteList = (value: unknown): value is PriceQuote[] => Array.isArray(value) && value.every(isQuote);

const isCandle = (value: unknown): value is Candle =>
  isRecord(value) &&
  typeof value.symbol === 'string' &&
  typeof value.timestamp_ms === 'number' &&
  typeof value.close === 'number';

const isCandleList = (value: unknown): value is Candle[] => Array.isArray(value) && value.every(isCandle);

const isAnalysisReport = (value: unknown): value is AnalysisReport =>
  isRecord(value) && typeof value.generated_at === 'string' && Array.isArray(value.symbols);
