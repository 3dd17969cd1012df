/**
 * Price Repository Interface
 *
 * - 追加实时报价（crypto_prices）
 * - 写入 / 覆盖各粒度 K线（price_history）
 * - 查询最新报价、K线序列、历史报价窗口
 */

import type { Candle, CryptoSymbol, Timeframe } from '@/types/market';

export interface QuoteInsert {
  symbol: CryptoSymbol;
  name: string;
  price: number;
  change24h: number | null;
  timestamp: Date;
}

export interface StoredQuote {
  symbol: CryptoSymbol;
  name: string;
  price: number;
  change24h: number | null;
  timestamp: Date;
}

export interface PriceRepository {
  /**
   * 追加一条实时报价
   */
  insertQuote(quote: QuoteInsert): Promise<void>;

  /**
   * 写入K线，同一 (timeframe, symbol, date) 覆盖已有行；返回写入行数
   */
  upsertCandles(timeframe: Timeframe, candles: Candle[]): Promise<number>;

  /**
   * 每个币种最新的一条报价
   */
  getLatestQuotes(): Promise<StoredQuote[]>;

  /**
   * 指定时间点及之前最近一根小时K线的收盘价
   */
  getHourlyCloseAtOrBefore(symbol: CryptoSymbol, at: Date): Promise<number | null>;

  /**
   * 最近 limit 根K线，按时间升序
   */
  getCandles(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<Candle[]>;

  /**
   * since 之后的报价，按 bucketMs 分桶每桶取最后一条，按时间升序
   */
  getQuotesSince(symbol: CryptoSymbol, since: Date, bucketMs: number): Promise<StoredQuote[]>;

  /**
   * 各粒度K线条数
   */
  countCandles(timeframe: Timeframe): Promise<number>;
}
