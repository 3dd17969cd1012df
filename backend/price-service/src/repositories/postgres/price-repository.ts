/**
 * Postgres Price Repository
 */

import { and, count, desc, eq, gte, lte, sql } from 'drizzle-orm';
import type { Db } from '@/config/database';
import { cryptoPrices, priceHistory } from '@/db/schema';
import type { CryptoPriceRow, PriceHistoryRow } from '@/db/schema';
import { isCryptoSymbol } from '@/types/market';
import type { Candle, CryptoSymbol, Timeframe } from '@/types/market';
import type { PriceRepository, QuoteInsert, StoredQuote } from '../interfaces/price-repository';

const toNumber = (value: string | null): number | null => (value === null ? null : Number(value));

const toStoredQuote = (row: CryptoPriceRow): StoredQuote | null => {
  if (!isCryptoSymbol(row.symbol)) return null;
  return {
    symbol: row.symbol,
    name: row.name,
    price: Number(row.price),
    change24h: toNumber(row.change24h),
    timestamp: row.timestamp,
  };
};

const toCandle = (row: PriceHistoryRow): Candle | null => {
  if (!isCryptoSymbol(row.symbol)) return null;
  return {
    symbol: row.symbol,
    date: row.date.toISOString(),
    timestamp_ms: row.date.getTime(),
    open: Number(row.open),
    high: Number(row.high),
    low: Number(row.low),
    close: Number(row.close),
    volume: Number(row.volume),
    quote_volume: Number(row.quoteVolume),
  };
};

const isPresent = <T>(value: T | null): value is T => value !== null;

/**
 * Create a Postgres price repository
 */
export function createPostgresPriceRepository(db: Db): PriceRepository {
  return {
    async insertQuote(quote: QuoteInsert): Promise<void> {
      await db.insert(cryptoPrices).values({
        symbol: quote.symbol,
        name: quote.name,
        price: String(quote.price),
        change24h: quote.change24h === null ? null : String(quote.change24h),
        timestamp: quote.timestamp,
      });
    },

    async upsertCandles(timeframe: Timeframe, candles: Candle[]): Promise<number> {
      if (candles.length === 0) return 0;

      const rows = candles.map(candle => ({
        timeframe,
        symbol: candle.symbol,
        date: new Date(candle.timestamp_ms),
        open: String(candle.open),
        high: String(candle.high),
        low: String(candle.low),
        close: String(candle.close),
        volume: String(candle.volume),
        quoteVolume: String(candle.quote_volume),
      }));

      // 未收盘的K线会反复采集，以最新一次为准
      await db
        .insert(priceHistory)
        .values(rows)
        .onConflictDoUpdate({
          target: [priceHistory.timeframe, priceHistory.symbol, priceHistory.date],
          set: {
            open: sql`excluded.open`,
            high: sql`excluded.high`,
            low: sql`excluded.low`,
            close: sql`excluded.close`,
            volume: sql`excluded.volume`,
            quoteVolume: sql`excluded.quote_volume`,
            updatedAt: sql`now()`,
          },
        });

      return rows.length;
    },

    async getLatestQuotes(): Promise<StoredQuote[]> {
      const rows = await db
        .selectDistinctOn([cryptoPrices.symbol])
        .from(cryptoPrices)
        .orderBy(cryptoPrices.symbol, desc(cryptoPrices.timestamp));

      return rows.map(toStoredQuote).filter(isPresent);
    },

    async getHourlyCloseAtOrBefore(symbol: CryptoSymbol, at: Date): Promise<number | null> {
      const rows = await db
        .select({ close: priceHistory.close })
        .from(priceHistory)
        .where(and(eq(priceHistory.timeframe, 'hour'), eq(priceHistory.symbol, symbol), lte(priceHistory.date, at)))
        .orderBy(desc(priceHistory.date))
        .limit(1);

      const row = rows[0];
      return row ? Number(row.close) : null;
    },

    async getCandles(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<Candle[]> {
      const rows = await db
        .select()
        .from(priceHistory)
        .where(and(eq(priceHistory.timeframe, timeframe), eq(priceHistory.symbol, symbol)))
        .orderBy(desc(priceHistory.date))
        .limit(limit);

      return rows.reverse().map(toCandle).filter(isPresent);
    },

    async getQuotesSince(symbol: CryptoSymbol, since: Date, bucketMs: number): Promise<StoredQuote[]> {
      // DISTINCT ON 与 ORDER BY 的表达式需完全一致，桶宽直接写入SQL而非参数
      const bucketSize = sql.raw(String(Math.max(1, Math.trunc(bucketMs))));
      const bucket = sql`floor(extract(epoch from ${cryptoPrices.timestamp}) * 1000 / ${bucketSize})`;

      const rows = await db
        .selectDistinctOn([bucket])
        .from(cryptoPrices)
        .where(and(eq(cryptoPrices.symbol, symbol), gte(cryptoPrices.timestamp, since)))
        .orderBy(bucket, desc(cryptoPrices.timestamp));

      return rows.map(toStoredQuote).filter(isPresent);
    },

    async countCandles(timeframe: Timeframe): Promise<number> {
      const rows = await db
        .select({ total: count() })
        .from(priceHistory)
        .where(eq(priceHistory.timeframe, timeframe));

      return rows[0]?.total ?? 0;
    },
  };
}
