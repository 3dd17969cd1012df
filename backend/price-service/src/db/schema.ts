/**
 * 数据库表结构（drizzle）
 *
 * - crypto_prices: 实时报价，每个采集周期每个币种追加一行
 * - price_history: 各时间粒度的 OHLCV K线，(timeframe, symbol, date) 唯一
 *
 * 修改后执行 npm run db:push 同步到数据库。
 */

import { getTableName } from 'drizzle-orm';
import {
  bigserial,
  index,
  numeric,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

export const cryptoPrices = pgTable(
  'crypto_prices',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    symbol: text('symbol').notNull(),
    name: text('name').notNull(),
    price: numeric('price', { precision: 20, scale: 8 }).notNull(),
    change24h: numeric('change_24h', { precision: 12, scale: 4 }),
    timestamp: timestamp('timestamp', { withTimezone: true, mode: 'date' }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
  },
  table => ({
    symbolTsIdx: index('crypto_prices_symbol_ts_idx').on(table.symbol, table.timestamp),
  })
);

export const priceHistory = pgTable(
  'price_history',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    timeframe: text('timeframe').notNull(),
    symbol: text('symbol').notNull(),
    date: timestamp('date', { withTimezone: true, mode: 'date' }).notNull(),
    open: numeric('open', { precision: 20, scale: 8 }).notNull(),
    high: numeric('high', { precision: 20, scale: 8 }).notNull(),
    low: numeric('low', { precision: 20, scale: 8 }).notNull(),
    close: numeric('close', { precision: 20, scale: 8 }).notNull(),
    volume: numeric('volume', { precision: 28, scale: 8 }).notNull(),
    quoteVolume: numeric('quote_volume', { precision: 28, scale: 8 }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
  },
  table => ({
    candleKey: uniqueIndex('price_history_timeframe_symbol_date_key').on(table.timeframe, table.symbol, table.date),
  })
);

export type CryptoPriceRow = typeof cryptoPrices.$inferSelect;
export type NewCryptoPriceRow = typeof cryptoPrices.$inferInsert;
export type PriceHistoryRow = typeof priceHistory.$inferSelect;
export type NewPriceHistoryRow = typeof priceHistory.$inferInsert;

// 表结构由 drizzle-kit push 同步，服务启动时只校验表是否存在
export const REQUIRED_TABLES: readonly string[] = [getTableName(cryptoPrices), getTableName(priceHistory)];

export const findMissingTables = (existing: readonly string[]): string[] =>
  REQUIRED_TABLES.filter(name => !existing.includes(name));
