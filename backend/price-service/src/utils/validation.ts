import Joi from 'joi';
import { SYMBOLS, TIMEFRAMES } from '@/types/market';
import type { CryptoSymbol, Timeframe } from '@/types/market';
import { HISTORY_WINDOWS } from '@/services/market.service';
import type { HistoryWindow } from '@/services/market.service';
import { CACHE_CLEAR_TYPES } from '@/services/cache.service';
import type { CacheClearType } from '@/services/cache.service';

const symbolField = Joi.string()
  .uppercase()
  .valid(...SYMBOLS)
  .messages({
    'any.only': `币种只支持 ${SYMBOLS.join(', ')}`,
  });

const timeframeField = Joi.string()
  .lowercase()
  .valid(...TIMEFRAMES)
  .default('hour')
  .messages({
    'any.only': `时间粒度只支持 ${TIMEFRAMES.join(', ')}`,
  });

const limitField = Joi.number()
  .integer()
  .min(1)
  .max(1000)
  .default(100)
  .messages({
    'number.base': 'limit 必须是数字',
    'number.min': 'limit 最小为1',
    'number.max': 'limit 最大为1000',
  });

export interface ChartQuery {
  symbol?: CryptoSymbol;
  timeframe: Timeframe;
  limit: number;
}

export interface SeriesQuery {
  timeframe: Timeframe;
  limit: number;
}

export interface KlineQuery {
  symbol: CryptoSymbol;
  timeframe: Timeframe;
  limit: number;
}

export interface PriceHistoryQuery {
  crypto: CryptoSymbol;
  timeframe: HistoryWindow;
}

export interface CacheClearBody {
  type: CacheClearType;
}

// 图表数据查询（symbol 可缺省，缺省时返回空列表）
export const chartQuerySchema = Joi.object<ChartQuery>({
  symbol: symbolField.optional(),
  timeframe: timeframeField,
  limit: limitField,
});

// BTC / ETH 三曲线数据
export const seriesQuerySchema = Joi.object<SeriesQuery>({
  timeframe: timeframeField,
  limit: limitField,
});

// K线数据
export const klineQuerySchema = Joi.object<KlineQuery>({
  symbol: symbolField.default('BTC'),
  timeframe: timeframeField,
  limit: limitField,
});

// 价格历史
export const priceHistoryQuerySchema = Joi.object<PriceHistoryQuery>({
  crypto: symbolField.default('BTC'),
  timeframe: Joi.string()
    .valid(...Object.keys(HISTORY_WINDOWS))
    .default('24h')
    .messages({
      'any.only': `时间范围只支持 ${Object.keys(HISTORY_WINDOWS).join(', ')}`,
    }),
});

// 清理缓存
export const cacheClearSchema = Joi.object<CacheClearBody>({
  type: Joi.string()
    .valid(...CACHE_CLEAR_TYPES)
    .default('all')
    .messages({
      'any.only': `不支持的缓存类型，可选 ${CACHE_CLEAR_TYPES.join(', ')}`,
    }),
});
