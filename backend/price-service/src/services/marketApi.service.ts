import { type AxiosInstance, isAxiosError } from 'axios';
import Joi from 'joi';
import { ExternalApiError } from '@/middleware/errorHandler';
import { createApiClient } from '@/utils/httpClient';
import { getLogger } from '@/utils/logger';
import { type Candle, type CryptoSymbol, SYMBOL_NAMES, type Timeframe } from '@/types/market';

const logger = getLogger('market-api');

// 交易对与K线周期映射
export const MARKET_PAIRS: Record<CryptoSymbol, string> = {
  BTC: 'BTCUSDT',
  ETH: 'ETHUSDT',
};

export const TIMEFRAME_INTERVALS: Record<Timeframe, string> = {
  minute: '1m',
  hour: '1h',
  day: '1d',
};

export interface Ticker {
  symbol: CryptoSymbol;
  name: string;
  price: number;
  change_24h: number;
  timestamp: Date;
}

/**
 * 行情数据来源，采集器只依赖这个接口
 */
export interface MarketDataSource {
  fetchTicker(symbol: CryptoSymbol): Promise<Ticker>;
  fetchCandles(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<Candle[]>;
}

interface TickerPayload {
  symbol: string;
  lastPrice: number;
  priceChangePercent: number;
  closeTime: number;
}

const tickerSchema = Joi.object({
  symbol: Joi.string().required(),
  lastPrice: Joi.number().positive().required(),
  priceChangePercent: Joi.number().required(),
  closeTime: Joi.number().integer().required(),
}).unknown(true);

// [openTime, open, high, low, close, volume, closeTime, quoteVolume, ...]
const klineRowSchema = Joi.array()
  .ordered(
    Joi.number().integer().required(),
    Joi.number().required(),
    Joi.number().required(),
    Joi.number().required(),
    Joi.number().required(),
    Joi.number().required(),
    Joi.number().integer().required(),
    Joi.number().required()
  )
  .items(Joi.any());

const klinesSchema = Joi.array().items(klineRowSchema);

type KlineRow = [number, number, number, number, number, number, number, number, ...unknown[]];

const validatePayload = <T>(schema: Joi.Schema, payload: unknown, what: string): T => {
  const { error, value } = schema.validate(payload, { convert: true });
  if (error) {
    throw new ExternalApiError(`${what}数据格式异常: ${error.message}`);
  }
  return value;
};

const wrapRequestError = (error: unknown, what: string): ExternalApiError => {
  if (error instanceof ExternalApiError) return error;
  if (isAxiosError(error)) {
    return new ExternalApiError(`${what}请求失败: ${error.message}`, error.response?.status);
  }
  return new ExternalApiError(`${what}请求失败: ${String(error)}`);
};

/**
 * Binance 现货行情客户端
 */
export class BinanceMarketClient implements MarketDataSource {
  private client: AxiosInstance;

  constructor(baseUrl: string, timeoutMs: number, client?: AxiosInstance) {
    this.client = client ?? createApiClient(baseUrl, 'binance', timeoutMs);
  }

  public async fetchTicker(symbol: CryptoSymbol): Promise<Ticker> {
    const what = `${symbol} 24h行情`;
    try {
      const response = await this.client.get('/api/v3/ticker/24hr', {
        params: { symbol: MARKET_PAIRS[symbol] },
      });
      const payload = validatePayload<TickerPayload>(tickerSchema, response.data, what);

      return {
        symbol,
        name: SYMBOL_NAMES[symbol],
        price: payload.lastPrice,
        change_24h: payload.priceChangePercent,
        timestamp: new Date(payload.closeTime),
      };
    } catch (error) {
      throw wrapRequestError(error, what);
    }
  }

  public async fetchCandles(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    const what = `${symbol} ${timeframe}K线`;
    try {
      const response = await this.client.get('/api/v3/klines', {
        params: {
          symbol: MARKET_PAIRS[symbol],
          interval: TIMEFRAME_INTERVALS[timeframe],
          limit,
        },
      });
      const rows = validatePayload<KlineRow[]>(klinesSchema, response.data, what);
      logger.debug(`Fetched ${rows.length} ${timeframe} candles for ${symbol}`);

      return rows.map(([openTime, open, high, low, close, volume, , quoteVolume]) => ({
        symbol,
        date: new Date(openTime).toISOString(),
        timestamp_ms: openTime,
        open,
        high,
        low,
        close,
        volume,
        quote_volume: quoteVolume,
      }));
    } catch (error) {
      throw wrapRequestError(error, what);
    }
  }
}
