import type { Candle, CryptoSymbol } from '@/types/market'
import type { MarketDataSource, Ticker } from '@/services/marketApi.service'

export const HOUR_MS = 60 * 60 * 1000

/**
 * 按收盘价序列生成K线（开盘价取上一根收盘价，high/low 上下浮动1）
 */
export const makeCandles = (
  symbol: CryptoSymbol,
  closes: number[],
  startMs: number = Date.UTC(2024, 0, 1),
  stepMs: number = HOUR_MS
): Candle[] =>
  closes.map((close, index) => {
    const timestamp = startMs + index * stepMs
    const open = index === 0 ? close : closes[index - 1]
    return {
      symbol,
      date: new Date(timestamp).toISOString(),
      timestamp_ms: timestamp,
      open,
      high: Math.max(open, close) + 1,
      low: Math.min(open, close) - 1,
      close,
      volume: 10 + index,
      quote_volume: (10 + index) * close,
    }
  })

/**
 * 可编程的行情源
 */
export class FakeMarketSource implements MarketDataSource {
  public tickers = new Map<CryptoSymbol, Ticker | Error>()
  public candles = new Map<string, Candle[] | Error>()
  public tickerCalls: CryptoSymbol[] = []
  public candleCalls: string[] = []

  async fetchTicker(symbol: CryptoSymbol): Promise<Ticker> {
    this.tickerCalls.push(symbol)
    const ticker = this.tickers.get(symbol)
    if (!ticker) throw new Error(`no ticker for ${symbol}`)
    if (ticker instanceof Error) throw ticker
    return ticker
  }

  async fetchCandles(symbol: CryptoSymbol, timeframe: string, limit: number): Promise<Candle[]> {
    this.candleCalls.push(`${symbol}:${timeframe}:${limit}`)
    const candles = this.candles.get(`${symbol}:${timeframe}`) ?? []
    if (candles instanceof Error) throw candles
    return candles
  }
}
