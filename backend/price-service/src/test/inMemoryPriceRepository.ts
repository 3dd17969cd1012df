import type { PriceRepository, QuoteInsert, StoredQuote } from '@/repositories/interfaces/price-repository'
import type { Candle, CryptoSymbol, Timeframe } from '@/types/market'

const candleKey = (timeframe: Timeframe, candle: Candle) => `${timeframe}|${candle.symbol}|${candle.date}`

/**
 * 内存版 PriceRepository
 */
export class InMemoryPriceRepository implements PriceRepository {
  public quotes: StoredQuote[] = []
  public candles = new Map<string, { timeframe: Timeframe, candle: Candle }>()
  public failing = false

  private guard(): void {
    if (this.failing) throw new Error('database unavailable')
  }

  async insertQuote(quote: QuoteInsert): Promise<void> {
    this.guard()
    this.quotes.push({ ...quote })
  }

  async upsertCandles(timeframe: Timeframe, candles: Candle[]): Promise<number> {
    this.guard()
    candles.forEach(candle => this.candles.set(candleKey(timeframe, candle), { timeframe, candle: { ...candle } }))
    return candles.length
  }

  async getLatestQuotes(): Promise<StoredQuote[]> {
    this.guard()
    const latest = new Map<CryptoSymbol, StoredQuote>()
    for (const quote of this.quotes) {
      const current = latest.get(quote.symbol)
      if (!current || quote.timestamp.getTime() >= current.timestamp.getTime()) {
        latest.set(quote.symbol, quote)
      }
    }
    return [...latest.values()].sort((a, b) => a.symbol.localeCompare(b.symbol))
  }

  async getHourlyCloseAtOrBefore(symbol: CryptoSymbol, at: Date): Promise<number | null> {
    this.guard()
    const candidates = this.series(symbol, 'hour').filter(candle => candle.timestamp_ms <= at.getTime())
    const last = candidates[candidates.length - 1]
    return last ? last.close : null
  }

  async getCandles(symbol: CryptoSymbol, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    this.guard()
    return this.series(symbol, timeframe).slice(-limit)
  }

  async getQuotesSince(symbol: CryptoSymbol, since: Date, bucketMs: number): Promise<StoredQuote[]> {
    this.guard()
    const latestPerBucket = new Map<number, StoredQuote>()
    for (const quote of this.quotes) {
      if (quote.symbol !== symbol || quote.timestamp.getTime() < since.getTime()) continue
      const bucket = Math.floor(quote.timestamp.getTime() / bucketMs)
      const current = latestPerBucket.get(bucket)
      if (!current || current.timestamp.getTime() < quote.timestamp.getTime()) {
        latestPerBucket.set(bucket, quote)
      }
    }
    return [...latestPerBucket.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
  }

  async countCandles(timeframe: Timeframe): Promise<number> {
    this.guard()
    return [...this.candles.values()].filter(entry => entry.timeframe === timeframe).length
  }

  private series(symbol: CryptoSymbol, timeframe: Timeframe): Candle[] {
    return [...this.candles.values()]
      .filter(entry => entry.timeframe === timeframe && entry.candle.symbol === symbol)
      .map(entry => entry.candle)
      .sort((a, b) => a.timestamp_ms - b.timestamp_ms)
  }
}
