export const SYMBOLS = ['BTC', 'ETH'] as const;
export type CryptoSymbol = (typeof SYMBOLS)[number];

export const TIMEFRAMES = ['minute', 'hour', 'day'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const SYMBOL_NAMES: Record<CryptoSymbol, string> = {
  BTC: 'Bitcoin',
  ETH: 'Ethereum',
};

export const isCryptoSymbol = (value: string): value is CryptoSymbol =>
  SYMBOLS.some(symbol => symbol === value);

export const isTimeframe = (value: string): value is Timeframe =>
  TIMEFRAMES.some(timeframe => timeframe === value);

// 一次观测到的价格
export interface PriceQuote {
  name: string;
  symbol: CryptoSymbol;
  price: number;
  change_24h: number;
  timestamp_ms: number;
  date: string;
}

// OHLCV K线
export interface Candle {
  symbol: CryptoSymbol;
  date: string;
  timestamp_ms: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  quote_volume: number;
}

export interface PricePoint {
  date: string;
  timestamp_ms: number;
  price: number;
  high: number;
  low: number;
  open: number;
}

export interface VolumePoint {
  date: string;
  timestamp_ms: number;
  volume: number;
}

export interface VolatilityPoint {
  date: string;
  timestamp_ms: number;
  volatility: number;
  volatility_percent: number;
}

export interface ChartSeries {
  price_data: PricePoint[];
  volume_data: VolumePoint[];
  volatility_data: VolatilityPoint[];
}

export interface KlineIndicators {
  ma5: (number | null)[];
  ma10: (number | null)[];
  ma20: (number | null)[];
  ema12: (number | null)[];
  ema26: (number | null)[];
  macd: {
    macd: (number | null)[];
    signal: (number | null)[];
    histogram: (number | null)[];
  };
  rsi: (number | null)[];
  boll: {
    upper: (number | null)[];
    middle: (number | null)[];
    lower: (number | null)[];
  };
}

export interface KlineResponse {
  symbol: CryptoSymbol;
  timeframe: Timeframe;
  klines: Candle[];
  indicators: KlineIndicators;
}

export type TrendSignal = 'bullish' | 'bearish' | 'neutral' | 'insufficient';

export interface SymbolAnalysis {
  symbol: CryptoSymbol;
  name: string;
  latest_price: number | null;
  change_24h: number | null;
  period_high: number | null;
  period_low: number | null;
  volatility_percent: number | null;
  rsi: number | null;
  ma20: number | null;
  trend: TrendSignal;
  data_points: number;
}

export interface AnalysisReport {
  generated_at: string;
  symbols: SymbolAnalysis[];
}

// 依赖连接状态
export type ConnectivityState = 'connected' | 'disconnected' | 'disabled';

export interface SystemStatus {
  database: ConnectivityState;
  redis: ConnectivityState;
  timestamp: string;
}
