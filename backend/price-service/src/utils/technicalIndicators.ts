// 技术指标计算工具函数
import type { Candle, ChartSeries, KlineIndicators, VolatilityPoint } from '@/types/market';

type Series = (number | null)[];

// 简单移动平均线
export const calculateSMA = (data: number[], period: number): Series => {
  const sma: Series = [];

  for (let i = 0; i < data.length; i++) {
    if (i < period - 1) {
      sma.push(null);
    } else {
      const sum = data.slice(i - period + 1, i + 1).reduce((acc, val) => acc + val, 0);
      sma.push(sum / period);
    }
  }

  return sma;
};

// 指数移动平均线，以前 period 个值的 SMA 作为种子
export const calculateEMA = (data: number[], period: number): Series => {
  const ema: Series = [];
  const multiplier = 2 / (period + 1);
  let previous: number | null = null;

  for (let i = 0; i < data.length; i++) {
    if (i < period - 1) {
      ema.push(null);
    } else if (previous === null) {
      previous = data.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
      ema.push(previous);
    } else {
      previous = data[i] * multiplier + previous * (1 - multiplier);
      ema.push(previous);
    }
  }

  return ema;
};

// MACD指标计算
export interface MACDResult {
  macd: Series;
  signal: Series;
  histogram: Series;
}

export const calculateMACD = (
  closes: number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MACDResult => {
  const fastEMA = calculateEMA(closes, fastPeriod);
  const slowEMA = calculateEMA(closes, slowPeriod);

  const macd = fastEMA.map((fast, i) => {
    const slow = slowEMA[i];
    if (fast === null || slow === null) return null;
    return fast - slow;
  });

  // 信号线只在有MACD值的区段上计算，再对齐回原长度
  const macdValues = macd.filter((val): val is number => val !== null);
  const signalEMA = calculateEMA(macdValues, signalPeriod);

  const signal: Series = [];
  let signalIndex = 0;

  for (let i = 0; i < macd.length; i++) {
    if (macd[i] === null) {
      signal.push(null);
    } else {
      signal.push(signalEMA[signalIndex] ?? null);
      signalIndex++;
    }
  }

  const histogram = macd.map((macdVal, i) => {
    const signalVal = signal[i];
    if (macdVal === null || signalVal === null) return null;
    return macdVal - signalVal;
  });

  return { macd, signal, histogram };
};

// RSI指标计算（简单平均）
export const calculateRSI = (closes: number[], period: number = 14): Series => {
  if (closes.length < period + 1) {
    return new Array<number | null>(closes.length).fill(null);
  }

  const rsi: Series = [null];

  const priceChanges: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    priceChanges.push(closes[i] - closes[i - 1]);
  }

  for (let i = 0; i < priceChanges.length; i++) {
    if (i < period - 1) {
      rsi.push(null);
      continue;
    }

    const recentChanges = priceChanges.slice(i - period + 1, i + 1);
    const gains = recentChanges.filter(change => change > 0).reduce((sum, gain) => sum + gain, 0);
    const losses = recentChanges.filter(change => change < 0).reduce((sum, loss) => sum - loss, 0);

    const avgGain = gains / period;
    const avgLoss = losses / period;

    if (avgLoss === 0) {
      rsi.push(avgGain === 0 ? 50 : 100);
    } else {
      const rs = avgGain / avgLoss;
      rsi.push(100 - 100 / (1 + rs));
    }
  }

  return rsi;
};

// 布林带指标计算
export interface BOLLResult {
  upper: Series;
  middle: Series;
  lower: Series;
}

export const calculateBOLL = (closes: number[], period: number = 20, multiplier: number = 2): BOLLResult => {
  const middle = calculateSMA(closes, period);
  const upper: Series = [];
  const lower: Series = [];

  for (let i = 0; i < closes.length; i++) {
    const avg = middle[i];
    if (avg === null) {
      upper.push(null);
      lower.push(null);
    } else {
      const stdDev = populationStdDev(closes.slice(i - period + 1, i + 1), avg);
      upper.push(avg + multiplier * stdDev);
      lower.push(avg - multiplier * stdDev);
    }
  }

  return { upper, middle, lower };
};

export const mean = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

export const populationStdDev = (values: number[], avg: number = mean(values)): number => {
  if (values.length === 0) return 0;
  const variance = values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
};

export const calculateKlineIndicators = (candles: Candle[]): KlineIndicators => {
  const closes = candles.map(candle => candle.close);

  return {
    ma5: calculateSMA(closes, 5),
    ma10: calculateSMA(closes, 10),
    ma20: calculateSMA(closes, 20),
    ema12: calculateEMA(closes, 12),
    ema26: calculateEMA(closes, 26),
    macd: calculateMACD(closes),
    rsi: calculateRSI(closes),
    boll: calculateBOLL(closes),
  };
};

/**
 * 价格、成交量、波动率三条曲线
 *
 * 波动率取滑动窗口（min(10, n) 根）收盘价的总体标准差，窗口未满时不输出。
 */
export const buildChartSeries = (candles: Candle[]): ChartSeries => {
  const sorted = [...candles].sort((a, b) => a.timestamp_ms - b.timestamp_ms);
  const windowSize = Math.min(10, sorted.length);
  const volatilityData: VolatilityPoint[] = [];

  sorted.forEach((candle, i) => {
    if (i < windowSize - 1) return;
    const window = sorted.slice(i - windowSize + 1, i + 1).map(item => item.close);
    const avg = mean(window);
    const volatility = populationStdDev(window, avg);

    volatilityData.push({
      date: candle.date,
      timestamp_ms: candle.timestamp_ms,
      volatility,
      volatility_percent: avg > 0 ? (volatility / avg) * 100 : 0,
    });
  });

  return {
    price_data: sorted.map(candle => ({
      date: candle.date,
      timestamp_ms: candle.timestamp_ms,
      price: candle.close,
      high: candle.high,
      low: candle.low,
      open: candle.open,
    })),
    volume_data: sorted.map(candle => ({
      date: candle.date,
      timestamp_ms: candle.timestamp_ms,
      volume: candle.volume,
    })),
    volatility_data: volatilityData,
  };
};
