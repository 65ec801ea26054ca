/**
 * Indicator series helpers. Every function returns a series aligned with its
 * input; positions before the lookback has filled are NaN.
 */

const windowValues = (values: number[], end: number, period: number): number[] | null => {
  const start = end - period + 1;
  if (start < 0) return null;
  return values.slice(start, end + 1);
};

export function sma(values: number[], period: number): number[] {
  return values.map((_, index) => {
    const window = windowValues(values, index, period);
    if (!window) return NaN;
    return window.reduce((sum, value) => sum + value, 0) / period;
  });
}

export function ema(values: number[], period: number): number[] {
  if (values.length === 0) {
    return [];
  }

  const k = 2 / (period + 1);
  const result: number[] = [values[0]];

  for (let i = 1; i < values.length; i += 1) {
    const prev = result[i - 1];
    result.push(values[i] * k + prev * (1 - k));
  }

  return result;
}

const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
};

export function rsi(values: number[], period = 14): number[] {
  const result: number[] = new Array(values.length).fill(NaN);
  if (values.length <= period) {
    return result;
  }

  let gainSum = 0;
  let lossSum = 0;
  for (let i = 1; i <= period; i += 1) {
    const delta = values[i] - values[i - 1];
    if (delta >= 0) {
      gainSum += delta;
    } else {
      lossSum += Math.abs(delta);
    }
  }

  let avgGain = gainSum / period;
  let avgLoss = lossSum / period;
  result[period] = rsiFromAverages(avgGain, avgLoss);

  for (let i = period + 1; i < values.length; i += 1) {
    const delta = values[i] - values[i - 1];
    const gain = Math.max(delta, 0);
    const loss = Math.max(-delta, 0);

    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    result[i] = rsiFromAverages(avgGain, avgLoss);
  }

  return result;
}

export function trueRange(highs: number[], lows: number[], closes: number[]): number[] {
  const length = Math.min(highs.length, lows.length, closes.length);
  const ranges: number[] = new Array(length).fill(0);

  for (let i = 0; i < length; i += 1) {
    if (i === 0) {
      ranges[i] = highs[i] - lows[i];
      continue;
    }

    const highLow = highs[i] - lows[i];
    const highClose = Math.abs(highs[i] - closes[i - 1]);
    const lowClose = Math.abs(lows[i] - closes[i - 1]);
    ranges[i] = Math.max(highLow, highClose, lowClose);
  }

  return ranges;
}

export function atr(
  highs: number[],
  lows: number[],
  closes: number[],
  period = 14,
): number[] {
  const trueRanges = trueRange(highs, lows, closes);
  const result: number[] = new Array(trueRanges.length).fill(NaN);

  let trSum = 0;
  for (let i = 0; i < trueRanges.length; i += 1) {
    if (i < period) {
      trSum += trueRanges[i];
      if (i === period - 1) {
        result[i] = trSum / period;
      }
      continue;
    }
    result[i] = (result[i - 1] * (period - 1) + trueRanges[i]) / period;
  }

  return result;
}

export function macd(
  values: number[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9,
): { macdLine: number[]; signalLine: number[]; histogram: number[] } {
  if (values.length === 0) {
    return { macdLine: [], signalLine: [], histogram: [] };
  }

  const emaFast = ema(values, fastPeriod);
  const emaSlow = ema(values, slowPeriod);
  const macdLine = values.map((_, index) => emaFast[index] - emaSlow[index]);
  const signalLine = ema(macdLine, signalPeriod);
  const histogram = macdLine.map((value, index) => value - signalLine[index]);

  return { macdLine, signalLine, histogram };
}

/** Wilder's ADX with the directional indicators it is derived from. */
export function adx(
  highs: number[],
  lows: number[],
  closes: number[],
  period = 14,
): { adx: number[]; plusDi: number[]; minusDi: number[] } {
  const length = Math.min(highs.length, lows.length, closes.length);
  const adxValues: number[] = new Array(length).fill(NaN);
  const plusDi: number[] = new Array(length).fill(NaN);
  const minusDi: number[] = new Array(length).fill(NaN);
  if (length <= period) {
    return { adx: adxValues, plusDi, minusDi };
  }

  const trueRanges = trueRange(highs, lows, closes);
  const dx: number[] = new Array(length).fill(NaN);
  let smoothedTr = 0;
  let smoothedPlus = 0;
  let smoothedMinus = 0;

  for (let i = 1; i < length; i += 1) {
    const upMove = highs[i] - highs[i - 1];
    const downMove = lows[i - 1] - lows[i];
    const plusDm = upMove > downMove && upMove > 0 ? upMove : 0;
    const minusDm = downMove > upMove && downMove > 0 ? downMove : 0;

    if (i <= period) {
      smoothedTr += trueRanges[i];
      smoothedPlus += plusDm;
      smoothedMinus += minusDm;
      if (i < period) continue;
    } else {
      smoothedTr = smoothedTr - smoothedTr / period + trueRanges[i];
      smoothedPlus = smoothedPlus - smoothedPlus / period + plusDm;
      smoothedMinus = smoothedMinus - smoothedMinus / period + minusDm;
    }

    plusDi[i] = smoothedTr === 0 ? 0 : (100 * smoothedPlus) / smoothedTr;
    minusDi[i] = smoothedTr === 0 ? 0 : (100 * smoothedMinus) / smoothedTr;
    const diSum = plusDi[i] + minusDi[i];
    dx[i] = diSum === 0 ? 0 : (100 * Math.abs(plusDi[i] - minusDi[i])) / diSum;
  }

  const firstAdx = 2 * period - 1;
  if (length <= firstAdx) {
    return { adx: adxValues, plusDi, minusDi };
  }

  let dxSum = 0;
  for (let i = period; i <= firstAdx; i += 1) {
    dxSum += dx[i];
  }
  adxValues[firstAdx] = dxSum / period;
  for (let i = firstAdx + 1; i < length; i += 1) {
    adxValues[i] = (adxValues[i - 1] * (period - 1) + dx[i]) / period;
  }

  return { adx: adxValues, plusDi, minusDi };
}

const highestLowest = (
  highs: number[],
  lows: number[],
  end: number,
  period: number,
): { highest: number; lowest: number } | null => {
  const windowHighs = windowValues(highs, end, period);
  const windowLows = windowValues(lows, end, period);
  if (!windowHighs || !windowLows) return null;
  return { highest: Math.max(...windowHighs), lowest: Math.min(...windowLows) };
};

export function stochastic(
  highs: number[],
  lows: number[],
  closes: number[],
  kPeriod = 14,
  dPeriod = 3,
): { k: number[]; d: number[] } {
  const k = closes.map((close, index) => {
    const range = highestLowest(highs, lows, index, kPeriod);
    if (!range) return NaN;
    const span = range.highest - range.lowest;
    return span === 0 ? 50 : (100 * (close - range.lowest)) / span;
  });

  return { k, d: sma(k, dPeriod) };
}

export function cci(highs: number[], lows: number[], closes: number[], period = 20): number[] {
  const typical = closes.map((close, index) => (highs[index] + lows[index] + close) / 3);
  const average = sma(typical, period);

  return typical.map((value, index) => {
    const window = windowValues(typical, index, period);
    if (!window) return NaN;
    const mean = average[index];
    const meanDeviation = window.reduce((sum, item) => sum + Math.abs(item - mean), 0) / period;
    return meanDeviation === 0 ? 0 : (value - mean) / (0.015 * meanDeviation);
  });
}

export function williamsR(
  highs: number[],
  lows: number[],
  closes: number[],
  period = 14,
): number[] {
  return closes.map((close, index) => {
    const range = highestLowest(highs, lows, index, period);
    if (!range) return NaN;
    const span = range.highest - range.lowest;
    return span === 0 ? -50 : (-100 * (range.highest - close)) / span;
  });
}

export interface BollingerBands {
  upper: number[];
  middle: number[];
  lower: number[];
  percent: number[];
  width: number[];
}

export function bollinger(values: number[], period = 20, stdDev = 2): BollingerBands {
  const middle = sma(values, period);
  const upper: number[] = [];
  const lower: number[] = [];
  const percent: number[] = [];
  const width: number[] = [];

  values.forEach((value, index) => {
    const window = windowValues(values, index, period);
    if (!window) {
      upper.push(NaN);
      lower.push(NaN);
      percent.push(NaN);
      width.push(NaN);
      return;
    }

    const mean = middle[index];
    const variance = window.reduce((sum, item) => sum + (item - mean) ** 2, 0) / period;
    const deviation = Math.sqrt(variance) * stdDev;
    const up = mean + deviation;
    const low = mean - deviation;
    upper.push(up);
    lower.push(low);
    percent.push((value - low) / (up - low));
    width.push((up - low) / mean);
  });

  return { upper, middle, lower, percent, width };
}

export function keltner(
  highs: number[],
  lows: number[],
  closes: number[],
  period = 20,
  atrPeriod = 10,
  multiplier = 2,
): { upper: number[]; middle: number[]; lower: number[] } {
  const middle = ema(closes, period);
  const ranges = atr(highs, lows, closes, atrPeriod);

  return {
    upper: middle.map((value, index) => value + multiplier * ranges[index]),
    middle,
    lower: middle.map((value, index) => value - multiplier * ranges[index]),
  };
}

export function obv(closes: number[], volumes: number[]): number[] {
  const result: number[] = [];
  closes.forEach((close, index) => {
    if (index === 0) {
      result.push(0);
      return;
    }
    const prev = result[index - 1];
    if (close > closes[index - 1]) {
      result.push(prev + volumes[index]);
    } else if (close < closes[index - 1]) {
      result.push(prev - volumes[index]);
    } else {
      result.push(prev);
    }
  });
  return result;
}

/** Rolling volume-weighted average of the typical price. */
export function vwap(
  highs: number[],
  lows: number[],
  closes: number[],
  volumes: number[],
  period = 14,
): number[] {
  const typical = closes.map((close, index) => (highs[index] + lows[index] + close) / 3);
  return typical.map((_, index) => {
    const prices = windowValues(typical, index, period);
    const window = windowValues(volumes, index, period);
    if (!prices || !window) return NaN;
    const volume = window.reduce((sum, value) => sum + value, 0);
    const weighted = prices.reduce((sum, price, offset) => sum + price * window[offset], 0);
    return weighted / volume;
  });
}

export interface PivotLevels {
  pivot: number;
  r1: number;
  r2: number;
  r3: number;
  s1: number;
  s2: number;
  s3: number;
}

export function pivotPoints(high: number, low: number, close: number): PivotLevels {
  const pivot = (high + low + close) / 3;
  return {
    pivot,
    r1: 2 * pivot - low,
    s1: 2 * pivot - high,
    r2: pivot + (high - low),
    s2: pivot - (high - low),
    r3: high + 2 * (pivot - low),
    s3: low - 2 * (high - pivot),
  };
}

export const FIBONACCI_RATIOS: Record<string, number> = {
  fib_0: 0,
  fib_236: 0.236,
  fib_382: 0.382,
  fib_500: 0.5,
  fib_618: 0.618,
  fib_786: 0.786,
  fib_100: 1,
};

export function fibonacciLevels(highs: number[], lows: number[], lookback = 50): Record<string, number> {
  const recentHighs = highs.slice(-lookback);
  const recentLows = lows.slice(-lookback);
  const high = Math.max(...recentHighs);
  const low = Math.min(...recentLows);
  const diff = high - low;

  return Object.fromEntries(
    Object.entries(FIBONACCI_RATIOS).map(([name, ratio]) => [name, low + diff * ratio]),
  );
}

export const last = (values: number[]): number =>
  values.length === 0 ? NaN : values[values.length - 1];

/** Difference between the last value and the value `lookback` bars earlier. */
export const change = (values: number[], lookback: number): number => {
  const end = values.length - 1;
  const start = end - lookback;
  if (start < 0) return NaN;
  return values[end] - values[start];
};
