import { emaSeries, emaStep, smoothingFactor } from './ema';

export interface MacdSettings {
  fastPeriod: number;
  slowPeriod: number;
  signalPeriod: number;
}

export interface MacdSeriesResult {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export const DEFAULT_MACD_SETTINGS: MacdSettings = {
  fastPeriod: 12,
  slowPeriod: 26,
  signalPeriod: 9
};

export function macdSeries(
  closes: readonly number[],
  settings: MacdSettings = DEFAULT_MACD_SETTINGS
): MacdSeriesResult {
  const fastSeries = emaSeries(closes, settings.fastPeriod);
  const slowSeries = emaSeries(closes, settings.slowPeriod);
  const macd = fastSeries.map((fastValue, index) => fastValue - slowSeries[index]);
  const signal = emaSeries(macd, settings.signalPeriod);
  const histogram = macd.map((value, index) => value - signal[index]);

  return { macd, signal, histogram };
}

export interface MacdState {
  fast: number;
  slow: number;
  signal: number;
}

export interface MacdPoint {
  macd: number;
  signal: number;
  hist: number;
}

/**
 * One step of the MACD fold. `previous` is null for the first close, which
 * seeds both EMAs and the signal line.
 */
export const stepMacd = (
  previous: MacdState | null,
  close: number,
  settings: MacdSettings = DEFAULT_MACD_SETTINGS
): { state: MacdState; point: MacdPoint } => {
  if (previous === null) {
    const state = { fast: close, slow: close, signal: 0 };
    return { state, point: { macd: 0, signal: 0, hist: 0 } };
  }

  const fast = emaStep(previous.fast, close, smoothingFactor(settings.fastPeriod));
  const slow = emaStep(previous.slow, close, smoothingFactor(settings.slowPeriod));
  const macd = fast - slow;
  const signal = emaStep(previous.signal, macd, smoothingFactor(settings.signalPeriod));

  return {
    state: { fast, slow, signal },
    point: { macd, signal, hist: macd - signal }
  };
};
