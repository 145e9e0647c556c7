import type { Bar } from '@trend-board/core';

export type StochasticInput = Pick<Bar, 'high' | 'low' | 'close'>;

export interface KdSettings {
  /** Trailing high/low window, shrinking at the start of the series. */
  period: number;
  kSmoothing: number;
  dSmoothing: number;
  /** K and D at index 0, and RSV on a zero-range window. */
  seed: number;
}

export interface KdSeriesResult {
  rsv: number[];
  k: number[];
  d: number[];
}

export const DEFAULT_KD_SETTINGS: KdSettings = {
  period: 9,
  kSmoothing: 3,
  dSmoothing: 3,
  seed: 50
};

const assertPositiveInteger = (value: number, name: string): void => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
};

export const assertKdSettings = (settings: KdSettings): void => {
  assertPositiveInteger(settings.period, 'KD period');
  assertPositiveInteger(settings.kSmoothing, 'K smoothing');
  assertPositiveInteger(settings.dSmoothing, 'D smoothing');
  if (!Number.isFinite(settings.seed)) {
    throw new Error(`KD seed must be finite, got ${settings.seed}`);
  }
};

export const rsvAt = (
  bars: readonly StochasticInput[],
  index: number,
  period: number,
  neutral: number
): number => {
  const start = Math.max(0, index - period + 1);
  let lowMin = Number.POSITIVE_INFINITY;
  let highMax = Number.NEGATIVE_INFINITY;

  for (let j = start; j <= index; j += 1) {
    lowMin = Math.min(lowMin, bars[j].low);
    highMax = Math.max(highMax, bars[j].high);
  }

  if (highMax === lowMin) {
    return neutral;
  }
  return ((bars[index].close - lowMin) / (highMax - lowMin)) * 100;
};

export function rsvSeries(
  bars: readonly StochasticInput[],
  period = DEFAULT_KD_SETTINGS.period,
  neutral = DEFAULT_KD_SETTINGS.seed
): number[] {
  assertPositiveInteger(period, 'KD period');
  return bars.map((_, index) => rsvAt(bars, index, period, neutral));
}

/**
 * Recursive smoothing with weight 1/N on the new value: `(N-1)/N * prev + 1/N * next`.
 */
export const smoothStep = (previous: number, next: number, smoothing: number): number =>
  ((smoothing - 1) / smoothing) * previous + (1 / smoothing) * next;

export interface KdState {
  k: number;
  d: number;
}

export const stepKd = (
  previous: KdState | null,
  rsv: number,
  settings: KdSettings = DEFAULT_KD_SETTINGS
): KdState => {
  if (previous === null) {
    return { k: settings.seed, d: settings.seed };
  }
  const k = smoothStep(previous.k, rsv, settings.kSmoothing);
  const d = smoothStep(previous.d, k, settings.dSmoothing);
  return { k, d };
};

export function kdSeries(
  bars: readonly StochasticInput[],
  settings: KdSettings = DEFAULT_KD_SETTINGS
): KdSeriesResult {
  assertKdSettings(settings);
  const rsv = rsvSeries(bars, settings.period, settings.seed);
  const k: number[] = [];
  const d: number[] = [];
  let state: KdState | null = null;

  rsv.forEach((value) => {
    state = stepKd(state, value, settings);
    k.push(state.k);
    d.push(state.d);
  });

  return { rsv, k, d };
}
