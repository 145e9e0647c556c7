import type { Bar, IndicatorBar } from '@trend-board/core';
import { smoothingFactor } from './ema';
import { DEFAULT_MACD_SETTINGS, stepMacd } from './macd';
import type { MacdSettings, MacdState } from './macd';
import { assertKdSettings, DEFAULT_KD_SETTINGS, rsvAt, stepKd } from './stochastic';
import type { KdSettings, KdState } from './stochastic';
import { validateSeries } from './validateSeries';

export interface IndicatorSettings {
  macd: MacdSettings;
  kd: KdSettings;
}

export const DEFAULT_INDICATOR_SETTINGS: IndicatorSettings = {
  macd: DEFAULT_MACD_SETTINGS,
  kd: DEFAULT_KD_SETTINGS
};

interface FoldState {
  macd: MacdState | null;
  kd: KdState | null;
}

/**
 * MACD(12, 26, 9) and KD(9, 3, 3) over the whole series in one pass.
 *
 * Both indicators are recursive from index 0, so the output for a series is
 * always recomputed from scratch; there is no resumable state. Throws
 * `InvalidInputError` before producing anything when the series is malformed.
 */
export function computeIndicators(
  series: readonly Bar[],
  settings: IndicatorSettings = DEFAULT_INDICATOR_SETTINGS
): IndicatorBar[] {
  validateSeries(series);
  smoothingFactor(settings.macd.fastPeriod);
  smoothingFactor(settings.macd.slowPeriod);
  smoothingFactor(settings.macd.signalPeriod);
  assertKdSettings(settings.kd);

  const output: IndicatorBar[] = [];
  let state: FoldState = { macd: null, kd: null };

  series.forEach((bar, index) => {
    const macd = stepMacd(state.macd, bar.close, settings.macd);
    const rsv = rsvAt(series, index, settings.kd.period, settings.kd.seed);
    const kd = stepKd(state.kd, rsv, settings.kd);
    state = { macd: macd.state, kd };

    output.push({
      timestamp: bar.timestamp,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
      macd: macd.point.macd,
      signal: macd.point.signal,
      hist: macd.point.hist,
      rsv,
      k: kd.k,
      d: kd.d
    });
  });

  return output;
}
