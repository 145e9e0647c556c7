export { emaSeries, emaStep, smoothingFactor } from './ema';
export { macdSeries, stepMacd, DEFAULT_MACD_SETTINGS } from './macd';
export type { MacdSettings, MacdSeriesResult, MacdState, MacdPoint } from './macd';
export {
  kdSeries,
  rsvSeries,
  rsvAt,
  stepKd,
  smoothStep,
  assertKdSettings,
  DEFAULT_KD_SETTINGS
} from './stochastic';
export type { KdSettings, KdSeriesResult, KdState, StochasticInput } from './stochastic';
export { validateSeries } from './validateSeries';
export { computeIndicators, DEFAULT_INDICATOR_SETTINGS } from './computeIndicators';
export type { IndicatorSettings } from './computeIndicators';
