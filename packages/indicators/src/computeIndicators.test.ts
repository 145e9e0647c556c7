import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '@trend-board/core';
import type { Bar } from '@trend-board/core';
import { computeIndicators } from './computeIndicators';
import { macdSeries } from './macd';
import { kdSeries } from './stochastic';
import { buildBar, buildBars, DAY, START } from './testBars';

const KNOWN_CLOSES = [100, 101, 102, 101, 100, 99, 98, 99, 100, 101];

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('computeIndicators', () => {
  it('produces neutral values for a single bar', () => {
    const [bar] = computeIndicators([buildBar(0, 250)]);
    expect(bar.k).toBe(50);
    expect(bar.d).toBe(50);
    expect(bar.macd).toBe(0);
    expect(bar.signal).toBe(bar.macd);
    expect(bar.hist).toBe(0);
  });

  it('keeps length, order and bar fields of the input', () => {
    const bars = buildBars(KNOWN_CLOSES);
    const result = computeIndicators(bars);

    expect(result).toHaveLength(10);
    expect(result.map((bar) => bar.timestamp)).toEqual(bars.map((bar) => bar.timestamp));
    expect(result[3]).toMatchObject(bars[3]);
    expect(result[0].k).toBe(50);
    expect(result[0].d).toBe(50);
    expect(result[0].macd).toBe(0);
  });

  it('matches hand-computed values on the known scenario', () => {
    const result = computeIndicators(buildBars(KNOWN_CLOSES));

    expect(result[1].macd).toBeCloseTo(2 / 13 - 2 / 27, 10);
    expect(result[1].rsv).toBeCloseTo(200 / 3, 10);
    expect(result[1].k).toBeCloseTo(500 / 9, 10);
    expect(result[2].d).toBeCloseTo(4475 / 81, 10);
    expect(result[9].rsv).toBeCloseTo(200 / 3, 10);
  });

  it('agrees with the standalone series functions', () => {
    const bars = buildBars([100, 104, 97, 103, 111, 108, 95, 99, 102, 110, 107, 101]);
    const result = computeIndicators(bars);
    const macd = macdSeries(bars.map((bar) => bar.close));
    const kd = kdSeries(bars);

    expect(result.map((bar) => bar.macd)).toEqual(macd.macd);
    expect(result.map((bar) => bar.signal)).toEqual(macd.signal);
    expect(result.map((bar) => bar.hist)).toEqual(macd.histogram);
    expect(result.map((bar) => bar.rsv)).toEqual(kd.rsv);
    expect(result.map((bar) => bar.k)).toEqual(kd.k);
    expect(result.map((bar) => bar.d)).toEqual(kd.d);
  });

  it('is deterministic', () => {
    const bars = buildBars(KNOWN_CLOSES);
    expect(computeIndicators(bars)).toEqual(computeIndicators(bars));
  });

  it('never changes earlier values when a bar is appended', () => {
    const bars = buildBars([...KNOWN_CLOSES, 140]);
    const prefix = computeIndicators(bars.slice(0, 10));
    const extended = computeIndicators(bars);

    expect(extended.slice(0, 10)).toEqual(prefix);
    expect(extended[0]).toEqual(prefix[0]);
  });

  it('treats zero-range windows as neutral without producing NaN', () => {
    const ramp = buildBars([100, 110, 120]);
    const flat = Array.from({ length: 10 }, (_, offset) => buildBar(3 + offset, 130, 0));
    const result = computeIndicators([...ramp, ...flat]);

    expect(result[11].rsv).toBe(50);
    expect(result[12].rsv).toBe(50);
    expect(result[12].k).toBeCloseTo((2 / 3) * result[11].k + (1 / 3) * 50, 12);
    expect(result[12].d).toBeCloseTo((2 / 3) * result[11].d + (1 / 3) * result[12].k, 12);
    result.forEach((bar) => {
      expect(Number.isFinite(bar.k)).toBe(true);
      expect(Number.isFinite(bar.d)).toBe(true);
    });
  });

  it('does not mutate its input', () => {
    const bars = buildBars(KNOWN_CLOSES);
    const copy = bars.map((bar) => ({ ...bar }));
    computeIndicators(bars);
    expect(bars).toEqual(copy);
  });

  describe('invalid input', () => {
    it('rejects an empty series', () => {
      const error = captureError(() => computeIndicators([]));
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ reason: 'empty_series' });
    });

    it('rejects a zero close', () => {
      const bars: Bar[] = buildBars([100, 101, 102]);
      bars[1] = { ...bars[1], close: 0 };
      const error = captureError(() => computeIndicators(bars));
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ reason: 'invalid_price', index: 1 });
    });

    it('rejects non-finite prices', () => {
      const bars: Bar[] = buildBars([100, 101]);
      bars[0] = { ...bars[0], high: Number.POSITIVE_INFINITY };
      expect(() => computeIndicators(bars)).toThrow('Bar 0 has invalid high: Infinity');
    });

    it('rejects duplicate timestamps', () => {
      const bars: Bar[] = buildBars([100, 101, 102]);
      bars[2] = { ...bars[2], timestamp: bars[1].timestamp };
      const error = captureError(() => computeIndicators(bars));
      expect(error).toMatchObject({ reason: 'unordered_timestamps', index: 2 });
    });

    it('rejects out-of-order timestamps', () => {
      const bars = [buildBar(1, 100), buildBar(0, 101)];
      const error = captureError(() => computeIndicators(bars));
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ reason: 'unordered_timestamps', index: 1 });
    });

    it('rejects non-finite timestamps', () => {
      const bars: Bar[] = [{ ...buildBar(0, 100), timestamp: Number.NaN }];
      const error = captureError(() => computeIndicators(bars));
      expect(error).toMatchObject({ reason: 'invalid_timestamp', index: 0 });
    });

    it('accepts calendar gaps', () => {
      const bars = [buildBar(0, 100), { ...buildBar(0, 101), timestamp: START + 5 * DAY }];
      expect(computeIndicators(bars)).toHaveLength(2);
    });
  });
});
