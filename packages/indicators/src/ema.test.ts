import { describe, expect, it } from 'vitest';
import { emaSeries, emaStep, smoothingFactor } from './ema';

describe('emaSeries', () => {
  it('seeds with the first sample', () => {
    expect(emaSeries([10, 20], 3)).toEqual([10, 15]);
  });

  it('tracks the input exactly when length is 1', () => {
    expect(emaSeries([1, 2, 3], 1)).toEqual([1, 2, 3]);
  });

  it('returns an empty series for empty input', () => {
    expect(emaSeries([], 12)).toEqual([]);
  });

  it('uses every prior sample rather than a warm-up window', () => {
    const full = emaSeries([100, 90, 110, 105], 2);
    const truncated = emaSeries([110, 105], 2);
    expect(full[3]).not.toBeCloseTo(truncated[1], 6);
  });

  it('rejects non-positive or fractional lengths', () => {
    expect(() => emaSeries([1], 0)).toThrow('EMA length must be a positive integer');
    expect(() => smoothingFactor(2.5)).toThrow('EMA length must be a positive integer');
  });
});

describe('emaStep', () => {
  it('weights the new value by alpha', () => {
    expect(emaStep(100, 110, 0.2)).toBeCloseTo(102, 12);
  });
});
