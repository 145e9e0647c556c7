export const smoothingFactor = (length: number): number => {
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error(`EMA length must be a positive integer, got ${length}`);
  }
  return 2 / (length + 1);
};

export const emaStep = (previous: number, value: number, alpha: number): number =>
  alpha * value + (1 - alpha) * previous;

/**
 * Full-history EMA seeded with the first sample (no SMA warm-up), so every
 * output depends on the entire prefix before it.
 */
export function emaSeries(values: readonly number[], length: number): number[] {
  const alpha = smoothingFactor(length);
  const series: number[] = [];
  let emaValue = 0;

  values.forEach((value, index) => {
    emaValue = index === 0 ? value : emaStep(emaValue, value, alpha);
    series.push(emaValue);
  });

  return series;
}
