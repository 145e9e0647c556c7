import { InvalidInputError } from '@trend-board/core';
import type { Bar } from '@trend-board/core';

const PRICE_FIELDS = ['open', 'high', 'low', 'close'] as const;

/**
 * Precondition of the indicator engine: non-empty, finite positive prices,
 * strictly increasing finite timestamps.
 */
export function validateSeries(series: readonly Bar[]): void {
  if (series.length === 0) {
    throw new InvalidInputError('empty_series', 'Series must contain at least one bar');
  }

  let previousTimestamp = Number.NEGATIVE_INFINITY;
  series.forEach((bar, index) => {
    for (const field of PRICE_FIELDS) {
      const value = bar[field];
      if (!Number.isFinite(value) || value <= 0) {
        throw new InvalidInputError(
          'invalid_price',
          `Bar ${index} has invalid ${field}: ${value}`,
          index
        );
      }
    }

    if (!Number.isFinite(bar.timestamp)) {
      throw new InvalidInputError(
        'invalid_timestamp',
        `Bar ${index} has invalid timestamp: ${bar.timestamp}`,
        index
      );
    }
    if (bar.timestamp <= previousTimestamp) {
      throw new InvalidInputError(
        'unordered_timestamps',
        `Bar ${index} timestamp ${bar.timestamp} does not follow ${previousTimestamp}`,
        index
      );
    }
    previousTimestamp = bar.timestamp;
  });
}
