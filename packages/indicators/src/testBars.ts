import type { Bar } from '@trend-board/core';

export const DAY = 86_400_000;
export const START = Date.UTC(2024, 0, 1);

export const buildBar = (index: number, close: number, spread = 1): Bar => ({
  timestamp: START + index * DAY,
  open: close,
  high: close + spread,
  low: close - spread,
  close,
  volume: 1_000 + index
});

export const buildBars = (closes: readonly number[], spread = 1): Bar[] =>
  closes.map((close, index) => buildBar(index, close, spread));
