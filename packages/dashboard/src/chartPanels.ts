import type { IndicatorBar } from "@trend-board/core";
import type { ChartPanels, Direction, ReferenceBands } from "./types";

export const KD_BANDS: ReferenceBands = { upper: 80, lower: 20 };

const barDirection = (bar: IndicatorBar): Direction =>
	bar.close >= bar.open ? "up" : "down";

const signDirection = (value: number): Direction => (value >= 0 ? "up" : "down");

export const buildChartPanels = (
	bars: readonly IndicatorBar[],
	bands: ReferenceBands = KD_BANDS
): ChartPanels => ({
	timestamps: bars.map((bar) => bar.timestamp),
	price: bars.map((bar) => ({
		timestamp: bar.timestamp,
		open: bar.open,
		high: bar.high,
		low: bar.low,
		close: bar.close,
		direction: barDirection(bar),
	})),
	volume: bars.map((bar) => ({
		timestamp: bar.timestamp,
		volume: bar.volume,
		direction: barDirection(bar),
	})),
	kd: {
		k: bars.map((bar) => ({ timestamp: bar.timestamp, value: bar.k })),
		d: bars.map((bar) => ({ timestamp: bar.timestamp, value: bar.d })),
		bands: { ...bands },
	},
	macd: {
		histogram: bars.map((bar) => ({
			timestamp: bar.timestamp,
			value: bar.hist,
			direction: signDirection(bar.hist),
		})),
		macd: bars.map((bar) => ({ timestamp: bar.timestamp, value: bar.macd })),
		signal: bars.map((bar) => ({ timestamp: bar.timestamp, value: bar.signal })),
	},
});
