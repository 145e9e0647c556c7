import type { Bar } from "@trend-board/core";
import type { MarketDataClient } from "./types";

export const DAY = 86_400_000;

export const buildDailyBars = (count: number, start: number): Bar[] =>
	Array.from({ length: count }, (_, idx) => ({
		timestamp: start + idx * DAY,
		open: 100 + idx,
		high: 101 + idx,
		low: 99 + idx,
		close: 100 + idx,
		volume: 1_000 + idx,
	}));

/**
 * In-process venue: serves bars at or after `since`, at most `limit` per call.
 */
export class StaticMarketDataClient implements MarketDataClient {
	readonly calls: Array<{ symbol: string; limit?: number; since?: number }> = [];

	constructor(private readonly barsBySymbol: Record<string, Bar[]>) {}

	async fetchOHLCV(
		symbol: string,
		_timeframe: string,
		limit = 500,
		since = 0
	): Promise<Bar[]> {
		this.calls.push({ symbol, limit, since });
		const series = (this.barsBySymbol[symbol] ?? []).filter(
			(bar) => bar.timestamp >= since
		);
		return series.slice(0, limit);
	}
}
