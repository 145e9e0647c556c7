import type { Bar, ModuleLogger } from "@trend-board/core";

/**
 * Read-only OHLCV access for one venue. Bars come back in venue order and may
 * overlap between calls; callers normalize.
 */
export interface MarketDataClient {
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Bar[]>;
}

export interface SeriesRequest {
	symbol: string;
	timeframe: string;
	/** Number of timeframe periods ending now. */
	lookback: number;
}

/**
 * Yields an ordered, deduplicated series for a symbol. An empty array means
 * "no data available".
 */
export interface SeriesSource {
	loadSeries(request: SeriesRequest): Promise<Bar[]>;
}

export interface DataProviderConfig {
	client: MarketDataClient;
	batchSize?: number;
	maxIterations?: number;
	logger?: ModuleLogger;
	now?: () => number;
}
