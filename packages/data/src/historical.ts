import { lookbackStart, timeframeToMs } from "@trend-board/core";
import type { Bar, ModuleLogger } from "@trend-board/core";
import { normalizeSeries } from "./normalizeSeries";
import type { MarketDataClient, SeriesRequest } from "./types";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 20;

export interface SeriesFetchOptions {
	client: MarketDataClient;
	request: SeriesRequest;
	now: number;
	batchSize?: number;
	maxIterations?: number;
	logger?: ModuleLogger;
}

/**
 * Pages through `[now - lookback, now]` and returns the normalized series.
 * Stops on an empty batch, on a batch that does not advance, or past `now`.
 */
export const fetchSeries = async (options: SeriesFetchOptions): Promise<Bar[]> => {
	const { client, request, now, logger } = options;
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);
	const timeframeMs = timeframeToMs(request.timeframe);
	const start = lookbackStart(now, request.lookback, request.timeframe);

	const rows: Bar[] = [];
	let since = start;
	let iterations = 0;

	while (since <= now && iterations < maxIterations) {
		iterations += 1;
		const batch = await client.fetchOHLCV(
			request.symbol,
			request.timeframe,
			batchSize,
			since
		);
		if (!batch.length) {
			break;
		}
		rows.push(...batch);

		const lastTimestamp = batch.reduce(
			(max, bar) => (Number.isFinite(bar.timestamp) ? Math.max(max, bar.timestamp) : max),
			Number.NEGATIVE_INFINITY
		);
		if (!Number.isFinite(lastTimestamp) || lastTimestamp < since) {
			break;
		}
		if (batch.length < batchSize) {
			break;
		}
		since = lastTimestamp + timeframeMs;
	}

	const normalized = normalizeSeries(rows);
	const bars = normalized.bars.filter(
		(bar) => bar.timestamp >= start && bar.timestamp <= now
	);

	if (normalized.dropped > 0 || normalized.duplicates > 0) {
		logger?.warn("series_normalized", {
			symbol: request.symbol,
			dropped: normalized.dropped,
			duplicates: normalized.duplicates,
		});
	}
	logger?.debug("series_fetched", {
		symbol: request.symbol,
		timeframe: request.timeframe,
		bars: bars.length,
		iterations,
	});

	return bars;
};
