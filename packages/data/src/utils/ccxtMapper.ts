import type { OHLCV } from "ccxt";
import type { Bar } from "@trend-board/core";

/**
 * Maps a CCXT OHLCV row to a Bar. Missing fields become NaN so that
 * normalization can drop the row instead of inventing a zero price.
 */
export const mapCcxtRowToBar = (row: OHLCV): Bar => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		timestamp: Number(timestamp ?? Number.NaN),
		open: Number(open ?? Number.NaN),
		high: Number(high ?? Number.NaN),
		low: Number(low ?? Number.NaN),
		close: Number(close ?? Number.NaN),
		volume: Number(volume ?? 0),
	};
};
