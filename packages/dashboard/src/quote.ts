import type { Bar } from "@trend-board/core";
import type { QuoteSummary } from "./types";

/**
 * Headline quote: last close against the previous close. A single-bar series
 * has no change.
 */
export const summarizeQuote = (bars: readonly Bar[]): QuoteSummary => {
	const last = bars[bars.length - 1];
	if (!last) {
		throw new Error("Cannot summarize an empty series");
	}
	const previous = bars.length > 1 ? bars[bars.length - 2] : undefined;
	if (!previous) {
		return {
			lastClose: last.close,
			previousClose: null,
			change: null,
			changePct: null,
			direction: "flat",
		};
	}

	const change = last.close - previous.close;
	return {
		lastClose: last.close,
		previousClose: previous.close,
		change,
		changePct: (change / previous.close) * 100,
		direction: change > 0 ? "up" : change < 0 ? "down" : "flat",
	};
};
