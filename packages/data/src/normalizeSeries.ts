import type { Bar } from "@trend-board/core";

export interface NormalizeResult {
	bars: Bar[];
	/** Rows removed because a field was missing or non-finite. */
	dropped: number;
	/** Rows replaced by a later row with the same timestamp. */
	duplicates: number;
}

const isComplete = (bar: Bar): boolean =>
	Number.isFinite(bar.timestamp) &&
	Number.isFinite(bar.open) &&
	Number.isFinite(bar.high) &&
	Number.isFinite(bar.low) &&
	Number.isFinite(bar.close) &&
	Number.isFinite(bar.volume);

/**
 * Sorts ascending by timestamp and deduplicates (last write wins). Input order
 * is preserved among equal timestamps, so "last" means last in the input.
 */
export const normalizeSeries = (rows: readonly Bar[]): NormalizeResult => {
	const complete = rows.filter(isComplete);
	const dropped = rows.length - complete.length;

	const sorted = complete
		.map((bar, position) => ({ bar, position }))
		.sort((a, b) => a.bar.timestamp - b.bar.timestamp || a.position - b.position)
		.map(({ bar }) => bar);

	const bars: Bar[] = [];
	let duplicates = 0;
	for (const bar of sorted) {
		const last = bars[bars.length - 1];
		if (last && last.timestamp === bar.timestamp) {
			bars[bars.length - 1] = bar;
			duplicates += 1;
		} else {
			bars.push(bar);
		}
	}

	return { bars, dropped, duplicates };
};
