/**
 * One trading period. Timestamps are UTC epoch milliseconds.
 */
export interface Bar {
	readonly timestamp: number;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
}

/**
 * Bars sorted ascending by timestamp, unique timestamps, calendar gaps allowed.
 */
export type Series = readonly Bar[];

export interface MacdFields {
	readonly macd: number;
	readonly signal: number;
	readonly hist: number;
}

export interface KdFields {
	/** Effective raw stochastic value; 50 on a zero-range window. */
	readonly rsv: number;
	readonly k: number;
	readonly d: number;
}

export type IndicatorBar = Bar & MacdFields & KdFields;

export interface SymbolSpec {
	symbol: string;
	label: string;
}
