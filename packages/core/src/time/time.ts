/**
 * Pure time utilities for daily series handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */

import { DAY_MS, HOUR_MS, MINUTE_MS } from "./constants";

export interface ParsedTimeframe {
	unit: "m" | "h" | "d" | "w";
	n: number;
	ms: number;
}

const TIMEFRAME_PATTERN = /^(\d+)([mhdw])$/;

const UNIT_MS: Record<ParsedTimeframe["unit"], number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
	w: 7 * DAY_MS,
};

const isUnit = (value: string): value is ParsedTimeframe["unit"] =>
	value in UNIT_MS;

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "1m", "15m", "1h", "4h", "1d", "1w"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1h", "1d", "1w"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}
	if (!isUnit(unit)) {
		throw new Error(`Invalid timeframe unit: "${unit}" in "${timeframe}"`);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Start of the lookback window that ends at `now`
 * @example lookbackStart(864_000_000, 3, "1d") => 604_800_000
 */
export const lookbackStart = (
	now: number,
	periods: number,
	timeframe: string
): number => {
	if (!Number.isInteger(periods) || periods <= 0) {
		throw new Error(`Invalid lookback: expected positive integer, got ${periods}`);
	}
	return Math.max(0, now - periods * timeframeToMs(timeframe));
};

/**
 * Number of `timeframe` periods covering `days` calendar days, rounded up
 * @example lookbackPeriods(90, "4h") => 540
 */
export const lookbackPeriods = (days: number, timeframe: string): number => {
	if (!Number.isInteger(days) || days <= 0) {
		throw new Error(`Invalid lookback: expected positive integer days, got ${days}`);
	}
	return Math.ceil((days * DAY_MS) / timeframeToMs(timeframe));
};

/**
 * Format a timestamp as its UTC calendar day ("2024-03-01")
 */
export const toIsoDay = (ts: number): string => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	return new Date(ts).toISOString().slice(0, 10);
};
