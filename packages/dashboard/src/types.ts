import type { IndicatorBar, SymbolSpec } from "@trend-board/core";

export type Direction = "up" | "down";

export interface QuoteSummary {
	readonly lastClose: number;
	readonly previousClose: number | null;
	readonly change: number | null;
	readonly changePct: number | null;
	readonly direction: Direction | "flat";
}

export interface CandlePoint {
	readonly timestamp: number;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly direction: Direction;
}

export interface VolumePoint {
	readonly timestamp: number;
	readonly volume: number;
	readonly direction: Direction;
}

export interface LinePoint {
	readonly timestamp: number;
	readonly value: number;
}

export interface HistogramPoint extends LinePoint {
	readonly direction: Direction;
}

export interface ReferenceBands {
	readonly upper: number;
	readonly lower: number;
}

/**
 * Four panels sharing one time axis: price, volume, KD and MACD.
 * Cached views are shared between snapshots, so nothing here is writable.
 */
export interface ChartPanels {
	readonly timestamps: readonly number[];
	readonly price: readonly CandlePoint[];
	readonly volume: readonly VolumePoint[];
	readonly kd: {
		readonly k: readonly LinePoint[];
		readonly d: readonly LinePoint[];
		readonly bands: ReferenceBands;
	};
	readonly macd: {
		readonly histogram: readonly HistogramPoint[];
		readonly macd: readonly LinePoint[];
		readonly signal: readonly LinePoint[];
	};
}

export type NoticeReason = "no_data" | "invalid_data" | "fetch_failed";

export interface DashboardNotice {
	level: "warning";
	reason: NoticeReason;
	symbol: string;
	message: string;
}

export interface SymbolView {
	readonly status: "ok";
	readonly spec: Readonly<SymbolSpec>;
	readonly bars: readonly IndicatorBar[];
	readonly quote: QuoteSummary;
	readonly panels: ChartPanels;
}

export interface SymbolNotice {
	readonly status: "notice";
	readonly spec: Readonly<SymbolSpec>;
	readonly notice: Readonly<DashboardNotice>;
}

export type SymbolResult = SymbolView | SymbolNotice;

export interface DashboardSnapshot {
	updatedAt: number;
	results: SymbolResult[];
}

/**
 * Anything that can display a snapshot. Styling is left to the surface.
 */
export interface RenderSurface {
	render(snapshot: DashboardSnapshot): void;
}
