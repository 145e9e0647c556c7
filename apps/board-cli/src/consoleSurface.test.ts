import { describe, expect, it } from "vitest";
import type { IndicatorBar } from "@trend-board/core";
import { buildChartPanels, summarizeQuote } from "@trend-board/dashboard";
import type { DashboardSnapshot, SymbolView } from "@trend-board/dashboard";
import { ConsoleRenderSurface, formatQuoteLine, tailRows } from "./consoleSurface";

const START = Date.UTC(2024, 2, 1);
const DAY = 86_400_000;

const bar = (idx: number, close: number, k: number): IndicatorBar => ({
	timestamp: START + idx * DAY,
	open: close,
	high: close + 1,
	low: close - 1,
	close,
	volume: 1234,
	macd: 0.125,
	signal: 0.1,
	hist: 0.025,
	rsv: 50,
	k,
	d: 50,
});

const view = (bars: IndicatorBar[]): SymbolView => ({
	status: "ok",
	spec: { symbol: "BTC/USDT", label: "Bitcoin" },
	bars,
	quote: summarizeQuote(bars),
	panels: buildChartPanels(bars),
});

describe("formatQuoteLine", () => {
	it("shows signed change and percent", () => {
		const line = formatQuoteLine(view([bar(0, 200, 50), bar(1, 210, 60)]));
		expect(line).toBe("Bitcoin (BTC/USDT) 210.00 (+10.00 / +5.00%) ▲");
	});

	it("omits the change for a single bar", () => {
		expect(formatQuoteLine(view([bar(0, 99.5, 50)]))).toBe(
			"Bitcoin (BTC/USDT) 99.50"
		);
	});
});

describe("tailRows", () => {
	it("formats the most recent rows", () => {
		const rows = tailRows(view([bar(0, 100, 50), bar(1, 101, 55.555), bar(2, 102, 62.9)]), 2);
		expect(rows).toEqual([
			{
				date: "2024-03-02",
				close: "101.00",
				volume: "1234",
				K: "55.55",
				D: "50.00",
				MACD: "0.1250",
				signal: "0.1000",
				hist: "0.0250",
			},
			{
				date: "2024-03-03",
				close: "102.00",
				volume: "1234",
				K: "62.90",
				D: "50.00",
				MACD: "0.1250",
				signal: "0.1000",
				hist: "0.0250",
			},
		]);
	});
});

describe("ConsoleRenderSurface", () => {
	it("writes headlines, tables and warnings in symbol order", () => {
		const lines: string[] = [];
		const tables: number[] = [];
		const surface = new ConsoleRenderSurface({
			rows: 3,
			write: (line) => lines.push(line),
			table: (rows) => tables.push(rows.length),
		});
		const snapshot: DashboardSnapshot = {
			updatedAt: START,
			results: [
				view([bar(0, 200, 50), bar(1, 190, 40)]),
				{
					status: "notice",
					spec: { symbol: "ETH/USDT", label: "Ether" },
					notice: {
						level: "warning",
						reason: "no_data",
						symbol: "ETH/USDT",
						message: "No data available for Ether",
					},
				},
			],
		};

		surface.render(snapshot);

		expect(lines).toEqual([
			"Trend Board | updated 2024-03-01T00:00:00.000Z",
			"",
			"Bitcoin (BTC/USDT) 190.00 (-10.00 / -5.00%) ▼",
			"",
			"WARNING No data available for Ether",
		]);
		expect(tables).toEqual([2]);
	});
});
