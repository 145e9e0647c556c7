import { describe, expect, it } from "vitest";
import type { IndicatorBar } from "@trend-board/core";
import { buildChartPanels } from "./chartPanels";

const indicatorBar = (
	timestamp: number,
	open: number,
	close: number,
	hist: number
): IndicatorBar => ({
	timestamp,
	open,
	high: Math.max(open, close) + 1,
	low: Math.min(open, close) - 1,
	close,
	volume: 500,
	macd: hist * 2,
	signal: hist,
	hist,
	rsv: 50,
	k: 55,
	d: 52,
});

describe("buildChartPanels", () => {
	const bars = [
		indicatorBar(1_000, 100, 105, 0.5),
		indicatorBar(2_000, 105, 101, -0.25),
		indicatorBar(3_000, 101, 101, 0),
	];
	const panels = buildChartPanels(bars);

	it("shares one time axis across all panels", () => {
		expect(panels.timestamps).toEqual([1_000, 2_000, 3_000]);
		expect(panels.price.map((p) => p.timestamp)).toEqual(panels.timestamps);
		expect(panels.kd.k.map((p) => p.timestamp)).toEqual(panels.timestamps);
		expect(panels.macd.signal.map((p) => p.timestamp)).toEqual(panels.timestamps);
	});

	it("colors volume by close against open", () => {
		expect(panels.volume.map((v) => v.direction)).toEqual(["up", "down", "up"]);
	});

	it("colors the MACD histogram by sign", () => {
		expect(panels.macd.histogram).toEqual([
			{ timestamp: 1_000, value: 0.5, direction: "up" },
			{ timestamp: 2_000, value: -0.25, direction: "down" },
			{ timestamp: 3_000, value: 0, direction: "up" },
		]);
	});

	it("draws KD reference bands at 80 and 20", () => {
		expect(panels.kd.bands).toEqual({ upper: 80, lower: 20 });
		expect(panels.kd.d[0]).toEqual({ timestamp: 1_000, value: 52 });
	});

	it("carries MACD and signal lines", () => {
		expect(panels.macd.macd.map((p) => p.value)).toEqual([1, -0.5, 0]);
		expect(panels.macd.signal.map((p) => p.value)).toEqual([0.5, -0.25, 0]);
	});
});
