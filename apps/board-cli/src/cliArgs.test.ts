import { describe, expect, it } from "vitest";
import { getBooleanArg, getRowsArg, parseCliArgs, toConfigOverrides } from "./cliArgs";

describe("parseCliArgs", () => {
	it("reads --key value, --key=value and bare flags", () => {
		expect(
			parseCliArgs(["--symbols", "BTC/USDT,ETH/USDT", "--lookback=60", "--refresh"])
		).toEqual({
			symbols: "BTC/USDT,ETH/USDT",
			lookback: "60",
			refresh: true,
		});
	});

	it("ignores positionals", () => {
		expect(parseCliArgs(["extra", "--rows", "3"])).toEqual({ rows: "3" });
	});
});

describe("toConfigOverrides", () => {
	it("maps arguments to config overrides", () => {
		const args = parseCliArgs([
			"--symbols",
			"BTC/USDT, SOL/USDT,",
			"--exchange",
			"MEXC",
			"--lookback",
			"120",
			"--ttl",
			"30000",
		]);

		expect(toConfigOverrides(args)).toEqual({
			symbols: ["BTC/USDT", "SOL/USDT"],
			exchangeId: "mexc",
			lookbackDays: 120,
			cacheTtlMs: 30_000,
		});
	});

	it("returns no overrides without arguments", () => {
		expect(toConfigOverrides({})).toEqual({});
	});

	it("rejects unknown exchanges", () => {
		expect(() => toConfigOverrides({ exchange: "kraken" })).toThrow(
			"--exchange must be binance or mexc, got kraken"
		);
	});

	it("rejects non-integer lookbacks", () => {
		expect(() => toConfigOverrides({ lookback: "3mo" })).toThrow(
			"--lookback must be a positive integer, got 3mo"
		);
	});
});

describe("flag helpers", () => {
	it("reads boolean flags", () => {
		expect(getBooleanArg({ refresh: true }, "refresh")).toBe(true);
		expect(getBooleanArg({ refresh: "false" }, "refresh")).toBe(false);
		expect(getBooleanArg({}, "refresh")).toBe(false);
	});

	it("defaults rows to 5", () => {
		expect(getRowsArg({})).toBe(5);
		expect(getRowsArg({ rows: "8" })).toBe(8);
	});
});
