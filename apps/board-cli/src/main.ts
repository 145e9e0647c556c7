import readline from "node:readline";
import { createLogger, describeError, loadDashboardConfig } from "@trend-board/core";
import { CcxtMarketDataClient, DefaultSeriesSource } from "@trend-board/data";
import { Dashboard } from "@trend-board/dashboard";
import {
	USAGE,
	getBooleanArg,
	getRowsArg,
	getStringArg,
	parseCliArgs,
	toConfigOverrides,
} from "./cliArgs";
import { ConsoleRenderSurface } from "./consoleSurface";

const logger = createLogger("board-cli");

const runInteractive = async (
	render: (refresh: boolean) => Promise<void>
): Promise<void> => {
	const rl = readline.createInterface({ input: process.stdin });
	console.log('Enter reloads, "r" discards the cache and refetches, "q" quits.');
	for await (const line of rl) {
		const command = line.trim().toLowerCase();
		if (command === "q") {
			break;
		}
		await render(command === "r");
	}
	rl.close();
};

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	if (getBooleanArg(args, "help")) {
		console.log(USAGE);
		return;
	}

	const config = loadDashboardConfig({
		configPath: getStringArg(args, "config"),
		overrides: toConfigOverrides(args),
	});
	logger.info("config_loaded", {
		exchange: config.exchangeId,
		symbols: config.symbols.map((spec) => spec.symbol),
		timeframe: config.timeframe,
		lookback: config.lookbackDays,
	});

	const client = new CcxtMarketDataClient(config.exchangeId);
	const dashboard = new Dashboard({
		config,
		source: new DefaultSeriesSource({ client }),
	});
	const surface = new ConsoleRenderSurface({ rows: getRowsArg(args) });

	const render = async (refresh: boolean): Promise<void> => {
		surface.render(await dashboard.load({ refresh }));
	};

	await render(getBooleanArg(args, "refresh"));
	if (getBooleanArg(args, "interactive")) {
		await runInteractive(render);
	}
};

main().catch((error) => {
	logger.error("board_cli_failed", { error: describeError(error) });
	process.exitCode = 1;
});
