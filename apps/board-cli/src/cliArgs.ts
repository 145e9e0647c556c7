import type { DashboardConfigOverrides, ExchangeId } from "@trend-board/core";

export type ArgValue = string | boolean;

export const USAGE = `Usage:
  npm run board -- [options]

Options:
  --symbols <a,b>        Comma-separated symbols (defaults to config)
  --exchange <id>        Exchange id: binance | mexc
  --timeframe <tf>       Bar timeframe (default 1d)
  --lookback <days>      Calendar days of history to load (default 90)
  --ttl <ms>             Result cache TTL in milliseconds (default 60000)
  --config <path>        Dashboard config JSON file
  --rows <n>             Rows shown per symbol table (default 5)
  --refresh              Discard cached results before the first load
  --interactive          Keep running; Enter reloads, "r" refreshes, "q" quits
  --help                 Show this message
`;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.trim() ? value.trim() : undefined;
};

export const getBooleanArg = (
	args: Record<string, ArgValue>,
	key: string
): boolean => {
	const value = args[key];
	if (typeof value === "boolean") {
		return value;
	}
	return value === "true" || value === "1";
};

const getIntegerArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = getStringArg(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const parsed = Number(raw);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new Error(`--${key} must be a positive integer, got ${raw}`);
	}
	return parsed;
};

const isExchangeId = (value: string): value is ExchangeId =>
	value === "binance" || value === "mexc";

export const toConfigOverrides = (
	args: Record<string, ArgValue>
): DashboardConfigOverrides => {
	const overrides: DashboardConfigOverrides = {};
	const symbols = getStringArg(args, "symbols")
		?.split(",")
		.map((symbol) => symbol.trim())
		.filter((symbol) => symbol.length > 0);
	if (symbols?.length) {
		overrides.symbols = symbols;
	}
	const exchange = getStringArg(args, "exchange")?.toLowerCase();
	if (exchange !== undefined) {
		if (!isExchangeId(exchange)) {
			throw new Error(`--exchange must be binance or mexc, got ${exchange}`);
		}
		overrides.exchangeId = exchange;
	}
	const timeframe = getStringArg(args, "timeframe");
	if (timeframe !== undefined) {
		overrides.timeframe = timeframe;
	}
	const lookback = getIntegerArg(args, "lookback");
	if (lookback !== undefined) {
		overrides.lookbackDays = lookback;
	}
	const ttl = getIntegerArg(args, "ttl");
	if (ttl !== undefined) {
		overrides.cacheTtlMs = ttl;
	}
	return overrides;
};

export const getRowsArg = (args: Record<string, ArgValue>): number =>
	getIntegerArg(args, "rows") ?? 5;
