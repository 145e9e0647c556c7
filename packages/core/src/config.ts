import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { parseTimeframe } from "./time";
import { createLogger } from "./utils/logger";
import type { SymbolSpec } from "./types";

export type ExchangeId = "binance" | "mexc";

export const SUPPORTED_EXCHANGES: readonly ExchangeId[] = ["binance", "mexc"];

export interface DashboardConfig {
	exchangeId: ExchangeId;
	timeframe: string;
	lookbackDays: number;
	cacheTtlMs: number;
	symbols: SymbolSpec[];
}

export type DashboardConfigOverrides = Partial<
	Omit<DashboardConfig, "symbols">
> & {
	symbols?: string[];
};

export interface DashboardConfigOptions {
	/** JSON file; defaults to `<workspace>/config/dashboard.json` when present. */
	configPath?: string;
	/** Explicit environment; skips `.env` loading when given. */
	env?: Record<string, string | undefined>;
	overrides?: DashboardConfigOverrides;
}

export type ConfigSourceType = "defaults" | "file" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
}

export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = {
	exchangeId: "binance",
	timeframe: "1d",
	lookbackDays: 90,
	cacheTtlMs: 60_000,
	symbols: [
		{ symbol: "BTC/USDT", label: "Bitcoin" },
		{ symbol: "ETH/USDT", label: "Ether" },
	],
};

const CONFIG_META_SYMBOL = Symbol.for("trend-board.config.meta");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: metadata,
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!isRecord(config)) {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	if (!isRecord(meta)) {
		return null;
	}
	const source = meta.source;
	if (source !== "defaults" && source !== "file" && source !== "merged") {
		return null;
	}
	return {
		source,
		path: typeof meta.path === "string" ? meta.path : undefined,
	};
};

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", path.join("config", "dashboard.json")];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const readOptionalEnvVar = (
	env: Record<string, string | undefined>,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseList = (value?: string): string[] | undefined => {
	if (!value) {
		return undefined;
	}
	const entries = value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return entries.length ? entries : undefined;
};

const ensurePositiveInteger = (value: unknown, field: string): number => {
	const numeric = typeof value === "string" ? Number(value) : value;
	if (
		typeof numeric !== "number" ||
		!Number.isInteger(numeric) ||
		numeric <= 0
	) {
		throw new Error(
			`Config field ${field} must be a positive integer, got ${String(value)}`
		);
	}
	return numeric;
};

const ensureExchangeId = (value: unknown, field: string): ExchangeId => {
	const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
	const match = SUPPORTED_EXCHANGES.find((id) => id === normalized);
	if (!match) {
		throw new Error(
			`Config field ${field} must be one of ${SUPPORTED_EXCHANGES.join(", ")}, got ${String(value)}`
		);
	}
	return match;
};

const ensureTimeframe = (value: unknown, field: string): string => {
	if (typeof value !== "string") {
		throw new Error(`Config field ${field} must be a string`);
	}
	try {
		parseTimeframe(value);
	} catch (error) {
		throw new Error(
			`Config field ${field} is invalid: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
	return value.trim().toLowerCase();
};

const parseSymbolEntry = (entry: unknown, index: number): SymbolSpec => {
	if (typeof entry === "string" && entry.trim().length) {
		const symbol = entry.trim();
		return { symbol, label: symbol };
	}
	if (isRecord(entry) && typeof entry.symbol === "string" && entry.symbol.trim()) {
		const symbol = entry.symbol.trim();
		const label =
			typeof entry.label === "string" && entry.label.trim()
				? entry.label.trim()
				: symbol;
		return { symbol, label };
	}
	throw new Error(
		`Config field symbols[${index}] must be a symbol string or { symbol, label }`
	);
};

const ensureSymbols = (value: unknown, field: string): SymbolSpec[] => {
	if (!Array.isArray(value) || value.length === 0) {
		throw new Error(`Config field ${field} must be a non-empty list`);
	}
	const specs = value.map((entry, index) => parseSymbolEntry(entry, index));
	const seen = new Set<string>();
	return specs.filter((spec) => {
		if (seen.has(spec.symbol)) {
			return false;
		}
		seen.add(spec.symbol);
		return true;
	});
};

const readConfigFile = (filePath: string): Record<string, unknown> => {
	const contents = fs.readFileSync(filePath, "utf-8");
	const parsed: unknown = JSON.parse(contents);
	if (!isRecord(parsed)) {
		throw new Error(`Dashboard config at ${filePath} must be a JSON object`);
	}
	return parsed;
};

const applyFile = (
	base: DashboardConfig,
	file: Record<string, unknown>
): DashboardConfig => ({
	exchangeId:
		file.exchangeId === undefined
			? base.exchangeId
			: ensureExchangeId(file.exchangeId, "exchangeId"),
	timeframe:
		file.timeframe === undefined
			? base.timeframe
			: ensureTimeframe(file.timeframe, "timeframe"),
	lookbackDays:
		file.lookbackDays === undefined
			? base.lookbackDays
			: ensurePositiveInteger(file.lookbackDays, "lookbackDays"),
	cacheTtlMs:
		file.cacheTtlMs === undefined
			? base.cacheTtlMs
			: ensurePositiveInteger(file.cacheTtlMs, "cacheTtlMs"),
	symbols:
		file.symbols === undefined
			? base.symbols
			: ensureSymbols(file.symbols, "symbols"),
});

const applyEnv = (
	base: DashboardConfig,
	env: Record<string, string | undefined>
): DashboardConfig => {
	const exchangeId = readOptionalEnvVar(env, "EXCHANGE_ID");
	const timeframe = readOptionalEnvVar(env, "DASHBOARD_TIMEFRAME");
	const lookbackDays = readOptionalEnvVar(env, "DASHBOARD_LOOKBACK_DAYS");
	const cacheTtlMs = readOptionalEnvVar(env, "DASHBOARD_CACHE_TTL_MS");
	const symbols = parseList(readOptionalEnvVar(env, "DASHBOARD_SYMBOLS"));
	return {
		exchangeId: exchangeId
			? ensureExchangeId(exchangeId, "EXCHANGE_ID")
			: base.exchangeId,
		timeframe: timeframe
			? ensureTimeframe(timeframe, "DASHBOARD_TIMEFRAME")
			: base.timeframe,
		lookbackDays: lookbackDays
			? ensurePositiveInteger(lookbackDays, "DASHBOARD_LOOKBACK_DAYS")
			: base.lookbackDays,
		cacheTtlMs: cacheTtlMs
			? ensurePositiveInteger(cacheTtlMs, "DASHBOARD_CACHE_TTL_MS")
			: base.cacheTtlMs,
		symbols: symbols
			? ensureSymbols(symbols, "DASHBOARD_SYMBOLS")
			: base.symbols,
	};
};

const applyOverrides = (
	base: DashboardConfig,
	overrides: DashboardConfigOverrides
): DashboardConfig => ({
	exchangeId:
		overrides.exchangeId === undefined
			? base.exchangeId
			: ensureExchangeId(overrides.exchangeId, "exchangeId"),
	timeframe:
		overrides.timeframe === undefined
			? base.timeframe
			: ensureTimeframe(overrides.timeframe, "timeframe"),
	lookbackDays:
		overrides.lookbackDays === undefined
			? base.lookbackDays
			: ensurePositiveInteger(overrides.lookbackDays, "lookbackDays"),
	cacheTtlMs:
		overrides.cacheTtlMs === undefined
			? base.cacheTtlMs
			: ensurePositiveInteger(overrides.cacheTtlMs, "cacheTtlMs"),
	symbols:
		overrides.symbols === undefined
			? base.symbols
			: ensureSymbols(overrides.symbols, "symbols"),
});

const resolveConfigPath = (configPath?: string): string | undefined => {
	if (configPath) {
		if (!fs.existsSync(configPath)) {
			throw new Error(`Dashboard config not found at ${configPath}`);
		}
		return configPath;
	}
	const fallback = path.join(getWorkspaceRoot(), "config", "dashboard.json");
	return fs.existsSync(fallback) ? fallback : undefined;
};

const configLogger = createLogger("config");

const loadProcessEnv = (): Record<string, string | undefined> => {
	const files = loadEnvFiles(getWorkspaceRoot());
	if (files.length) {
		configLogger.debug("env_files_loaded", { files });
	}
	return process.env;
};

/**
 * Resolution order: defaults, config file, environment, explicit overrides.
 */
export const loadDashboardConfig = (
	options: DashboardConfigOptions = {}
): DashboardConfig => {
	const env = options.env ?? loadProcessEnv();

	const configPath = resolveConfigPath(options.configPath);
	let config: DashboardConfig = {
		...DEFAULT_DASHBOARD_CONFIG,
		symbols: [...DEFAULT_DASHBOARD_CONFIG.symbols],
	};
	if (configPath) {
		config = applyFile(config, readConfigFile(configPath));
	}
	config = applyEnv(config, env);
	if (options.overrides) {
		config = applyOverrides(config, options.overrides);
	}

	const changedByEnvOrOverrides =
		options.overrides !== undefined ||
		[
			"EXCHANGE_ID",
			"DASHBOARD_TIMEFRAME",
			"DASHBOARD_LOOKBACK_DAYS",
			"DASHBOARD_CACHE_TTL_MS",
			"DASHBOARD_SYMBOLS",
		].some((key) => readOptionalEnvVar(env, key) !== undefined);

	const source: ConfigSourceType = changedByEnvOrOverrides
		? "merged"
		: configPath
			? "file"
			: "defaults";

	return withConfigMetadata(config, { source, path: configPath });
};
