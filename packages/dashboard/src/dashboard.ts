import {
	createLogger,
	describeError,
	isInvalidInputError,
	lookbackPeriods,
} from "@trend-board/core";
import type {
	DashboardConfig,
	ModuleLogger,
	SymbolSpec,
} from "@trend-board/core";
import { createResultCache } from "@trend-board/data";
import type { ResultCache, SeriesSource } from "@trend-board/data";
import { computeIndicators } from "@trend-board/indicators";
import { buildChartPanels } from "./chartPanels";
import { summarizeQuote } from "./quote";
import type {
	DashboardNotice,
	DashboardSnapshot,
	NoticeReason,
	SymbolResult,
} from "./types";

export interface DashboardOptions {
	config: Pick<DashboardConfig, "symbols" | "timeframe" | "lookbackDays" | "cacheTtlMs">;
	source: SeriesSource;
	logger?: ModuleLogger;
	now?: () => number;
}

export interface LoadOptions {
	/** Discard cached results before loading. */
	refresh?: boolean;
}

const notice = (
	spec: SymbolSpec,
	reason: NoticeReason,
	message: string
): SymbolResult => {
	const payload: DashboardNotice = {
		level: "warning",
		reason,
		symbol: spec.symbol,
		message,
	};
	return { status: "notice", spec, notice: payload };
};

/**
 * Loads every configured symbol independently: one symbol failing or having
 * no data becomes a notice and never affects the others. Results (including
 * "no data") are cached per symbol for `cacheTtlMs`; fetch failures are not.
 */
export class Dashboard {
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private readonly cache: ResultCache<SymbolResult>;
	private readonly specs = new Map<string, SymbolSpec>();

	constructor(private readonly options: DashboardOptions) {
		if (!options.config.symbols.length) {
			throw new Error("Dashboard requires at least one symbol");
		}
		this.logger = options.logger ?? createLogger("dashboard");
		this.now = options.now ?? Date.now;
		for (const spec of options.config.symbols) {
			this.specs.set(spec.symbol, spec);
		}
		this.cache = createResultCache<SymbolResult>({
			ttlMs: options.config.cacheTtlMs,
			now: this.now,
			loader: (symbol) => this.loadSymbol(symbol),
		});
	}

	async load(options: LoadOptions = {}): Promise<DashboardSnapshot> {
		if (options.refresh) {
			this.refresh();
		}

		const specs = [...this.specs.values()];
		const settled = await Promise.allSettled(
			specs.map((spec) => this.cache.get(spec.symbol))
		);

		const results = settled.map((outcome, index): SymbolResult => {
			const spec = specs[index];
			if (outcome.status === "fulfilled") {
				return outcome.value;
			}
			const message = `Unable to load ${spec.label}: ${describeError(outcome.reason)}`;
			this.logger.warn("symbol_fetch_failed", {
				symbol: spec.symbol,
				error: outcome.reason,
			});
			return notice(spec, "fetch_failed", message);
		});

		const snapshot: DashboardSnapshot = { updatedAt: this.now(), results };
		this.logger.info("dashboard_loaded", {
			symbols: results.length,
			notices: results.filter((result) => result.status === "notice").length,
		});
		return snapshot;
	}

	/** Drops cached results so the next load re-fetches every symbol. */
	refresh(): void {
		this.cache.clear();
		this.logger.info("dashboard_cache_cleared");
	}

	private async loadSymbol(symbol: string): Promise<SymbolResult> {
		const spec = this.specs.get(symbol) ?? { symbol, label: symbol };
		const { timeframe, lookbackDays } = this.options.config;
		const series = await this.options.source.loadSeries({
			symbol,
			timeframe,
			lookback: lookbackPeriods(lookbackDays, timeframe),
		});

		if (!series.length) {
			this.logger.warn("symbol_no_data", { symbol });
			return notice(spec, "no_data", `No data available for ${spec.label}`);
		}

		try {
			const bars = computeIndicators(series);
			this.logger.debug("symbol_computed", { symbol, bars: bars.length });
			return {
				status: "ok",
				spec,
				bars,
				quote: summarizeQuote(bars),
				panels: buildChartPanels(bars),
			};
		} catch (error) {
			if (!isInvalidInputError(error)) {
				throw error;
			}
			this.logger.warn("symbol_invalid_data", {
				symbol,
				reason: error.reason,
				index: error.index,
			});
			return notice(
				spec,
				"invalid_data",
				`Invalid data for ${spec.label}: ${error.message}`
			);
		}
	}
}
