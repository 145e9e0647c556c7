import { createLogger } from "@trend-board/core";
import type { Bar, ModuleLogger } from "@trend-board/core";
import { fetchSeries } from "./historical";
import type { DataProviderConfig, SeriesRequest, SeriesSource } from "./types";

export class DefaultSeriesSource implements SeriesSource {
	private readonly batchSize: number;
	private readonly maxIterations: number;
	private readonly logger: ModuleLogger;
	private readonly now: () => number;

	constructor(private readonly config: DataProviderConfig) {
		this.batchSize = Math.max(config.batchSize ?? 500, 1);
		this.maxIterations = Math.max(config.maxIterations ?? 20, 1);
		this.logger = config.logger ?? createLogger("data");
		this.now = config.now ?? Date.now;
	}

	async loadSeries(request: SeriesRequest): Promise<Bar[]> {
		if (!request.symbol.trim()) {
			throw new Error("Series request requires a symbol");
		}
		return fetchSeries({
			client: this.config.client,
			request,
			now: this.now(),
			batchSize: this.batchSize,
			maxIterations: this.maxIterations,
			logger: this.logger,
		});
	}
}
