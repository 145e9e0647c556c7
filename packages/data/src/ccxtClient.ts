import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import { createLogger } from "@trend-board/core";
import type { Bar, ExchangeId } from "@trend-board/core";
import type { MarketDataClient } from "./types";
import { mapCcxtRowToBar } from "./utils/ccxtMapper";

const ccxtLogger = createLogger("data:ccxt");

/**
 * The slice of a ccxt `Exchange` this client calls.
 */
export interface OhlcvExchange {
	loadMarkets(): Promise<unknown>;
	market(symbol: string): { symbol: string };
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

const createExchange = (exchangeId: ExchangeId): Exchange => {
	switch (exchangeId) {
		case "binance":
			return new ccxt.binance({
				enableRateLimit: true,
				options: { defaultType: "spot" },
			});
		case "mexc":
			return new ccxt.mexc({
				enableRateLimit: true,
				options: { defaultType: "spot" },
			});
	}
};

/**
 * Public-endpoint OHLCV client; no credentials are needed for daily bars.
 */
export class CcxtMarketDataClient implements MarketDataClient {
	private readonly exchange: OhlcvExchange;
	private marketsLoaded = false;

	constructor(readonly exchangeId: ExchangeId, exchange?: OhlcvExchange) {
		this.exchange = exchange ?? createExchange(exchangeId);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<Bar[]> {
		const marketSymbol = await this.resolveMarketSymbol(symbol);
		const ohlcv = await this.exchange.fetchOHLCV(
			marketSymbol,
			timeframe,
			since,
			limit
		);
		ccxtLogger.debug("ohlcv_fetched", {
			exchange: this.exchangeId,
			symbol: marketSymbol,
			timeframe,
			rows: ohlcv.length,
		});
		return ohlcv.map((row: OHLCV) => mapCcxtRowToBar(row));
	}

	private async resolveMarketSymbol(symbol: string): Promise<string> {
		await this.ensureMarketsLoaded();
		try {
			return this.exchange.market(symbol).symbol;
		} catch (error) {
			throw new Error(
				`Unknown ${this.exchangeId} market symbol ${symbol}: ${
					error instanceof Error ? error.message : String(error)
				}`
			);
		}
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
	}
}
