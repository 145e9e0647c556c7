export * from "./types";
export { DefaultSeriesSource } from "./provider";
export { fetchSeries } from "./historical";
export type { SeriesFetchOptions } from "./historical";
export { normalizeSeries } from "./normalizeSeries";
export type { NormalizeResult } from "./normalizeSeries";
export { createResultCache } from "./resultCache";
export type { ResultCache, ResultCacheOptions } from "./resultCache";
export { CcxtMarketDataClient } from "./ccxtClient";
export type { OhlcvExchange } from "./ccxtClient";
export { mapCcxtRowToBar } from "./utils/ccxtMapper";
