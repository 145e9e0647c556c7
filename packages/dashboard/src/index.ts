export * from "./types";
export { summarizeQuote } from "./quote";
export { buildChartPanels, KD_BANDS } from "./chartPanels";
export { Dashboard } from "./dashboard";
export type { DashboardOptions, LoadOptions } from "./dashboard";
