import { toIsoDay } from "@trend-board/core";
import type { DashboardSnapshot, QuoteSummary, RenderSurface, SymbolView } from "@trend-board/dashboard";

export interface ConsoleSurfaceOptions {
	rows?: number;
	write?: (line: string) => void;
	table?: (rows: Array<Record<string, string>>) => void;
}

const fmt = (value: number, digits = 2): string => value.toFixed(digits);

const signed = (value: number, digits = 2): string =>
	`${value > 0 ? "+" : ""}${value.toFixed(digits)}`;

export const formatQuoteLine = (view: Pick<SymbolView, "spec" | "quote">): string => {
	const head = `${view.spec.label} (${view.spec.symbol}) ${fmt(view.quote.lastClose)}`;
	const { change, changePct } = view.quote;
	if (change === null || changePct === null) {
		return head;
	}
	return `${head} (${signed(change)} / ${signed(changePct)}%) ${directionMark(view.quote)}`;
};

const directionMark = (quote: QuoteSummary): string => {
	switch (quote.direction) {
		case "up":
			return "▲";
		case "down":
			return "▼";
		default:
			return "=";
	}
};

export const tailRows = (
	view: SymbolView,
	rows: number
): Array<Record<string, string>> =>
	view.bars.slice(-rows).map((bar) => ({
		date: toIsoDay(bar.timestamp),
		close: fmt(bar.close),
		volume: fmt(bar.volume, 0),
		K: fmt(bar.k),
		D: fmt(bar.d),
		MACD: fmt(bar.macd, 4),
		signal: fmt(bar.signal, 4),
		hist: fmt(bar.hist, 4),
	}));

/**
 * Plain-terminal surface: a headline quote and the most recent indicator rows
 * per symbol; notices print as warnings.
 */
export class ConsoleRenderSurface implements RenderSurface {
	private readonly rows: number;
	private readonly write: (line: string) => void;
	private readonly table: (rows: Array<Record<string, string>>) => void;

	constructor(options: ConsoleSurfaceOptions = {}) {
		this.rows = Math.max(options.rows ?? 5, 1);
		this.write = options.write ?? ((line) => console.log(line));
		this.table = options.table ?? ((rows) => console.table(rows));
	}

	render(snapshot: DashboardSnapshot): void {
		this.write(`Trend Board | updated ${new Date(snapshot.updatedAt).toISOString()}`);
		for (const result of snapshot.results) {
			this.write("");
			if (result.status === "notice") {
				this.write(`WARNING ${result.notice.message}`);
				continue;
			}
			this.write(formatQuoteLine(result));
			this.table(tailRows(result, this.rows));
		}
	}
}
