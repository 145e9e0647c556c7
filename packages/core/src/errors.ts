export type InvalidInputReason =
	| "empty_series"
	| "invalid_price"
	| "invalid_timestamp"
	| "unordered_timestamps";

/**
 * Raised by the indicator engine on malformed input. No partial results are
 * produced when this is thrown.
 */
export class InvalidInputError extends Error {
	readonly reason: InvalidInputReason;
	readonly index?: number;

	constructor(reason: InvalidInputReason, message: string, index?: number) {
		super(message);
		this.name = "InvalidInputError";
		this.reason = reason;
		this.index = index;
	}
}

export const isInvalidInputError = (value: unknown): value is InvalidInputError =>
	value instanceof InvalidInputError;

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
