export type BarsignalErrorCode = "INVALID_INPUT" | "CONFIG_ERROR";

export class BarsignalError extends Error {
	readonly code: BarsignalErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(
		code: BarsignalErrorCode,
		message: string,
		details?: Record<string, unknown>
	) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.details = details;
	}
}

/**
 * Malformed bar series: empty, or timestamps not strictly increasing.
 */
export class InvalidInputError extends BarsignalError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("INVALID_INPUT", message, details);
	}
}

export class ConfigError extends BarsignalError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("CONFIG_ERROR", message, details);
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : "Unknown error";
