/**
 * Pure time utilities for bar timestamps.
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */
import { DAY_MS, HOUR_MS, MINUTE_MS, MONTH_MS, WEEK_MS } from "./constants";

export interface ParsedTimeframe {
	/** Lowercase units are case-insensitive; "M" is the month, as in ccxt. */
	unit: "m" | "h" | "d" | "w" | "M";
	n: number;
	ms: number;
}

const TIMEFRAME_PATTERN = /^(\d+)([a-zA-Z])$/;

const UNIT_MS: Record<ParsedTimeframe["unit"], number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
	w: WEEK_MS,
	M: MONTH_MS,
};

const isTimeframeUnit = (value: string): value is ParsedTimeframe["unit"] =>
	value === "m" || value === "h" || value === "d" || value === "w" || value === "M";

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d", "1w", "1M"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().match(TIMEFRAME_PATTERN);
	const rawUnit = match?.[2];
	const unit = rawUnit === "M" ? rawUnit : rawUnit?.toLowerCase();

	if (!match || !unit || !isTimeframeUnit(unit)) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d", "1w", "1M"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

/**
 * Parse timeframe string to milliseconds
 * @example timeframeToMs("1h") => 3600000
 */
export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * A bar opened at `timestamp` is closed once its whole period has elapsed.
 */
export const isBarClosed = (
	timestamp: number,
	timeframe: string,
	now: number = Date.now()
): boolean => timestamp + timeframeToMs(timeframe) <= now;
