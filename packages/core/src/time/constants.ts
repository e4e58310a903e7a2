/**
 * Time constants for consistent time calculations across the codebase.
 * All values are in milliseconds.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;
/** One "1M" period as ccxt counts it. */
export const MONTH_MS = 30 * DAY_MS;

/** Pause between two symbols of one scan cycle. */
export const DEFAULT_SYMBOL_DELAY_MS = SECOND_MS;

/** Interval between two scan cycles in loop mode. */
export const DEFAULT_CYCLE_INTERVAL_MS = 10 * MINUTE_MS;
