export * from "./time";

/**
 * One OHLCV observation. Timestamps are UTC epoch milliseconds.
 */
export interface Bar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * A bar as delivered by an exchange adapter, tagged with its market.
 */
export interface Candle extends Bar {
	symbol: string;
	timeframe: string;
}

export type SignalSide = "LONG" | "SHORT";
export type SignalKind = SignalSide | "NONE";

export type PricingMode = "atr" | "percentage";
