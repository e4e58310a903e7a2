import type { MarketDataClient } from "@barsignal/core";

export type { MarketDataClient };

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface BarSeriesRequest {
	symbol: string;
	timeframe: string;
	/** Number of most recent bars to keep. */
	limit: number;
	/** Drop the newest bar while its period is still open. */
	dropOpenBar?: boolean;
	/** Clock used for the open-bar check; defaults to Date.now(). */
	now?: number;
}
