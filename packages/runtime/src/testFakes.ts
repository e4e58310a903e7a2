import type { Candle, MarketDataClient } from "@barsignal/core";
import type { AlertSender, SignalAlert } from "@barsignal/alerts";

export const HOUR_MS = 3_600_000;
export const BASE_TS = Date.UTC(2025, 0, 1, 0, 0, 0);

export const flatCandles = (symbol: string, length: number): Candle[] =>
	Array.from({ length }, (_, i) => ({
		symbol,
		timeframe: "1h",
		timestamp: BASE_TS + i * HOUR_MS,
		open: 100,
		high: 100,
		low: 100,
		close: 100,
		volume: 50,
	}));

export const risingCandles = (symbol: string, length: number): Candle[] =>
	Array.from({ length }, (_, i) => ({
		symbol,
		timeframe: "1h",
		timestamp: BASE_TS + i * HOUR_MS,
		open: 100 + i,
		high: 101 + i,
		low: 99 + i,
		close: 100.5 + i,
		volume: 10 + i,
	}));

type SeriesSource = Candle[] | Error | (() => Promise<Candle[]>);

/** In-memory market data keyed by symbol. */
export class FakeMarketDataClient implements MarketDataClient {
	public readonly calls: string[] = [];

	constructor(private readonly series: Record<string, SeriesSource>) {}

	async fetchOHLCV(symbol: string): Promise<Candle[]> {
		this.calls.push(symbol);
		const source = this.series[symbol] ?? [];
		if (source instanceof Error) {
			throw source;
		}
		if (typeof source === "function") {
			return source();
		}
		return source;
	}
}

export class RecordingSender implements AlertSender {
	readonly channel = "memory";
	public readonly alerts: SignalAlert[] = [];

	constructor(private readonly failure: Error | null = null) {}

	async send(alert: SignalAlert): Promise<void> {
		if (this.failure) {
			throw this.failure;
		}
		this.alerts.push(alert);
	}
}
