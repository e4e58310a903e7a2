import { Candle, createLogger, isBarClosed } from "@barsignal/core";
import type { BarSeriesRequest, DataProviderLogger, MarketDataClient } from "./types";

const defaultLogger: DataProviderLogger = createLogger("data:bars");

const isCompleteCandle = (candle: Candle): boolean =>
	[
		candle.timestamp,
		candle.open,
		candle.high,
		candle.low,
		candle.close,
		candle.volume,
	].every(Number.isFinite);

/**
 * Sort ascending and keep the first candle seen for each timestamp.
 */
export const normalizeCandles = (candles: readonly Candle[]): Candle[] => {
	const seen = new Set<number>();
	const unique: Candle[] = [];
	for (const candle of candles) {
		if (seen.has(candle.timestamp)) {
			continue;
		}
		seen.add(candle.timestamp);
		unique.push(candle);
	}
	return unique.sort((a, b) => a.timestamp - b.timestamp);
};

/**
 * Fetch the most recent `limit` bars of a symbol, oldest first, without
 * duplicate timestamps or rows carrying missing values.
 */
export const fetchBarSeries = async (
	client: MarketDataClient,
	request: BarSeriesRequest,
	logger: DataProviderLogger = defaultLogger
): Promise<Candle[]> => {
	if (!Number.isInteger(request.limit) || request.limit <= 0) {
		throw new Error(`Bar limit must be a positive integer, got ${request.limit}`);
	}

	const raw = await client.fetchOHLCV(request.symbol, request.timeframe, request.limit);
	const complete = raw.filter(isCompleteCandle);
	if (complete.length !== raw.length) {
		logger.warn?.("ohlcv_rows_dropped", {
			symbol: request.symbol,
			timeframe: request.timeframe,
			dropped: raw.length - complete.length,
		});
	}

	let candles = normalizeCandles(complete);
	const last = candles[candles.length - 1];
	if (
		request.dropOpenBar &&
		last &&
		!isBarClosed(last.timestamp, request.timeframe, request.now ?? Date.now())
	) {
		candles = candles.slice(0, -1);
	}
	candles = candles.slice(-request.limit);

	logger.info?.("bar_series_loaded", {
		symbol: request.symbol,
		timeframe: request.timeframe,
		bars: candles.length,
		firstTimestamp: candles[0]?.timestamp ?? null,
		lastTimestamp: candles[candles.length - 1]?.timestamp ?? null,
	});

	return candles;
};
