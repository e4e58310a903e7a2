import type { OHLCV } from "ccxt";
import type { Candle } from "@barsignal/core";

const toNumber = (value: number | string | undefined): number =>
	value === undefined ? Number.NaN : Number(value);

/**
 * Maps a ccxt OHLCV tuple to a Candle. Missing fields become NaN so the
 * series loader can drop the row instead of trading on a zero price.
 */
export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: toNumber(timestamp),
		open: toNumber(open),
		high: toNumber(high),
		low: toNumber(low),
		close: toNumber(close),
		volume: toNumber(volume),
	};
};
