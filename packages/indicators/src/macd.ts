import { emaSeries } from "./ema";

export interface MacdSeries {
	macd: Array<number | null>;
	signal: Array<number | null>;
	histogram: Array<number | null>;
}

export interface MacdResult {
	macd: number | null;
	signal: number | null;
	histogram: number | null;
}

/**
 * MACD line = EMA(fast) - EMA(slow); signal = EMA of the defined part of the
 * MACD line; histogram = line - signal. All series index-aligned with `closes`.
 */
export function macdSeries(
	closes: readonly number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdSeries {
	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);

	const macdLine: Array<number | null> = fastSeries.map((fastValue, index) => {
		const slowValue = slowSeries[index];
		if (fastValue === null || slowValue === null) {
			return null;
		}
		return fastValue - slowValue;
	});

	const signal = emaSeries(macdLine, signalLength);
	const histogram = macdLine.map((value, index) => {
		const signalValue = signal[index];
		return value !== null && signalValue !== null ? value - signalValue : null;
	});

	return { macd: macdLine, signal, histogram };
}

export function macd(
	closes: readonly number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdResult {
	const series = macdSeries(closes, fast, slow, signalLength);
	const last = closes.length - 1;
	if (last < 0) {
		return { macd: null, signal: null, histogram: null };
	}
	return {
		macd: series.macd[last],
		signal: series.signal[last],
		histogram: series.histogram[last],
	};
}
