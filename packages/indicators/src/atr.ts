export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

/**
 * True range per bar; the first bar has no previous close and uses high - low.
 */
export const trueRangeSeries = (candles: readonly AtrInput[]): number[] =>
	candles.map((current, index) => {
		const highLow = current.high - current.low;
		if (index === 0) {
			return highLow;
		}
		const previousClose = candles[index - 1].close;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		return Math.max(highLow, highClose, lowClose);
	});

/**
 * Wilder-smoothed ATR, index-aligned with `candles`. Seeded by the simple
 * mean of the first `period` true ranges, so the first value sits at
 * index `period - 1`.
 */
export function calculateATRSeries(
	candles: readonly AtrInput[],
	period = 14
): Array<number | null> {
	const series: Array<number | null> = new Array<number | null>(candles.length).fill(null);
	if (period <= 0 || candles.length < period) {
		return series;
	}

	const trueRanges = trueRangeSeries(candles);
	let atr = trueRanges.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	series[period - 1] = atr;

	for (let i = period; i < trueRanges.length; i += 1) {
		atr = (atr * (period - 1) + trueRanges[i]) / period;
		series[i] = atr;
	}

	return series;
}

export function calculateATR(candles: readonly AtrInput[], period = 14): number | null {
	const series = calculateATRSeries(candles, period);
	return series.length ? series[series.length - 1] : null;
}
