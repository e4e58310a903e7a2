const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		// Flat window: no gains and no losses.
		return avgGain === 0 ? 50 : 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Wilder RSI, index-aligned with `values`. The first `period` positions are
 * null; the seed is the simple mean of the first `period` gains and losses.
 */
export function rsiSeries(values: readonly number[], period = 14): Array<number | null> {
	const rsis: Array<number | null> = new Array<number | null>(values.length).fill(null);

	if (period <= 0 || values.length <= period) {
		return rsis;
	}

	let gains = 0;
	let losses = 0;

	for (let i = 1; i <= period; i += 1) {
		const change = values[i] - values[i - 1];
		if (change >= 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}

	let avgGain = gains / period;
	let avgLoss = losses / period;
	rsis[period] = toRsi(avgGain, avgLoss);

	for (let i = period + 1; i < values.length; i += 1) {
		const change = values[i] - values[i - 1];
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);
		avgGain = (avgGain * (period - 1) + gain) / period;
		avgLoss = (avgLoss * (period - 1) + loss) / period;
		rsis[i] = toRsi(avgGain, avgLoss);
	}

	return rsis;
}

export function calculateRSI(values: readonly number[], period = 14): number | null {
	const series = rsiSeries(values, period);
	return series.length ? series[series.length - 1] : null;
}
