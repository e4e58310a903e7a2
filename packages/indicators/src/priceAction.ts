export interface PriceActionInput {
	high: number;
	low: number;
	close: number;
}

export interface PriceActionSeries {
	prevHigh: Array<number | null>;
	prevLow: Array<number | null>;
	bullishBreakout: boolean[];
	bearishBreakdown: boolean[];
}

/**
 * Close beyond the previous bar's range. Flags stay false on the first bar.
 */
export function priceActionSeries(bars: readonly PriceActionInput[]): PriceActionSeries {
	const prevHigh = bars.map((_, index) => (index > 0 ? bars[index - 1].high : null));
	const prevLow = bars.map((_, index) => (index > 0 ? bars[index - 1].low : null));

	return {
		prevHigh,
		prevLow,
		bullishBreakout: bars.map((bar, index) => {
			const high = prevHigh[index];
			return high !== null && bar.close > high;
		}),
		bearishBreakdown: bars.map((bar, index) => {
			const low = prevLow[index];
			return low !== null && bar.close < low;
		}),
	};
}
