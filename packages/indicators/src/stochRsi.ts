import { NumericSeries, rollingMaxSeries, rollingMinSeries, smaSeries } from "./rolling";

export interface StochRsiSeries {
	rsiMin: Array<number | null>;
	rsiMax: Array<number | null>;
	stochRsi: Array<number | null>;
	k: Array<number | null>;
	d: Array<number | null>;
}

export interface StochRsiOptions {
	length: number;
	smoothK: number;
	smoothD: number;
}

/**
 * Position of RSI inside its trailing min/max range, 0 when the range is flat.
 */
export function stochRsiSeries(rsi: NumericSeries, options: StochRsiOptions): StochRsiSeries {
	const rsiMin = rollingMinSeries(rsi, options.length);
	const rsiMax = rollingMaxSeries(rsi, options.length);

	const stochRsi = rsi.map((value, index) => {
		const low = rsiMin[index];
		const high = rsiMax[index];
		if (value === null || low === null || high === null) {
			return null;
		}
		return high === low ? 0 : (value - low) / (high - low);
	});

	const k = smaSeries(stochRsi, options.smoothK);
	const d = smaSeries(k, options.smoothD);

	return { rsiMin, rsiMax, stochRsi, k, d };
}
