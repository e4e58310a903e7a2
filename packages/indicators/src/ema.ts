import type { NumericSeries } from "./rolling";

/**
 * Exponential moving average with α = 2 / (span + 1), seeded by the first
 * available value. Leading nulls are skipped; a value is reported once
 * `span` observations have been consumed.
 */
export function emaSeries(values: NumericSeries, span: number): Array<number | null> {
	const series: Array<number | null> = new Array<number | null>(values.length).fill(null);

	if (span <= 0) {
		return series;
	}

	const multiplier = 2 / (span + 1);
	let emaValue: number | null = null;
	let observed = 0;

	for (let i = 0; i < values.length; i += 1) {
		const value = values[i];
		if (value === null) {
			continue;
		}
		emaValue = emaValue === null ? value : (value - emaValue) * multiplier + emaValue;
		observed += 1;
		if (observed >= span) {
			series[i] = emaValue;
		}
	}

	return series;
}

export function ema(values: NumericSeries, span: number): number | null {
	const series = emaSeries(values, span);
	return series.length ? series[series.length - 1] : null;
}
