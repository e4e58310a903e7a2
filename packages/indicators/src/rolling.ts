export type NumericSeries = ReadonlyArray<number | null>;

/**
 * Values of the `period` positions ending at `end`, or null when the window
 * starts before the series or contains a missing value.
 */
export const trailingWindow = (
	values: NumericSeries,
	end: number,
	period: number
): number[] | null => {
	if (period <= 0 || end + 1 < period) {
		return null;
	}
	const window: number[] = [];
	for (let i = end - period + 1; i <= end; i += 1) {
		const value = values[i];
		if (value === null || value === undefined) {
			return null;
		}
		window.push(value);
	}
	return window;
};

const mapWindows = (
	values: NumericSeries,
	period: number,
	reduce: (window: number[]) => number | null
): Array<number | null> =>
	values.map((_, index) => {
		const window = trailingWindow(values, index, period);
		return window ? reduce(window) : null;
	});

export const mean = (nums: number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};

/**
 * Sample standard deviation (divisor n - 1). Null for fewer than two values.
 */
export const sampleStd = (nums: number[]): number | null => {
	if (nums.length < 2) {
		return null;
	}
	const avg = mean(nums);
	const squares = nums.reduce((acc, value) => acc + (value - avg) ** 2, 0);
	return Math.sqrt(squares / (nums.length - 1));
};

export const rollingStdSeries = (
	values: NumericSeries,
	period: number
): Array<number | null> => mapWindows(values, period, sampleStd);

export const rollingMinSeries = (
	values: NumericSeries,
	period: number
): Array<number | null> => mapWindows(values, period, (window) => Math.min(...window));

export const rollingMaxSeries = (
	values: NumericSeries,
	period: number
): Array<number | null> => mapWindows(values, period, (window) => Math.max(...window));

export const smaSeries = (
	values: NumericSeries,
	period: number
): Array<number | null> => mapWindows(values, period, mean);
