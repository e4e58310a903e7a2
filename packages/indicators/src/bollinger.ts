import { rollingStdSeries, smaSeries } from "./rolling";

export interface BollingerSeries {
	basis: Array<number | null>;
	std: Array<number | null>;
	upper: Array<number | null>;
	lower: Array<number | null>;
}

export function bollingerSeries(
	closes: readonly number[],
	period: number,
	multiplier: number
): BollingerSeries {
	const basis = smaSeries(closes, period);
	const std = rollingStdSeries(closes, period);

	const band = (direction: 1 | -1): Array<number | null> =>
		basis.map((mid, index) => {
			const deviation = std[index];
			return mid === null || deviation === null
				? null
				: mid + direction * multiplier * deviation;
		});

	return { basis, std, upper: band(1), lower: band(-1) };
}
