import { Bar, IndicatorConfig, InvalidInputError } from "@barsignal/core";
import { calculateATRSeries } from "./atr";
import { bollingerSeries } from "./bollinger";
import { emaSeries } from "./ema";
import { macdSeries } from "./macd";
import { priceActionSeries } from "./priceAction";
import { smaSeries } from "./rolling";
import { rsiSeries } from "./rsi";
import { stochRsiSeries } from "./stochRsi";
import type { IndicatorRow } from "./types";

const WINDOW_KEYS = [
	"emaFastLen",
	"emaSlowLen",
	"rsiLen",
	"stochLen",
	"bbLen",
	"macdFast",
	"macdSlow",
	"macdSignal",
	"volAvgWindow",
	"stochSmoothK",
	"stochSmoothD",
	"atrWindow",
] as const satisfies ReadonlyArray<keyof IndicatorConfig>;

const assertBarSeries = (bars: readonly Bar[]): void => {
	if (!bars.length) {
		throw new InvalidInputError("Bar series is empty");
	}
	for (let i = 0; i < bars.length; i += 1) {
		const timestamp = bars[i].timestamp;
		if (!Number.isFinite(timestamp)) {
			throw new InvalidInputError(`Bar ${i} has a non-finite timestamp`, {
				index: i,
				timestamp,
			});
		}
		if (i > 0 && timestamp <= bars[i - 1].timestamp) {
			throw new InvalidInputError(
				`Bar timestamps must be strictly increasing (index ${i})`,
				{ index: i, previous: bars[i - 1].timestamp, timestamp }
			);
		}
	}
};

const assertWindows = (config: IndicatorConfig): void => {
	for (const key of WINDOW_KEYS) {
		const value = config[key];
		if (!Number.isInteger(value) || value <= 0) {
			throw new InvalidInputError(`${key} must be a positive integer`, {
				key,
				value,
			});
		}
	}
};

/**
 * One indicator row per bar, index-aligned with `bars`.
 * @throws InvalidInputError on an empty or non-monotonic series
 */
export function computeIndicators(
	bars: readonly Bar[],
	config: IndicatorConfig
): IndicatorRow[] {
	assertBarSeries(bars);
	assertWindows(config);

	const closes = bars.map((bar) => bar.close);
	const volumes = bars.map((bar) => bar.volume);

	const emaFast = emaSeries(closes, config.emaFastLen);
	const emaSlow = emaSeries(closes, config.emaSlowLen);
	const macd = macdSeries(closes, config.macdFast, config.macdSlow, config.macdSignal);
	const rsi = rsiSeries(closes, config.rsiLen);
	const stoch = stochRsiSeries(rsi, {
		length: config.stochLen,
		smoothK: config.stochSmoothK,
		smoothD: config.stochSmoothD,
	});
	const bands = bollingerSeries(closes, config.bbLen, config.bbMult);
	const volAvg = smaSeries(volumes, config.volAvgWindow);
	const priceAction = priceActionSeries(bars);
	const atr = calculateATRSeries(bars, config.atrWindow);

	return bars.map((bar, i) => ({
		timestamp: bar.timestamp,
		open: bar.open,
		high: bar.high,
		low: bar.low,
		close: bar.close,
		volume: bar.volume,
		emaFast: emaFast[i],
		emaSlow: emaSlow[i],
		macdLine: macd.macd[i],
		signalLine: macd.signal[i],
		macdHist: macd.histogram[i],
		rsi: rsi[i],
		rsiMin: stoch.rsiMin[i],
		rsiMax: stoch.rsiMax[i],
		stochRsi: stoch.stochRsi[i],
		k: stoch.k[i],
		d: stoch.d[i],
		basis: bands.basis[i],
		std: bands.std[i],
		upperBB: bands.upper[i],
		lowerBB: bands.lower[i],
		volAvg: volAvg[i],
		prevHigh: priceAction.prevHigh[i],
		prevLow: priceAction.prevLow[i],
		bullishBreakout: priceAction.bullishBreakout[i],
		bearishBreakdown: priceAction.bearishBreakdown[i],
		atr: atr[i],
	}));
}

export const latestIndicatorRow = (
	rows: readonly IndicatorRow[]
): IndicatorRow | null => rows[rows.length - 1] ?? null;
