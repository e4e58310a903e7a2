import type { Bar } from "@barsignal/core";

/**
 * Derived values aligned to one bar. `null` marks a field whose window has
 * not accumulated enough history yet.
 */
export interface IndicatorRow extends Bar {
	emaFast: number | null;
	emaSlow: number | null;
	macdLine: number | null;
	signalLine: number | null;
	macdHist: number | null;
	rsi: number | null;
	rsiMin: number | null;
	rsiMax: number | null;
	stochRsi: number | null;
	k: number | null;
	d: number | null;
	basis: number | null;
	std: number | null;
	upperBB: number | null;
	lowerBB: number | null;
	volAvg: number | null;
	prevHigh: number | null;
	prevLow: number | null;
	bullishBreakout: boolean;
	bearishBreakdown: boolean;
	atr: number | null;
}
