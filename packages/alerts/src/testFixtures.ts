import { evaluateSignal, SignalInput, SignalVerdict } from "@barsignal/strategy-engine";

const LONG_ROW: SignalInput = {
	close: 110,
	volume: 200,
	emaFast: 100,
	emaSlow: 90,
	macdLine: 2,
	signalLine: 1,
	macdHist: 1,
	rsi: 60,
	k: 0.7,
	d: 0.5,
	basis: 100,
	volAvg: 100,
	bullishBreakout: true,
	bearishBreakdown: false,
	atr: 3,
};

const SHORT_ROW: SignalInput = {
	...LONG_ROW,
	close: 80,
	emaSlow: 110,
	macdLine: -2,
	signalLine: -1,
	macdHist: -1,
	rsi: 40,
	k: 0.3,
	bullishBreakout: false,
	bearishBreakdown: true,
	atr: 4,
};

export const longVerdict = (): SignalVerdict => evaluateSignal(LONG_ROW);
export const shortVerdict = (): SignalVerdict => evaluateSignal(SHORT_ROW);
export const noneVerdict = (): SignalVerdict =>
	evaluateSignal({ ...LONG_ROW, volume: 10 });
