import type { PricingMode, SignalKind, SignalSide } from "@barsignal/core";
import type { IndicatorRow } from "@barsignal/indicators";

export type SignalReason =
	| "long_setup"
	| "short_setup"
	| "no_setup"
	| "insufficient_history"
	| "non_positive_price";

/** Fields of an indicator row that take part in the decision. */
export type SignalInput = Pick<
	IndicatorRow,
	| "close"
	| "volume"
	| "emaFast"
	| "emaSlow"
	| "macdLine"
	| "signalLine"
	| "macdHist"
	| "rsi"
	| "k"
	| "d"
	| "basis"
	| "volAvg"
	| "bullishBreakout"
	| "bearishBreakdown"
	| "atr"
>;

export type ConditionClause =
	| "closeVsEmaFast"
	| "closeVsEmaSlow"
	| "macdVsSignal"
	| "macdHistogram"
	| "rsiThreshold"
	| "kVsD"
	| "closeVsBasis"
	| "volumeAboveAverage"
	| "priceAction";

export type ConditionChecks = Record<ConditionClause, boolean>;

export interface TargetPair {
	side: SignalSide;
	pricingMode: PricingMode;
	entryPrice: number;
	takeProfit: number;
	stopLoss: number;
	leverage: number;
	/** Leverage-scaled return at take profit, in percent. */
	expectedReturnPct: number;
}

export interface SignalVerdict {
	signal: SignalKind;
	reason: SignalReason;
	targets: TargetPair | null;
	checks: {
		long: ConditionChecks;
		short: ConditionChecks;
	};
	/** Row fields that were still null, when the reason is insufficient_history. */
	missingFields: string[];
}
