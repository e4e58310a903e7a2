import {
	IndicatorConfig,
	SignalSide,
	withIndicatorDefaults,
} from "@barsignal/core";
import { computeTargets } from "./targets";
import type {
	ConditionChecks,
	SignalInput,
	SignalReason,
	SignalVerdict,
} from "./types";

const REQUIRED_FIELDS = [
	"emaFast",
	"emaSlow",
	"macdLine",
	"signalLine",
	"macdHist",
	"rsi",
	"k",
	"d",
	"basis",
	"volAvg",
] as const satisfies ReadonlyArray<keyof SignalInput>;

const above = (value: number | null, reference: number | null): boolean =>
	value !== null && reference !== null && value > reference;

const below = (value: number | null, reference: number | null): boolean =>
	value !== null && reference !== null && value < reference;

export const longChecks = (row: SignalInput, config: IndicatorConfig): ConditionChecks => ({
	closeVsEmaFast: above(row.close, row.emaFast),
	closeVsEmaSlow: above(row.close, row.emaSlow),
	macdVsSignal: above(row.macdLine, row.signalLine),
	macdHistogram: above(row.macdHist, 0),
	rsiThreshold: above(row.rsi, config.rsiThresholdLong),
	kVsD: above(row.k, row.d),
	closeVsBasis: above(row.close, row.basis),
	volumeAboveAverage: above(row.volume, row.volAvg),
	priceAction: row.bullishBreakout,
});

export const shortChecks = (row: SignalInput, config: IndicatorConfig): ConditionChecks => ({
	closeVsEmaFast: below(row.close, row.emaFast),
	closeVsEmaSlow: below(row.close, row.emaSlow),
	macdVsSignal: below(row.macdLine, row.signalLine),
	macdHistogram: below(row.macdHist, 0),
	rsiThreshold: below(row.rsi, config.rsiThresholdShort),
	kVsD: below(row.k, row.d),
	closeVsBasis: below(row.close, row.basis),
	volumeAboveAverage: above(row.volume, row.volAvg),
	priceAction: row.bearishBreakdown,
});

const allHold = (checks: ConditionChecks): boolean =>
	Object.values(checks).every(Boolean);

/**
 * Long takes precedence when both sides hold.
 */
export const resolveSignalSide = (
	longFires: boolean,
	shortFires: boolean
): SignalSide | null => {
	if (longFires) {
		return "LONG";
	}
	return shortFires ? "SHORT" : null;
};

/**
 * Reduce the latest indicator row to a verdict. Never throws: missing
 * configuration falls back to the defaults, and unusable rows yield NONE.
 */
export function evaluateSignal(
	row: SignalInput,
	config: Partial<IndicatorConfig> = {}
): SignalVerdict {
	const settings = withIndicatorDefaults(config);
	const checks = {
		long: longChecks(row, settings),
		short: shortChecks(row, settings),
	};
	const none = (reason: SignalReason, missingFields: string[] = []): SignalVerdict => ({
		signal: "NONE",
		reason,
		targets: null,
		checks,
		missingFields,
	});

	if (!Number.isFinite(row.close) || row.close <= 0) {
		return none("non_positive_price");
	}

	const missingFields: string[] = REQUIRED_FIELDS.filter((field) => row[field] === null);
	if (settings.pricingMode === "atr" && row.atr === null) {
		missingFields.push("atr");
	}
	if (missingFields.length) {
		return none("insufficient_history", missingFields);
	}

	const side = resolveSignalSide(allHold(checks.long), allHold(checks.short));
	if (!side) {
		return none("no_setup");
	}

	const targets = computeTargets(side, row.close, row.atr, settings);
	if (!targets) {
		return none("insufficient_history", ["atr"]);
	}

	return {
		signal: side,
		reason: side === "LONG" ? "long_setup" : "short_setup",
		targets,
		checks,
		missingFields: [],
	};
}
