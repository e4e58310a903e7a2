import { describe, expect, it } from "vitest";
import { Bar, DEFAULT_INDICATOR_CONFIG } from "@barsignal/core";
import { computeIndicators } from "@barsignal/indicators";
import { evaluateSignal, resolveSignalSide } from "./signalEvaluator";
import type { SignalInput } from "./types";

const longRow = (overrides: Partial<SignalInput> = {}): SignalInput => ({
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
	...overrides,
});

const shortRow = (overrides: Partial<SignalInput> = {}): SignalInput => ({
	close: 80,
	volume: 200,
	emaFast: 100,
	emaSlow: 110,
	macdLine: -2,
	signalLine: -1,
	macdHist: -1,
	rsi: 40,
	k: 0.3,
	d: 0.5,
	basis: 100,
	volAvg: 100,
	bullishBreakout: false,
	bearishBreakdown: true,
	atr: 4,
	...overrides,
});

describe("evaluateSignal", () => {
	it("fires LONG with ATR targets when every long clause holds", () => {
		const verdict = evaluateSignal(longRow(), DEFAULT_INDICATOR_CONFIG);
		expect(verdict.signal).toBe("LONG");
		expect(verdict.reason).toBe("long_setup");
		expect(verdict.targets?.takeProfit).toBe(116);
		expect(verdict.targets?.stopLoss).toBe(107);
		expect(verdict.targets?.entryPrice).toBe(110);
		expect(verdict.targets?.pricingMode).toBe("atr");
		expect(verdict.targets?.expectedReturnPct).toBeCloseTo(54.545454, 5);
	});

	it("fires SHORT with mirrored ATR targets", () => {
		const verdict = evaluateSignal(shortRow());
		expect(verdict.signal).toBe("SHORT");
		expect(verdict.reason).toBe("short_setup");
		expect(verdict.targets?.takeProfit).toBe(72);
		expect(verdict.targets?.stopLoss).toBe(84);
		expect(verdict.targets?.expectedReturnPct).toBeCloseTo(100, 9);
	});

	it("uses percentage targets without needing an ATR value", () => {
		const verdict = evaluateSignal(longRow({ atr: null }), {
			pricingMode: "percentage",
		});
		expect(verdict.signal).toBe("LONG");
		expect(verdict.targets?.pricingMode).toBe("percentage");
		expect(verdict.targets?.takeProfit).toBeCloseTo(114.4, 9);
		expect(verdict.targets?.stopLoss).toBeCloseTo(107.8, 9);
		expect(verdict.targets?.expectedReturnPct).toBeCloseTo(40, 9);
	});

	it("uses mirrored percentage targets for a short", () => {
		const verdict = evaluateSignal(shortRow({ atr: null }), {
			pricingMode: "percentage",
		});
		expect(verdict.signal).toBe("SHORT");
		expect(verdict.targets?.pricingMode).toBe("percentage");
		expect(verdict.targets?.takeProfit).toBeCloseTo(76.8, 9);
		expect(verdict.targets?.stopLoss).toBeCloseTo(81.6, 9);
		expect(verdict.targets?.expectedReturnPct).toBeCloseTo(40, 9);
	});

	it("returns no_setup when a single clause fails", () => {
		const verdict = evaluateSignal(longRow({ volume: 50 }));
		expect(verdict.signal).toBe("NONE");
		expect(verdict.reason).toBe("no_setup");
		expect(verdict.targets).toBeNull();
		expect(verdict.checks.long.volumeAboveAverage).toBe(false);
		expect(verdict.checks.long.closeVsEmaFast).toBe(true);
	});

	it("requires the breakout flag", () => {
		const verdict = evaluateSignal(longRow({ bullishBreakout: false }));
		expect(verdict.reason).toBe("no_setup");
		expect(verdict.checks.long.priceAction).toBe(false);
	});

	it("compares RSI against the configured thresholds", () => {
		expect(evaluateSignal(longRow({ rsi: 55 })).signal).toBe("NONE");
		expect(evaluateSignal(longRow({ rsi: 55 }), { rsiThresholdLong: 50 }).signal).toBe(
			"LONG"
		);
	});

	it("reports missing indicator fields as insufficient history", () => {
		const verdict = evaluateSignal(longRow({ rsi: null, volAvg: null }));
		expect(verdict.signal).toBe("NONE");
		expect(verdict.reason).toBe("insufficient_history");
		expect(verdict.missingFields).toEqual(["rsi", "volAvg"]);
		expect(verdict.checks.long.rsiThreshold).toBe(false);
	});

	it("needs ATR only in atr pricing mode", () => {
		const verdict = evaluateSignal(longRow({ atr: null }));
		expect(verdict.reason).toBe("insufficient_history");
		expect(verdict.missingFields).toEqual(["atr"]);
	});

	it.each([0, -5, Number.NaN])("rejects close price %s", (close) => {
		const verdict = evaluateSignal(longRow({ close }));
		expect(verdict.signal).toBe("NONE");
		expect(verdict.reason).toBe("non_positive_price");
		expect(verdict.targets).toBeNull();
	});

	it("returns the same verdict for the same input", () => {
		const row = longRow();
		expect(evaluateSignal(row)).toEqual(evaluateSignal(row));
	});

	it("never fires both sides on pipeline output", () => {
		let seed = 42;
		const next = (): number => {
			seed = (seed * 1_664_525 + 1_013_904_223) % 4_294_967_296;
			return seed / 4_294_967_296;
		};
		let close = 100;
		const bars: Bar[] = Array.from({ length: 400 }, (_, i) => {
			const open = close;
			close = Math.max(1, close + (next() - 0.5) * 4);
			return {
				timestamp: 1_700_000_000_000 + i * 3_600_000,
				open,
				high: Math.max(open, close) + next(),
				low: Math.min(open, close) - next(),
				close,
				volume: 100 + next() * 900,
			};
		});

		for (const row of computeIndicators(bars, DEFAULT_INDICATOR_CONFIG)) {
			const verdict = evaluateSignal(row, DEFAULT_INDICATOR_CONFIG);
			const longAll = Object.values(verdict.checks.long).every(Boolean);
			const shortAll = Object.values(verdict.checks.short).every(Boolean);
			expect(longAll && shortAll).toBe(false);
			if (verdict.targets) {
				const { takeProfit, stopLoss } = verdict.targets;
				if (verdict.signal === "LONG") {
					expect(takeProfit).toBeGreaterThan(row.close);
					expect(stopLoss).toBeLessThan(row.close);
				} else {
					expect(takeProfit).toBeLessThan(row.close);
					expect(stopLoss).toBeGreaterThan(row.close);
				}
			}
		}
	});
});

describe("resolveSignalSide", () => {
	it("gives long precedence over short", () => {
		expect(resolveSignalSide(true, true)).toBe("LONG");
		expect(resolveSignalSide(false, true)).toBe("SHORT");
		expect(resolveSignalSide(false, false)).toBeNull();
	});
});
