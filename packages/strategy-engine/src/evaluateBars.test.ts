import { describe, expect, it } from "vitest";
import { Bar, DEFAULT_INDICATOR_CONFIG, InvalidInputError } from "@barsignal/core";
import { evaluateBars } from "./evaluateBars";
import { evaluateSignal } from "./signalEvaluator";

const bars: Bar[] = Array.from({ length: 60 }, (_, i) => ({
	timestamp: 1_700_000_000_000 + i * 3_600_000,
	open: 100 + i,
	high: 101 + i,
	low: 99 + i,
	close: 100.5 + i,
	volume: 10 + i,
}));

describe("evaluateBars", () => {
	it("evaluates the last indicator row", () => {
		const result = evaluateBars(bars, DEFAULT_INDICATOR_CONFIG);
		expect(result.rows).toHaveLength(60);
		expect(result.latest).toBe(result.rows[59]);
		expect(result.verdict).toEqual(evaluateSignal(result.latest, DEFAULT_INDICATOR_CONFIG));
	});

	it("reports insufficient history while the slow EMA is warming up", () => {
		const { verdict } = evaluateBars(bars, DEFAULT_INDICATOR_CONFIG);
		expect(verdict.signal).toBe("NONE");
		expect(verdict.reason).toBe("insufficient_history");
		expect(verdict.missingFields).toEqual(["emaSlow"]);
	});

	it("propagates malformed input", () => {
		expect(() => evaluateBars([], DEFAULT_INDICATOR_CONFIG)).toThrow(InvalidInputError);
	});
});
