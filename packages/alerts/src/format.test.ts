import { describe, expect, it } from "vitest";
import { ALERT_SUBJECT, buildSignalAlert, formatSignalAlert } from "./format";
import { longVerdict, noneVerdict, shortVerdict } from "./testFixtures";

describe("formatSignalAlert", () => {
	it("renders a long alert", () => {
		expect(formatSignalAlert("FLOCK/USDT", longVerdict())).toBe(
			[
				"Buy signal triggered for FLOCK/USDT at price 110.000000.",
				"Take Profit: 116.000000, Stop Loss: 107.000000.",
				"Profit formula (Long): ((TakeProfit - Entry Price) / Entry Price) * Leverage * 100%.",
				"In numbers: ((116.000000 - 110.000000) / 110.000000) * 10 * 100 = 54.545455%",
			].join("\n")
		);
	});

	it("renders a short alert", () => {
		expect(formatSignalAlert("MOEW/USDT", shortVerdict())).toBe(
			[
				"Sell signal triggered for MOEW/USDT at price 80.000000.",
				"Take Profit: 72.000000, Stop Loss: 84.000000.",
				"Profit formula (Short): ((Entry Price - TakeProfit) / Entry Price) * Leverage * 100%.",
				"In numbers: ((80.000000 - 72.000000) / 80.000000) * 10 * 100 = 100.000000%",
			].join("\n")
		);
	});

	it("returns null when nothing fired", () => {
		expect(formatSignalAlert("SUI/USDT", noneVerdict())).toBeNull();
	});
});

describe("buildSignalAlert", () => {
	it("carries the subject and the bar metadata", () => {
		const alert = buildSignalAlert("FLOCK/USDT", "1h", 1_700_000_000_000, longVerdict());
		expect(alert?.subject).toBe(ALERT_SUBJECT);
		expect(alert?.side).toBe("LONG");
		expect(alert?.timeframe).toBe("1h");
		expect(alert?.barTimestamp).toBe(1_700_000_000_000);
		expect(alert?.targets.takeProfit).toBe(116);
	});

	it("skips NONE verdicts", () => {
		expect(buildSignalAlert("SUI/USDT", "1h", 0, noneVerdict())).toBeNull();
	});
});
