import { describe, expect, it, vi } from "vitest";
import { DEFAULT_INDICATOR_CONFIG, InvalidInputError } from "@barsignal/core";
import { computeIndicators } from "@barsignal/indicators";
import { evaluateSignal } from "@barsignal/strategy-engine";
import { runScanCycle } from "./scanCycle";
import {
	FakeMarketDataClient,
	RecordingSender,
	flatCandles,
	risingCandles,
} from "./testFakes";
import type { BarsEvaluator, ScanCycleOptions } from "./types";

const scanner = (symbols: string[]): ScanCycleOptions["scanner"] => ({
	symbols,
	timeframe: "1h",
	limit: 300,
	symbolDelayMs: 0,
	dropOpenBar: false,
});

const noSleep = async (): Promise<void> => {};

// Evaluator stub whose latest row satisfies every long clause.
const firingEvaluator: BarsEvaluator = (bars, config) => {
	const rows = computeIndicators(bars, config);
	const latest = {
		...rows[rows.length - 1],
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
	return { rows, latest, verdict: evaluateSignal(latest, config) };
};

describe("runScanCycle", () => {
	it("reports no_signal for a flat market", async () => {
		const [result] = await runScanCycle({
			client: new FakeMarketDataClient({ "SUI/USDT": flatCandles("SUI/USDT", 300) }),
			sender: new RecordingSender(),
			scanner: scanner(["SUI/USDT"]),
			indicators: DEFAULT_INDICATOR_CONFIG,
			sleep: noSleep,
		});
		expect(result.status).toBe("no_signal");
		expect(result.reason).toBe("no_setup");
		expect(result.bars).toBe(300);
		expect(result.alert).toBeNull();
	});

	it("skips symbols with too little history", async () => {
		const [result] = await runScanCycle({
			client: new FakeMarketDataClient({ "URO/USDT": risingCandles("URO/USDT", 60) }),
			sender: new RecordingSender(),
			scanner: scanner(["URO/USDT"]),
			indicators: DEFAULT_INDICATOR_CONFIG,
			sleep: noSleep,
		});
		expect(result.status).toBe("skipped");
		expect(result.reason).toBe("insufficient_history");
		expect(result.verdict?.missingFields).toEqual(["emaSlow"]);
	});

	it("skips symbols without data", async () => {
		const [result] = await runScanCycle({
			client: new FakeMarketDataClient({}),
			sender: new RecordingSender(),
			scanner: scanner(["MOEW/USDT"]),
			indicators: DEFAULT_INDICATOR_CONFIG,
			sleep: noSleep,
		});
		expect(result).toMatchObject({ status: "skipped", reason: "no_data", bars: 0 });
	});

	it("skips malformed series", async () => {
		const evaluate: BarsEvaluator = () => {
			throw new InvalidInputError("Bar series is empty");
		};
		const [result] = await runScanCycle({
			client: new FakeMarketDataClient({ "SUI/USDT": flatCandles("SUI/USDT", 3) }),
			sender: new RecordingSender(),
			scanner: scanner(["SUI/USDT"]),
			indicators: DEFAULT_INDICATOR_CONFIG,
			evaluate,
			sleep: noSleep,
		});
		expect(result).toMatchObject({
			status: "skipped",
			reason: "invalid_input",
			error: "Bar series is empty",
		});
	});

	it("sends an alert when a verdict fires", async () => {
		const sender = new RecordingSender();
		const [result] = await runScanCycle({
			client: new FakeMarketDataClient({ "FLOCK/USDT": flatCandles("FLOCK/USDT", 300) }),
			sender,
			scanner: scanner(["FLOCK/USDT"]),
			indicators: DEFAULT_INDICATOR_CONFIG,
			evaluate: firingEvaluator,
			sleep: noSleep,
		});
		expect(result.status).toBe("signal");
		expect(result.reason).toBe("long_setup");
		expect(sender.alerts).toHaveLength(1);
		expect(sender.alerts[0].text.split("\n")[0]).toBe(
			"Buy signal triggered for FLOCK/USDT at price 110.000000."
		);
		expect(sender.alerts[0].barTimestamp).toBe(flatCandles("FLOCK/USDT", 300)[299].timestamp);
	});

	it("reports delivery failures as errors", async () => {
		const [result] = await runScanCycle({
			client: new FakeMarketDataClient({ "FLOCK/USDT": flatCandles("FLOCK/USDT", 300) }),
			sender: new RecordingSender(new Error("smtp down")),
			scanner: scanner(["FLOCK/USDT"]),
			indicators: DEFAULT_INDICATOR_CONFIG,
			evaluate: firingEvaluator,
			sleep: noSleep,
		});
		expect(result.status).toBe("error");
		expect(result.reason).toBe("alert_failed");
		expect(result.error).toBe("smtp down");
		expect(result.alert?.side).toBe("LONG");
	});

	it("continues after a symbol fails to load", async () => {
		const client = new FakeMarketDataClient({
			"AVAAI/USDT": new Error("rate limited"),
			"SUI/USDT": flatCandles("SUI/USDT", 300),
		});
		const results = await runScanCycle({
			client,
			sender: new RecordingSender(),
			scanner: scanner(["AVAAI/USDT", "SUI/USDT"]),
			indicators: DEFAULT_INDICATOR_CONFIG,
			sleep: noSleep,
		});
		expect(client.calls).toEqual(["AVAAI/USDT", "SUI/USDT"]);
		expect(results.map((r) => [r.symbol, r.status])).toEqual([
			["AVAAI/USDT", "error"],
			["SUI/USDT", "no_signal"],
		]);
		expect(results[0].error).toBe("rate limited");
	});

	it("pauses between symbols only", async () => {
		const sleep = vi.fn(async (_ms: number): Promise<void> => {});
		await runScanCycle({
			client: new FakeMarketDataClient({}),
			sender: new RecordingSender(),
			scanner: { ...scanner(["A/USDT", "B/USDT", "C/USDT"]), symbolDelayMs: 1000 },
			indicators: DEFAULT_INDICATOR_CONFIG,
			sleep,
		});
		expect(sleep.mock.calls).toEqual([[1000], [1000]]);
	});
});
