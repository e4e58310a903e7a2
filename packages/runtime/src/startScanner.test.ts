import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_INDICATOR_CONFIG } from "@barsignal/core";
import { startScanner } from "./startScanner";
import { FakeMarketDataClient, RecordingSender, flatCandles } from "./testFakes";
import type { StartScannerOptions } from "./types";

const options = (
	client: FakeMarketDataClient,
	cycles: number[]
): StartScannerOptions => ({
	client,
	sender: new RecordingSender(),
	scanner: {
		symbols: ["SUI/USDT"],
		timeframe: "1h",
		limit: 300,
		symbolDelayMs: 0,
		dropOpenBar: false,
	},
	indicators: DEFAULT_INDICATOR_CONFIG,
	cycleIntervalMs: 60_000,
	sleep: async () => {},
	onCycle: (_results, cycle) => {
		cycles.push(cycle);
	},
});

describe("startScanner", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("runs immediately and then on every interval", async () => {
		const cycles: number[] = [];
		const client = new FakeMarketDataClient({ "SUI/USDT": flatCandles("SUI/USDT", 5) });
		const handle = startScanner(options(client, cycles));

		await handle.whenIdle();
		expect(cycles).toEqual([1]);

		await vi.advanceTimersByTimeAsync(59_999);
		expect(client.calls).toHaveLength(1);

		await vi.advanceTimersByTimeAsync(1);
		await handle.whenIdle();
		expect(cycles).toEqual([1, 2]);

		handle.stop();
	});

	it("stops scheduling after stop()", async () => {
		const cycles: number[] = [];
		const client = new FakeMarketDataClient({});
		const handle = startScanner(options(client, cycles));
		await handle.whenIdle();

		handle.stop();
		await vi.advanceTimersByTimeAsync(180_000);

		expect(handle.running).toBe(false);
		expect(cycles).toEqual([1]);
		expect(client.calls).toHaveLength(1);
	});

	it("never overlaps a slow cycle", async () => {
		const cycles: number[] = [];
		const client = new FakeMarketDataClient({
			"SUI/USDT": () =>
				new Promise((resolve) => {
					setTimeout(() => resolve([]), 90_000);
				}),
		});
		const handle = startScanner(options(client, cycles));

		await vi.advanceTimersByTimeAsync(60_000);
		expect(client.calls).toHaveLength(1);
		expect(cycles).toEqual([]);

		await vi.advanceTimersByTimeAsync(30_001);
		expect(cycles).toEqual([1]);
		expect(client.calls).toHaveLength(2);

		handle.stop();
		await vi.advanceTimersByTimeAsync(90_000);
		await handle.whenIdle();
		expect(cycles).toEqual([1, 2]);
	});

	it("rejects a non-positive interval", () => {
		const client = new FakeMarketDataClient({});
		expect(() =>
			startScanner({ ...options(client, []), cycleIntervalMs: 0 })
		).toThrow("cycleIntervalMs must be positive, got 0");
	});
});
