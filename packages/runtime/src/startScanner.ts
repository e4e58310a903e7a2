import { describeError } from "@barsignal/core";
import { runScanCycle } from "./scanCycle";
import { runtimeLogger } from "./runtimeShared";
import type { ScannerHandle, StartScannerOptions } from "./types";

/**
 * Run a scan cycle now and then every `cycleIntervalMs`, measured from the
 * start of each cycle. Cycles never overlap: a slow cycle delays the next.
 */
export const startScanner = (options: StartScannerOptions): ScannerHandle => {
	if (!Number.isFinite(options.cycleIntervalMs) || options.cycleIntervalMs <= 0) {
		throw new Error(`cycleIntervalMs must be positive, got ${options.cycleIntervalMs}`);
	}

	const now = options.now ?? Date.now;
	let running = true;
	let cycle = 0;
	let timer: ReturnType<typeof setTimeout> | null = null;
	let inFlight: Promise<void> = Promise.resolve();

	const runCycle = async (): Promise<void> => {
		cycle += 1;
		const startedAt = now();
		try {
			const results = await runScanCycle({ ...options, cycle });
			options.onCycle?.(results, cycle);
		} catch (error) {
			runtimeLogger.error("scan_cycle_failed", { cycle, error: describeError(error) });
		}
		if (!running) {
			return;
		}
		const delay = Math.max(0, options.cycleIntervalMs - (now() - startedAt));
		runtimeLogger.debug("scan_cycle_scheduled", { nextCycle: cycle + 1, delayMs: delay });
		timer = setTimeout(() => {
			timer = null;
			inFlight = runCycle();
		}, delay);
	};

	runtimeLogger.info("scanner_started", {
		symbols: options.scanner.symbols,
		timeframe: options.scanner.timeframe,
		cycleIntervalMs: options.cycleIntervalMs,
		channel: options.sender.channel,
	});
	inFlight = runCycle();

	return {
		get running() {
			return running;
		},
		stop() {
			if (!running) {
				return;
			}
			running = false;
			if (timer) {
				clearTimeout(timer);
				timer = null;
			}
			runtimeLogger.info("scanner_stopped", { cycles: cycle });
		},
		whenIdle: () => inFlight,
	};
};
