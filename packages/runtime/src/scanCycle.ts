import { Candle, InvalidInputError, describeError } from "@barsignal/core";
import { buildSignalAlert } from "@barsignal/alerts";
import { fetchBarSeries } from "@barsignal/data";
import { BarsEvaluation, evaluateBars } from "@barsignal/strategy-engine";
import { logVerdict, runtimeLogger, sleep as defaultSleep } from "./runtimeShared";
import type { ScanCycleOptions, SymbolScanResult, SymbolScanStatus } from "./types";

const SKIPPED_REASONS = new Set(["insufficient_history", "non_positive_price"]);

const result = (
	symbol: string,
	status: SymbolScanStatus,
	reason: string,
	extra: Partial<SymbolScanResult> = {}
): SymbolScanResult => ({
	symbol,
	status,
	reason,
	bars: 0,
	barTimestamp: null,
	verdict: null,
	alert: null,
	...extra,
});

const scanSymbol = async (
	symbol: string,
	options: ScanCycleOptions
): Promise<SymbolScanResult> => {
	const { scanner } = options;
	let bars: Candle[];
	try {
		bars = await fetchBarSeries(options.client, {
			symbol,
			timeframe: scanner.timeframe,
			limit: scanner.limit,
			dropOpenBar: scanner.dropOpenBar,
			now: (options.now ?? Date.now)(),
		});
	} catch (error) {
		runtimeLogger.error("symbol_fetch_failed", { symbol, error: describeError(error) });
		return result(symbol, "error", "fetch_failed", { error: describeError(error) });
	}

	if (!bars.length) {
		runtimeLogger.warn("symbol_no_data", { symbol, timeframe: scanner.timeframe });
		return result(symbol, "skipped", "no_data");
	}

	let evaluation: BarsEvaluation;
	try {
		evaluation = (options.evaluate ?? evaluateBars)(bars, options.indicators);
	} catch (error) {
		if (error instanceof InvalidInputError) {
			runtimeLogger.warn("symbol_invalid_bars", {
				symbol,
				error: error.message,
				details: error.details,
			});
			return result(symbol, "skipped", "invalid_input", {
				bars: bars.length,
				error: error.message,
			});
		}
		runtimeLogger.error("symbol_evaluation_failed", { symbol, error: describeError(error) });
		return result(symbol, "error", "evaluation_failed", {
			bars: bars.length,
			error: describeError(error),
		});
	}

	const { latest, verdict } = evaluation;
	logVerdict(symbol, scanner.timeframe, latest, verdict);
	const base = { bars: bars.length, barTimestamp: latest.timestamp, verdict };

	const alert = buildSignalAlert(symbol, scanner.timeframe, latest.timestamp, verdict);
	if (!alert) {
		const status = SKIPPED_REASONS.has(verdict.reason) ? "skipped" : "no_signal";
		return result(symbol, status, verdict.reason, base);
	}

	try {
		await options.sender.send(alert);
	} catch (error) {
		runtimeLogger.error("alert_delivery_failed", {
			symbol,
			channel: options.sender.channel,
			error: describeError(error),
		});
		return result(symbol, "error", "alert_failed", {
			...base,
			alert,
			error: describeError(error),
		});
	}
	return result(symbol, "signal", verdict.reason, { ...base, alert });
};

/**
 * Evaluate every configured symbol once, in order, pausing between symbols.
 * A failing symbol is logged and reported; it never stops the cycle.
 */
export const runScanCycle = async (
	options: ScanCycleOptions
): Promise<SymbolScanResult[]> => {
	const now = options.now ?? Date.now;
	const pause = options.sleep ?? defaultSleep;
	const cycle = options.cycle ?? 1;
	const startedAt = now();
	runtimeLogger.info("scan_cycle_started", {
		cycle,
		symbols: options.scanner.symbols,
		timeframe: options.scanner.timeframe,
	});

	const results: SymbolScanResult[] = [];
	for (const [index, symbol] of options.scanner.symbols.entries()) {
		if (index > 0 && options.scanner.symbolDelayMs > 0) {
			await pause(options.scanner.symbolDelayMs);
		}
		results.push(await scanSymbol(symbol, options));
	}

	const counts: Record<SymbolScanStatus, number> = {
		signal: 0,
		no_signal: 0,
		skipped: 0,
		error: 0,
	};
	for (const entry of results) {
		counts[entry.status] += 1;
	}
	runtimeLogger.info("scan_cycle_completed", {
		cycle,
		durationMs: now() - startedAt,
		counts,
	});
	return results;
};
