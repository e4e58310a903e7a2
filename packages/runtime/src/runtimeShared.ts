import { createLogger } from "@barsignal/core";
import type { IndicatorRow } from "@barsignal/indicators";
import type { SignalVerdict } from "@barsignal/strategy-engine";

export const runtimeLogger = createLogger("scanner-runtime");

export const sleep = (ms: number): Promise<void> =>
	new Promise((resolve) => {
		setTimeout(resolve, ms);
	});

export const logVerdict = (
	symbol: string,
	timeframe: string,
	latest: IndicatorRow,
	verdict: SignalVerdict
): void => {
	runtimeLogger.info("signal_verdict", {
		symbol,
		timeframe,
		timestamp: latest.timestamp,
		close: latest.close,
		signal: verdict.signal,
		reason: verdict.reason,
		targets: verdict.targets,
		missingFields: verdict.missingFields.length ? verdict.missingFields : undefined,
	});
	runtimeLogger.debug("signal_checks", {
		symbol,
		long: verdict.checks.long,
		short: verdict.checks.short,
	});
};
