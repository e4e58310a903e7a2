import type { Bar, IndicatorConfig } from "@barsignal/core";
import {
	IndicatorRow,
	computeIndicators,
	latestIndicatorRow,
} from "@barsignal/indicators";
import { evaluateSignal } from "./signalEvaluator";
import type { SignalVerdict } from "./types";

export interface BarsEvaluation {
	rows: IndicatorRow[];
	latest: IndicatorRow;
	verdict: SignalVerdict;
}

/**
 * Indicator pipeline followed by the evaluator on the latest row.
 * @throws InvalidInputError when the bar series is malformed
 */
export const evaluateBars = (
	bars: readonly Bar[],
	config: IndicatorConfig
): BarsEvaluation => {
	const rows = computeIndicators(bars, config);
	const latest = latestIndicatorRow(rows);
	if (!latest) {
		throw new Error("Indicator pipeline returned no rows");
	}
	return { rows, latest, verdict: evaluateSignal(latest, config) };
};
