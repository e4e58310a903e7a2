import type { SignalVerdict, TargetPair } from "@barsignal/strategy-engine";
import type { SignalAlert } from "./types";

export const ALERT_SUBJECT = "Trading Bot Alert";

const price = (value: number): string => value.toFixed(6);

const profitFormula = (targets: TargetPair): string[] => {
	const entry = price(targets.entryPrice);
	const takeProfit = price(targets.takeProfit);
	const result = `${price(targets.expectedReturnPct)}%`;
	if (targets.side === "LONG") {
		return [
			"Profit formula (Long): ((TakeProfit - Entry Price) / Entry Price) * Leverage * 100%.",
			`In numbers: ((${takeProfit} - ${entry}) / ${entry}) * ${targets.leverage} * 100 = ${result}`,
		];
	}
	return [
		"Profit formula (Short): ((Entry Price - TakeProfit) / Entry Price) * Leverage * 100%.",
		`In numbers: ((${entry} - ${takeProfit}) / ${entry}) * ${targets.leverage} * 100 = ${result}`,
	];
};

/**
 * Plain-text alert body for a fired verdict; null for NONE.
 */
export const formatSignalAlert = (symbol: string, verdict: SignalVerdict): string | null => {
	const targets = verdict.targets;
	if (verdict.signal === "NONE" || !targets) {
		return null;
	}
	const action = targets.side === "LONG" ? "Buy" : "Sell";
	return [
		`${action} signal triggered for ${symbol} at price ${price(targets.entryPrice)}.`,
		`Take Profit: ${price(targets.takeProfit)}, Stop Loss: ${price(targets.stopLoss)}.`,
		...profitFormula(targets),
	].join("\n");
};

export const buildSignalAlert = (
	symbol: string,
	timeframe: string,
	barTimestamp: number,
	verdict: SignalVerdict
): SignalAlert | null => {
	const text = formatSignalAlert(symbol, verdict);
	if (text === null || !verdict.targets) {
		return null;
	}
	return {
		symbol,
		timeframe,
		barTimestamp,
		side: verdict.targets.side,
		targets: verdict.targets,
		subject: ALERT_SUBJECT,
		text,
	};
};
