import type { IndicatorConfig, SignalSide } from "@barsignal/core";
import type { TargetPair } from "./types";

const priceDistances = (
	entryPrice: number,
	atr: number | null,
	config: IndicatorConfig
): { profit: number; loss: number } | null => {
	if (config.pricingMode === "percentage") {
		return {
			profit: entryPrice * config.takeProfitPct,
			loss: entryPrice * config.stopLossPct,
		};
	}
	if (atr === null || !Number.isFinite(atr)) {
		return null;
	}
	return {
		profit: atr * config.takeProfitAtrMultiplier,
		loss: atr * config.stopLossAtrMultiplier,
	};
};

/**
 * Take-profit / stop-loss pair around `entryPrice`. Null when the ATR mode is
 * selected and no ATR value is available.
 */
export const computeTargets = (
	side: SignalSide,
	entryPrice: number,
	atr: number | null,
	config: IndicatorConfig
): TargetPair | null => {
	const distances = priceDistances(entryPrice, atr, config);
	if (!distances) {
		return null;
	}

	const takeProfit =
		side === "LONG" ? entryPrice + distances.profit : entryPrice - distances.profit;
	const stopLoss =
		side === "LONG" ? entryPrice - distances.loss : entryPrice + distances.loss;
	const move = side === "LONG" ? takeProfit - entryPrice : entryPrice - takeProfit;

	return {
		side,
		pricingMode: config.pricingMode,
		entryPrice,
		takeProfit,
		stopLoss,
		leverage: config.leverage,
		expectedReturnPct: (move / entryPrice) * config.leverage * 100,
	};
};
