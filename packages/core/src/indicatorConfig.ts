import { ConfigError } from "./errors";
import type { PricingMode } from "./types";

/**
 * Window lengths, multipliers and thresholds shared by the indicator
 * pipeline and the signal evaluator. Resolved once per run and frozen.
 */
export interface IndicatorConfig {
	readonly emaFastLen: number;
	readonly emaSlowLen: number;
	readonly rsiLen: number;
	readonly stochLen: number;
	readonly bbLen: number;
	readonly bbMult: number;
	readonly macdFast: number;
	readonly macdSlow: number;
	readonly macdSignal: number;
	readonly rsiThresholdLong: number;
	readonly rsiThresholdShort: number;
	readonly volAvgWindow: number;
	readonly stochSmoothK: number;
	readonly stochSmoothD: number;
	readonly atrWindow: number;
	readonly takeProfitAtrMultiplier: number;
	readonly stopLossAtrMultiplier: number;
	/** Fraction of the entry price, e.g. 0.04 for 4%. */
	readonly takeProfitPct: number;
	/** Fraction of the entry price, e.g. 0.02 for 2%. */
	readonly stopLossPct: number;
	readonly leverage: number;
	readonly pricingMode: PricingMode;
}

export type IndicatorConfigKey = keyof IndicatorConfig;

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = Object.freeze({
	emaFastLen: 50,
	emaSlowLen: 200,
	rsiLen: 14,
	stochLen: 14,
	bbLen: 20,
	bbMult: 2,
	macdFast: 12,
	macdSlow: 26,
	macdSignal: 9,
	rsiThresholdLong: 55,
	rsiThresholdShort: 45,
	volAvgWindow: 20,
	stochSmoothK: 3,
	stochSmoothD: 3,
	atrWindow: 14,
	takeProfitAtrMultiplier: 2,
	stopLossAtrMultiplier: 1,
	takeProfitPct: 0.04,
	stopLossPct: 0.02,
	leverage: 10,
	pricingMode: "atr",
});

// Setting names used by older settings files.
const LEGACY_ALIASES: Readonly<Record<string, IndicatorConfigKey>> = {
	macd_fast: "macdFast",
	macd_slow: "macdSlow",
	macd_signal: "macdSignal",
	rsi_threshold_long: "rsiThresholdLong",
	rsi_threshold_short: "rsiThresholdShort",
	volAvg_window: "volAvgWindow",
	stoch_smooth_k: "stochSmoothK",
	stoch_smooth_d: "stochSmoothD",
	atr_window: "atrWindow",
	take_profit_atr_multiplier: "takeProfitAtrMultiplier",
	stop_loss_atr_multiplier: "stopLossAtrMultiplier",
	take_profit_pct: "takeProfitPct",
	stop_loss_pct: "stopLossPct",
	pricing_mode: "pricingMode",
};

const PRICING_MODES: readonly PricingMode[] = ["atr", "percentage"];

const isPricingMode = (value: unknown): value is PricingMode =>
	PRICING_MODES.some((mode) => mode === value);

const readSetting = (
	settings: Record<string, unknown>,
	key: IndicatorConfigKey
): unknown => {
	if (settings[key] !== undefined) {
		return settings[key];
	}
	for (const [alias, target] of Object.entries(LEGACY_ALIASES)) {
		if (target === key && settings[alias] !== undefined) {
			return settings[alias];
		}
	}
	return undefined;
};

const readPricingMode = (raw: unknown): PricingMode => {
	if (raw === undefined) {
		return DEFAULT_INDICATOR_CONFIG.pricingMode;
	}
	if (isPricingMode(raw)) {
		return raw;
	}
	throw new ConfigError(`pricingMode must be one of ${PRICING_MODES.join(", ")}`, {
		key: "pricingMode",
		value: raw,
	});
};

/**
 * Merge caller settings over the defaults, validate, and freeze.
 * Accepts camelCase keys and the legacy snake_case names; camelCase wins.
 * @throws ConfigError when a value is out of range or of the wrong type
 */
export const resolveIndicatorConfig = (
	settings: Record<string, unknown> = {}
): IndicatorConfig => {
	const number = (
		key: Exclude<IndicatorConfigKey, "pricingMode">,
		rule: "window" | "finite" | "positive"
	): number => {
		const raw = readSetting(settings, key);
		if (raw === undefined) {
			return DEFAULT_INDICATOR_CONFIG[key];
		}
		if (typeof raw !== "number" || !Number.isFinite(raw)) {
			throw new ConfigError(`${key} must be a finite number`, { key, value: raw });
		}
		if (rule === "window" && (!Number.isInteger(raw) || raw <= 0)) {
			throw new ConfigError(`${key} must be a positive integer`, { key, value: raw });
		}
		if (rule === "positive" && raw <= 0) {
			throw new ConfigError(`${key} must be greater than zero`, { key, value: raw });
		}
		return raw;
	};

	return Object.freeze({
		emaFastLen: number("emaFastLen", "window"),
		emaSlowLen: number("emaSlowLen", "window"),
		rsiLen: number("rsiLen", "window"),
		stochLen: number("stochLen", "window"),
		bbLen: number("bbLen", "window"),
		bbMult: number("bbMult", "finite"),
		macdFast: number("macdFast", "window"),
		macdSlow: number("macdSlow", "window"),
		macdSignal: number("macdSignal", "window"),
		rsiThresholdLong: number("rsiThresholdLong", "finite"),
		rsiThresholdShort: number("rsiThresholdShort", "finite"),
		volAvgWindow: number("volAvgWindow", "window"),
		stochSmoothK: number("stochSmoothK", "window"),
		stochSmoothD: number("stochSmoothD", "window"),
		atrWindow: number("atrWindow", "window"),
		takeProfitAtrMultiplier: number("takeProfitAtrMultiplier", "finite"),
		stopLossAtrMultiplier: number("stopLossAtrMultiplier", "finite"),
		takeProfitPct: number("takeProfitPct", "positive"),
		stopLossPct: number("stopLossPct", "positive"),
		leverage: number("leverage", "positive"),
		pricingMode: readPricingMode(readSetting(settings, "pricingMode")),
	});
};

/**
 * Fill missing values from the defaults without validating. Used where a
 * partial configuration must never raise.
 */
export const withIndicatorDefaults = (
	config: Partial<IndicatorConfig> = {}
): IndicatorConfig => {
	const pick = <K extends IndicatorConfigKey>(key: K): IndicatorConfig[K] =>
		config[key] ?? DEFAULT_INDICATOR_CONFIG[key];

	return Object.freeze({
		emaFastLen: pick("emaFastLen"),
		emaSlowLen: pick("emaSlowLen"),
		rsiLen: pick("rsiLen"),
		stochLen: pick("stochLen"),
		bbLen: pick("bbLen"),
		bbMult: pick("bbMult"),
		macdFast: pick("macdFast"),
		macdSlow: pick("macdSlow"),
		macdSignal: pick("macdSignal"),
		rsiThresholdLong: pick("rsiThresholdLong"),
		rsiThresholdShort: pick("rsiThresholdShort"),
		volAvgWindow: pick("volAvgWindow"),
		stochSmoothK: pick("stochSmoothK"),
		stochSmoothD: pick("stochSmoothD"),
		atrWindow: pick("atrWindow"),
		takeProfitAtrMultiplier: pick("takeProfitAtrMultiplier"),
		stopLossAtrMultiplier: pick("stopLossAtrMultiplier"),
		takeProfitPct: pick("takeProfitPct"),
		stopLossPct: pick("stopLossPct"),
		leverage: pick("leverage"),
		pricingMode: pick("pricingMode"),
	});
};
