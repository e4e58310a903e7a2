export * from "./atr";
export * from "./bollinger";
export * from "./ema";
export * from "./macd";
export * from "./pipeline";
export * from "./priceAction";
export * from "./rsi";
export * from "./stochRsi";
export {
	mean,
	rollingMaxSeries,
	rollingMinSeries,
	rollingStdSeries,
	sampleStd,
	smaSeries,
	trailingWindow,
} from "./rolling";
export type { NumericSeries } from "./rolling";
export type { IndicatorRow } from "./types";
