export * from "./types";
export { fetchBarSeries, normalizeCandles } from "./historical";
export { mapCcxtCandleToCandle } from "./utils/ccxtMapper";
