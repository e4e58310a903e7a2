/**
 * Converts the latest indicator row into a long/short verdict with
 * take-profit and stop-loss targets.
 */
export * from "./evaluateBars";
export * from "./signalEvaluator";
export * from "./targets";
export type * from "./types";
