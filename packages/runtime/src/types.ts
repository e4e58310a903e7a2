import type {
	Bar,
	IndicatorConfig,
	MarketDataClient,
	ScannerConfig,
} from "@barsignal/core";
import type { AlertSender, SignalAlert } from "@barsignal/alerts";
import type { BarsEvaluation, SignalVerdict } from "@barsignal/strategy-engine";

export type SymbolScanStatus = "signal" | "no_signal" | "skipped" | "error";

export interface SymbolScanResult {
	symbol: string;
	status: SymbolScanStatus;
	/** Verdict reason, or why the symbol was skipped. */
	reason: string;
	bars: number;
	barTimestamp: number | null;
	verdict: SignalVerdict | null;
	alert: SignalAlert | null;
	error?: string;
}

export type BarsEvaluator = (bars: readonly Bar[], config: IndicatorConfig) => BarsEvaluation;

export interface ScanCycleOptions {
	client: MarketDataClient;
	sender: AlertSender;
	scanner: Pick<
		ScannerConfig,
		"symbols" | "timeframe" | "limit" | "symbolDelayMs" | "dropOpenBar"
	>;
	indicators: IndicatorConfig;
	/** Sequence number used in logs. */
	cycle?: number;
	evaluate?: BarsEvaluator;
	sleep?: (ms: number) => Promise<void>;
	now?: () => number;
}

export interface StartScannerOptions extends ScanCycleOptions {
	cycleIntervalMs: number;
	onCycle?: (results: SymbolScanResult[], cycle: number) => void;
}

export interface ScannerHandle {
	readonly running: boolean;
	/** Cancels the next cycle; a cycle in flight runs to completion. */
	stop(): void;
	/** Resolves once the cycle in flight, if any, has finished. */
	whenIdle(): Promise<void>;
}
