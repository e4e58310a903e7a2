export { runScanCycle } from "./scanCycle";
export { startScanner } from "./startScanner";
export { runtimeLogger } from "./runtimeShared";
export type {
	BarsEvaluator,
	ScanCycleOptions,
	ScannerHandle,
	StartScannerOptions,
	SymbolScanResult,
	SymbolScanStatus,
} from "./types";
