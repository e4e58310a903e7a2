import type { SignalSide } from "@barsignal/core";
import type { TargetPair } from "@barsignal/strategy-engine";

/** A fired verdict rendered for delivery. */
export interface SignalAlert {
	symbol: string;
	timeframe: string;
	/** Open time of the bar that fired. */
	barTimestamp: number;
	side: SignalSide;
	targets: TargetPair;
	subject: string;
	text: string;
}

export interface AlertSender {
	readonly channel: string;
	send(alert: SignalAlert): Promise<void>;
}
