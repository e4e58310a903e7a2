import { ModuleLogger, createLogger } from "@barsignal/core";
import type { AlertSender, SignalAlert } from "./types";

/** Writes alerts to the log instead of delivering them. */
export class LogAlertSender implements AlertSender {
	readonly channel = "log";

	constructor(private readonly logger: ModuleLogger = createLogger("alerts:log")) {}

	async send(alert: SignalAlert): Promise<void> {
		this.logger.info("alert_logged", {
			symbol: alert.symbol,
			timeframe: alert.timeframe,
			side: alert.side,
			subject: alert.subject,
			text: alert.text,
		});
	}
}
