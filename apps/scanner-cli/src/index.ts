import { createLogger } from "@barsignal/core";
import { runScannerCli } from "./main";

const logger = createLogger("scanner-cli");

runScannerCli(process.argv.slice(2)).catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
