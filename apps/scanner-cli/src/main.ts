import {
	ConfigError,
	EnvConfig,
	createLogger,
	getDefaultConfigDir,
	loadEnvConfig,
	loadIndicatorConfig,
	loadScannerConfig,
} from "@barsignal/core";
import { AlertSender, EmailAlertSender, LogAlertSender } from "@barsignal/alerts";
import { MexcClient } from "@barsignal/exchange-mexc";
import { runScanCycle, startScanner } from "@barsignal/runtime";
import { USAGE, parseScannerArgs } from "./cliArgs";

const logger = createLogger("scanner-cli");

export const selectAlertSender = (env: EnvConfig, dryRun: boolean): AlertSender => {
	if (dryRun) {
		return new LogAlertSender();
	}
	if (!env.smtp) {
		logger.warn("smtp_not_configured", {
			message:
				"ALERT_SMTP_USER, ALERT_SMTP_PASS and ALERT_EMAIL_TO are required for email alerts; logging alerts instead",
		});
		return new LogAlertSender();
	}
	return new EmailAlertSender(env.smtp);
};

export const runScannerCli = async (argv: string[]): Promise<void> => {
	const cli = parseScannerArgs(argv);
	if (cli.help) {
		console.log(USAGE);
		return;
	}

	const configDir = cli.configDir ?? getDefaultConfigDir();
	const env = loadEnvConfig(cli.envPath);
	const scannerFile = loadScannerConfig(
		{
			symbolsOverride: cli.symbols ?? env.symbolsOverride,
			timeframeOverride: cli.timeframe ?? env.timeframeOverride,
		},
		configDir,
		cli.profile
	);
	const scanner = { ...scannerFile, limit: cli.limit ?? scannerFile.limit };
	const indicators = loadIndicatorConfig(configDir, cli.profile);

	if (!scanner.symbols.length) {
		throw new ConfigError("No symbols configured; set symbols in the scanner profile or pass --symbols");
	}
	if (scanner.exchangeId !== "mexc") {
		throw new ConfigError(`Unsupported exchange: ${scanner.exchangeId}`, {
			exchangeId: scanner.exchangeId,
		});
	}

	const client = new MexcClient({ apiKey: env.mexcApiKey, secret: env.mexcApiSecret });
	const sender = selectAlertSender(env, cli.dryRun);

	logger.info("cli_starting", {
		mode: cli.once ? "once" : "loop",
		symbols: scanner.symbols,
		timeframe: scanner.timeframe,
		limit: scanner.limit,
		profile: cli.profile ?? "default",
		channel: sender.channel,
		pricingMode: indicators.pricingMode,
	});

	if (cli.once) {
		await runScanCycle({ client, sender, scanner, indicators });
		return;
	}

	const handle = startScanner({
		client,
		sender,
		scanner,
		indicators,
		cycleIntervalMs: scanner.cycleIntervalMs,
	});

	await new Promise<void>((resolve, reject) => {
		const shutdown = (signal: NodeJS.Signals): void => {
			logger.info("cli_shutdown", { signal });
			handle.stop();
			handle.whenIdle().then(() => resolve(), reject);
		};
		process.once("SIGINT", shutdown);
		process.once("SIGTERM", shutdown);
	});
};
