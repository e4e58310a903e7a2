import process from "node:process";
import { loadEnvConfig, loadIndicatorConfig, loadScannerConfig, getDefaultConfigDir } from "@barsignal/core";

const USAGE = `Usage:
  npm run config:print -- [--profile <name>] [--configDir <path>] [--envPath <path>]
                          [--symbols <A,B>] [--timeframe <tf>]

Prints the resolved scanner and indicator settings. Secrets are masked.`;

type ArgValue = string | boolean;

const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token || token === "--" || !token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.trim() ? value.trim() : undefined;
};

const mask = (value: string): string => (value ? "***" : "");

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	if (args.help === true) {
		console.log(USAGE);
		return;
	}
	const cli = {
		profile: getStringArg(args, "profile"),
		configDir: getStringArg(args, "configDir"),
		envPath: getStringArg(args, "envPath"),
		symbols: getStringArg(args, "symbols")
			?.split(",")
			.map((symbol) => symbol.trim())
			.filter(Boolean),
		timeframe: getStringArg(args, "timeframe"),
	};

	const configDir = cli.configDir ?? getDefaultConfigDir();
	const env = loadEnvConfig(cli.envPath);
	const scanner = loadScannerConfig(
		{
			symbolsOverride: cli.symbols ?? env.symbolsOverride,
			timeframeOverride: cli.timeframe ?? env.timeframeOverride,
		},
		configDir,
		cli.profile
	);

	const summary = {
		configDir,
		profile: cli.profile ?? "default",
		scanner,
		indicators: loadIndicatorConfig(configDir, cli.profile),
		alerts: env.smtp
			? { channel: "email", ...env.smtp, pass: mask(env.smtp.pass) }
			: { channel: "log" },
		exchange: {
			apiKey: mask(env.mexcApiKey),
			secret: mask(env.mexcApiSecret),
		},
	};

	console.log(JSON.stringify(summary, null, 2));
};

main().catch((error) => {
	console.error("config:print failed:", error instanceof Error ? error.message : error);
	process.exitCode = 1;
});
