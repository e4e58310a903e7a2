type ArgValue = string | boolean;

export interface ScannerCliOptions {
	once: boolean;
	dryRun: boolean;
	help: boolean;
	symbols?: string[];
	timeframe?: string;
	limit?: number;
	profile?: string;
	configDir?: string;
	envPath?: string;
}

export const USAGE = `Usage:
  npm run scan -- [options]

Options:
  --once                 Run a single scan cycle and exit
  --symbols <A,B>        Comma-separated symbols, e.g. SUI/USDT,FLOCK/USDT
  --timeframe <tf>       Bar timeframe (default 1h)
  --limit <n>            Number of bars to fetch per symbol (default 300)
  --profile <name>       Indicator and scanner profile (default "default")
  --configDir <path>     Config directory (default <workspace>/config)
  --envPath <path>       Custom .env path
  --dry-run              Log alerts instead of emailing them
  --help                 Show this message`;

// Flags that never take a value, so a following token stays positional.
const BOOLEAN_FLAGS = new Set(["once", "dry-run", "help"]);

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
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
		if (!BOOLEAN_FLAGS.has(key) && next && !next.startsWith("--")) {
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
	return typeof value === "string" && value.length ? value : undefined;
};

const getListArg = (
	args: Record<string, ArgValue>,
	key: string
): string[] | undefined => {
	const raw = getStringArg(args, key);
	if (!raw) {
		return undefined;
	}
	const entries = raw
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return entries.length ? entries : undefined;
};

const getPositiveIntArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = getStringArg(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`--${key} must be a positive integer, got "${raw}"`);
	}
	return value;
};

export const parseScannerArgs = (argv: string[]): ScannerCliOptions => {
	const args = parseCliArgs(argv);
	return {
		once: args.once === true,
		dryRun: args["dry-run"] === true,
		help: args.help === true,
		symbols: getListArg(args, "symbols"),
		timeframe: getStringArg(args, "timeframe"),
		limit: getPositiveIntArg(args, "limit"),
		profile: getStringArg(args, "profile"),
		configDir: getStringArg(args, "configDir"),
		envPath: getStringArg(args, "envPath"),
	};
};
