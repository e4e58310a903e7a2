import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError } from "./errors";
import { IndicatorConfig, resolveIndicatorConfig } from "./indicatorConfig";
import { DEFAULT_CYCLE_INTERVAL_MS, DEFAULT_SYMBOL_DELAY_MS } from "./time/constants";
import { parseTimeframe } from "./time/time";
import { createLogger } from "./utils/logger";

const configLogger = createLogger("config");

export interface ScannerConfig {
	exchangeId: string;
	symbols: string[];
	timeframe: string;
	limit: number;
	symbolDelayMs: number;
	cycleIntervalMs: number;
	/** Drop the latest bar while its period is still open. */
	dropOpenBar: boolean;
}

export interface SmtpSettings {
	host: string;
	port: number;
	user: string;
	pass: string;
	to: string;
}

export interface EnvConfig {
	smtp: SmtpSettings | null;
	mexcApiKey: string;
	mexcApiSecret: string;
	symbolsOverride?: string[];
	timeframeOverride?: string;
}

export interface BarsignalConfig {
	env: EnvConfig;
	scanner: ScannerConfig;
	indicators: IndicatorConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	indicatorProfile?: string;
	scannerProfile?: string;
}

export const DEFAULT_SCANNER_CONFIG: ScannerConfig = {
	exchangeId: "mexc",
	symbols: [],
	timeframe: "1h",
	limit: 300,
	symbolDelayMs: DEFAULT_SYMBOL_DELAY_MS,
	cycleIntervalMs: DEFAULT_CYCLE_INTERVAL_MS,
	dropOpenBar: false,
};

let cachedWorkspaceRoot: string | undefined;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
	Array.isArray(value) && value.every((entry) => typeof entry === "string");

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return isRecord(parsed) && Array.isArray(parsed.workspaces);
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseList = (value?: string): string[] | undefined => {
	if (!value) {
		return undefined;
	}
	const entries = value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return entries.length ? entries : undefined;
};

const parsePort = (value: string | undefined, fallback: number): number => {
	if (value === undefined) {
		return fallback;
	}
	const port = Number(value);
	if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
		throw new ConfigError(`Invalid SMTP port: ${value}`, { value });
	}
	return port;
};

const readJsonObject = (filePath: string): Record<string, unknown> => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ConfigError(
			`Unable to read config file ${filePath}: ${
				error instanceof Error ? error.message : "unknown error"
			}`,
			{ path: filePath }
		);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`Config file ${filePath} must contain a JSON object`, {
			path: filePath,
		});
	}
	return parsed;
};

/**
 * Loads `.env` (when present) and reads alert delivery and exchange settings.
 * SMTP settings are null unless user, password and recipient are all set.
 */
export const loadEnvConfig = (envPath?: string): EnvConfig => {
	const resolvedPath = envPath ?? path.join(findWorkspaceRoot(), ".env");
	if (fs.existsSync(resolvedPath)) {
		dotenv.config({ path: resolvedPath });
	}

	const user = readOptionalEnvVar("ALERT_SMTP_USER");
	const pass = readOptionalEnvVar("ALERT_SMTP_PASS");
	const to = readOptionalEnvVar("ALERT_EMAIL_TO");

	return {
		smtp:
			user && pass && to
				? {
						host: readOptionalEnvVar("ALERT_SMTP_HOST") ?? "smtp.gmail.com",
						port: parsePort(readOptionalEnvVar("ALERT_SMTP_PORT"), 587),
						user,
						pass,
						to,
					}
				: null,
		mexcApiKey: readOptionalEnvVar("MEXC_API_KEY") ?? "",
		mexcApiSecret: readOptionalEnvVar("MEXC_API_SECRET") ?? "",
		symbolsOverride: parseList(readOptionalEnvVar("SCANNER_SYMBOLS")),
		timeframeOverride: readOptionalEnvVar("SCANNER_TIMEFRAME"),
	};
};

/**
 * Reads `indicators/<profile>.json` from the config directory and resolves it
 * over the defaults. A missing file yields the defaults.
 */
export const loadIndicatorConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): IndicatorConfig => {
	const filePath = path.join(configDir, "indicators", `${profile}.json`);
	if (!fs.existsSync(filePath)) {
		configLogger.info("indicator_config_defaults", { path: filePath, profile });
		return resolveIndicatorConfig();
	}
	const config = resolveIndicatorConfig(readJsonObject(filePath));
	configLogger.info("indicator_config_loaded", { path: filePath, profile });
	return config;
};

const ensurePositiveInteger = (value: unknown, field: string, fallback: number): number => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${field} must be a positive integer`, { field, value });
	}
	return value;
};

const ensureNonNegativeNumber = (value: unknown, field: string, fallback: number): number => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
		throw new ConfigError(`${field} must be a non-negative number`, { field, value });
	}
	return value;
};

const ensureStringList = (value: unknown, field: string): string[] | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (!isStringArray(value)) {
		throw new ConfigError(`${field} must be an array of strings`, { field });
	}
	return value.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
};

const ensureTimeframe = (value: string, field: string): string => {
	try {
		parseTimeframe(value);
	} catch (error) {
		throw new ConfigError(
			`${field}: ${error instanceof Error ? error.message : "invalid timeframe"}`,
			{ field, value }
		);
	}
	return value.trim();
};

/**
 * Builds scanner settings from a plain object (a parsed profile file),
 * applying environment overrides last.
 */
export const resolveScannerConfig = (
	file: Record<string, unknown>,
	env: Pick<EnvConfig, "symbolsOverride" | "timeframeOverride"> = {}
): ScannerConfig => {
	const exchangeId = file.exchangeId ?? DEFAULT_SCANNER_CONFIG.exchangeId;
	if (typeof exchangeId !== "string" || !exchangeId.trim()) {
		throw new ConfigError("exchangeId must be a non-empty string");
	}
	const timeframe = file.timeframe ?? DEFAULT_SCANNER_CONFIG.timeframe;
	if (typeof timeframe !== "string") {
		throw new ConfigError("timeframe must be a string", { value: timeframe });
	}
	const dropOpenBar = file.dropOpenBar ?? DEFAULT_SCANNER_CONFIG.dropOpenBar;
	if (typeof dropOpenBar !== "boolean") {
		throw new ConfigError("dropOpenBar must be a boolean", { value: dropOpenBar });
	}

	return {
		exchangeId: exchangeId.trim(),
		symbols:
			env.symbolsOverride ??
			ensureStringList(file.symbols, "symbols") ??
			DEFAULT_SCANNER_CONFIG.symbols,
		timeframe: ensureTimeframe(env.timeframeOverride ?? timeframe, "timeframe"),
		limit: ensurePositiveInteger(file.limit, "limit", DEFAULT_SCANNER_CONFIG.limit),
		symbolDelayMs: ensureNonNegativeNumber(
			file.symbolDelayMs,
			"symbolDelayMs",
			DEFAULT_SCANNER_CONFIG.symbolDelayMs
		),
		cycleIntervalMs: ensurePositiveInteger(
			file.cycleIntervalMs,
			"cycleIntervalMs",
			DEFAULT_SCANNER_CONFIG.cycleIntervalMs
		),
		dropOpenBar,
	};
};

export const loadScannerConfig = (
	env: Pick<EnvConfig, "symbolsOverride" | "timeframeOverride">,
	configDir = getDefaultConfigDir(),
	profile = "default"
): ScannerConfig => {
	const filePath = path.join(configDir, "scanner", `${profile}.json`);
	const file = fs.existsSync(filePath) ? readJsonObject(filePath) : {};
	return resolveScannerConfig(file, env);
};

export const loadBarsignalConfig = (
	options: ConfigLoadOptions = {}
): BarsignalConfig => {
	const configDir = options.configDir ?? getDefaultConfigDir();
	const env = loadEnvConfig(options.envPath);
	return {
		env,
		scanner: loadScannerConfig(env, configDir, options.scannerProfile),
		indicators: loadIndicatorConfig(configDir, options.indicatorProfile),
	};
};
