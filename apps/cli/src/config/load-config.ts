import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, createRunConfig, ErrorCode, type RunConfig, type TargetProtocol } from "@socket-ramp/core";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Config file used when no --config is given. */
export const DEFAULT_CONFIG_PATH = path.join(__dirname, "../../config/ramp.json");

/**
 * Options as commander hands them over: flags left out are undefined.
 */
export interface RunCliOptions {
	config?: string;
	host?: string;
	port?: string;
	protocol?: string;
	path?: string;
	start?: string;
	max?: string;
	increment?: string;
	duration?: string;
	delay?: string;
	threshold?: string;
	cumulative?: boolean;
	verbose?: boolean;
	insecure?: boolean;
	systemInfo?: boolean;
	networkStats?: boolean;
	output?: string;
}

/**
 * Contents of a config file. Every field is optional.
 */
export interface RampFileConfig {
	server: {
		host?: string;
		port?: number;
		protocol?: TargetProtocol;
		path?: string;
		insecure?: boolean;
	};
	test: {
		startConnections?: number;
		maxConnections?: number;
		increment?: number;
		/** Seconds each batch is held */
		batchDuration?: number;
		/** Seconds between launching connections */
		connectionDelay?: number;
		stabilityThreshold?: number;
		cumulativeMode?: boolean;
		verboseMode?: boolean;
	};
	display: {
		showNetworkStats?: boolean;
		showSystemInfo?: boolean;
	};
}

export interface DisplaySettings {
	showSystemInfo: boolean;
	showNetworkStats: boolean;
}

export interface Settings {
	run: RunConfig;
	display: DisplaySettings;
	/** Config file the settings were read from, if any */
	configPath: string | null;
	warnings: string[];
}

type Section = Record<string, unknown>;

function invalid(message: string): ConfigError {
	return new ConfigError(ErrorCode.CONFIG_INVALID, message);
}

function isRecord(value: unknown): value is Section {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(root: Section, name: string): Section {
	const section = root[name];
	if (section === undefined) return {};
	if (!isRecord(section)) throw invalid(`"${name}" must be an object`);
	return section;
}

function readNumber(section: Section, where: string, key: string): number | undefined {
	const value = section[key];
	if (value === undefined) return undefined;
	if (typeof value !== "number") throw invalid(`${where}.${key} must be a number`);
	return value;
}

function readString(section: Section, where: string, key: string): string | undefined {
	const value = section[key];
	if (value === undefined) return undefined;
	if (typeof value !== "string") throw invalid(`${where}.${key} must be a string`);
	return value;
}

function readBoolean(section: Section, where: string, key: string): boolean | undefined {
	const value = section[key];
	if (value === undefined) return undefined;
	if (typeof value !== "boolean") throw invalid(`${where}.${key} must be true or false`);
	return value;
}

function parseProtocol(value: string | undefined, source: string): TargetProtocol | undefined {
	if (value === undefined) return undefined;
	if (value !== "ws" && value !== "wss") throw invalid(`${source} must be "ws" or "wss", got "${value}"`);
	return value;
}

function parseNumber(value: string | undefined, source: string): number | undefined {
	if (value === undefined) return undefined;
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isFinite(parsed)) {
		throw invalid(`${source} must be a number, got "${value}"`);
	}
	return parsed;
}

/**
 * Parse and validate the text of a config file.
 */
export function parseConfigFile(content: string, source: string): RampFileConfig {
	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw invalid(`Cannot parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
	}
	if (!isRecord(parsed)) throw invalid(`${source} must contain a JSON object`);

	const server = readSection(parsed, "server");
	const test = readSection(parsed, "test");
	const display = readSection(parsed, "display");

	return {
		server: {
			host: readString(server, "server", "host"),
			port: readNumber(server, "server", "port"),
			protocol: parseProtocol(readString(server, "server", "protocol"), "server.protocol"),
			path: readString(server, "server", "path"),
			insecure: readBoolean(server, "server", "insecure"),
		},
		test: {
			startConnections: readNumber(test, "test", "startConnections"),
			maxConnections: readNumber(test, "test", "maxConnections"),
			increment: readNumber(test, "test", "increment"),
			batchDuration: readNumber(test, "test", "batchDuration"),
			connectionDelay: readNumber(test, "test", "connectionDelay"),
			stabilityThreshold: readNumber(test, "test", "stabilityThreshold"),
			cumulativeMode: readBoolean(test, "test", "cumulativeMode"),
			verboseMode: readBoolean(test, "test", "verboseMode"),
		},
		display: {
			showNetworkStats: readBoolean(display, "display", "showNetworkStats"),
			showSystemInfo: readBoolean(display, "display", "showSystemInfo"),
		},
	};
}

/**
 * Read a config file.
 * A missing default file is not an error; a missing explicit one is.
 */
export function readConfigFile(filePath: string, explicit: boolean): { config: RampFileConfig | null; warning?: string } {
	if (!fs.existsSync(filePath)) {
		if (explicit) throw invalid(`Config file not found: ${filePath}`);
		return { config: null, warning: `Could not load ${filePath}, using default configuration` };
	}
	return { config: parseConfigFile(fs.readFileSync(filePath, "utf-8"), filePath) };
}

/**
 * Target overrides from RAMP_HOST, RAMP_PORT, RAMP_PROTOCOL and RAMP_PATH.
 */
export function readEnvTarget(env: NodeJS.ProcessEnv): RampFileConfig["server"] {
	return {
		host: env.RAMP_HOST || undefined,
		port: parseNumber(env.RAMP_PORT || undefined, "RAMP_PORT"),
		protocol: parseProtocol(env.RAMP_PROTOCOL || undefined, "RAMP_PROTOCOL"),
		path: env.RAMP_PATH || undefined,
	};
}

/**
 * Resolve the settings of a run.
 * Precedence: defaults < config file < environment < command-line flags.
 */
export function loadSettings(cli: RunCliOptions, env: NodeJS.ProcessEnv = process.env, defaultConfigPath = DEFAULT_CONFIG_PATH): Settings {
	const configPath = cli.config ? path.resolve(cli.config) : defaultConfigPath;
	const { config: file, warning } = readConfigFile(configPath, cli.config !== undefined);
	const fromEnv = readEnvTarget(env);

	const run = createRunConfig({
		target: {
			host: cli.host ?? fromEnv.host ?? file?.server.host,
			port: parseNumber(cli.port, "--port") ?? fromEnv.port ?? file?.server.port,
			protocol: parseProtocol(cli.protocol, "--protocol") ?? fromEnv.protocol ?? file?.server.protocol,
			path: cli.path ?? fromEnv.path ?? file?.server.path,
			insecure: cli.insecure ?? file?.server.insecure,
		},
		startConnections: parseNumber(cli.start, "--start") ?? file?.test.startConnections,
		maxConnections: parseNumber(cli.max, "--max") ?? file?.test.maxConnections,
		increment: parseNumber(cli.increment, "--increment") ?? file?.test.increment,
		holdDurationSec: parseNumber(cli.duration, "--duration") ?? file?.test.batchDuration,
		connectionDelaySec: parseNumber(cli.delay, "--delay") ?? file?.test.connectionDelay,
		stabilityThreshold: parseNumber(cli.threshold, "--threshold") ?? file?.test.stabilityThreshold,
		cumulative: cli.cumulative ?? file?.test.cumulativeMode,
		verbose: cli.verbose ?? file?.test.verboseMode,
	});

	return {
		run,
		display: {
			showSystemInfo: cli.systemInfo ?? file?.display.showSystemInfo ?? false,
			showNetworkStats: cli.networkStats ?? file?.display.showNetworkStats ?? false,
		},
		configPath: file ? configPath : null,
		warnings: warning ? [warning] : [],
	};
}
