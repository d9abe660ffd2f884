import { ConfigError, ErrorCode } from "../domain/errors.js";
import type { AdmissionMode } from "../domain/results.js";

export type TargetProtocol = "ws" | "wss";

/**
 * Remote endpoint under test.
 */
export interface TargetConfig {
	protocol: TargetProtocol;
	host: string;
	port: number;
	path: string;
	/** Accept self-signed TLS certificates (wss only) */
	insecure: boolean;
}

/**
 * Bounds on every wait a run performs, in milliseconds.
 */
export type TimingConfig = {
	/** Establishing a connection */
	connectTimeoutMs: number;
	/** Echo of the identification payload */
	handshakeTimeoutMs: number;
	/** Echo of each keepalive probe */
	keepaliveTimeoutMs: number;
	/** Pause between keepalive probes while holding */
	checkIntervalMs: number;
	/** Closing a connection */
	closeTimeoutMs: number;
	/** Pause between batches */
	batchPauseMs: number;
};

/**
 * Validated configuration for a run, passed explicitly into every component.
 */
export interface RunConfig {
	target: TargetConfig;
	/** WebSocket URL built from `target` */
	url: string;
	startConnections: number;
	maxConnections: number;
	increment: number;
	/** How long each batch is held open once all its connections are launched */
	holdDurationSec: number;
	/** Delay between launching individual connections within a batch */
	connectionDelaySec: number;
	/** Minimum success rate (%) for a batch to count as stable */
	stabilityThreshold: number;
	mode: AdmissionMode;
	verbose: boolean;
	timing: TimingConfig;
}

/**
 * Unvalidated input for `createRunConfig`. Anything left out takes its default.
 */
export interface RunConfigInput {
	target?: Partial<TargetConfig>;
	startConnections?: number;
	maxConnections?: number;
	increment?: number;
	holdDurationSec?: number;
	connectionDelaySec?: number;
	stabilityThreshold?: number;
	cumulative?: boolean;
	verbose?: boolean;
	timing?: Partial<TimingConfig>;
}

export const DEFAULT_TARGET: TargetConfig = {
	protocol: "ws",
	host: "localhost",
	port: 7070,
	path: "/",
	insecure: false,
};

export const DEFAULT_TIMING: TimingConfig = {
	connectTimeoutMs: 10000,
	handshakeTimeoutMs: 3000,
	keepaliveTimeoutMs: 2000,
	checkIntervalMs: 1000,
	closeTimeoutMs: 2000,
	batchPauseMs: 1000,
};

export const DEFAULT_STABILITY_THRESHOLD = 90.0;

function invalid(message: string): ConfigError {
	return new ConfigError(ErrorCode.CONFIG_INVALID, message);
}

function requireInteger(name: string, value: number, min: number): number {
	if (!Number.isInteger(value) || value < min) {
		throw invalid(`${name} must be an integer >= ${min}, got ${value}`);
	}
	return value;
}

function requireNumber(name: string, value: number, min: number, max = Number.POSITIVE_INFINITY): number {
	if (!Number.isFinite(value) || value < min || value > max) {
		const range = Number.isFinite(max) ? `between ${min} and ${max}` : `>= ${min}`;
		throw invalid(`${name} must be a number ${range}, got ${value}`);
	}
	return value;
}

/**
 * Build the WebSocket URL for a target.
 * Throws a ConfigError if the parts do not form a valid URL.
 */
export function buildTargetUrl(target: TargetConfig): string {
	if (target.protocol !== "ws" && target.protocol !== "wss") {
		throw invalid(`protocol must be "ws" or "wss", got "${String(target.protocol)}"`);
	}
	if (target.host.trim() === "") {
		throw invalid("host must not be empty");
	}
	requireInteger("port", target.port, 1);
	if (target.port > 65535) {
		throw invalid(`port must be <= 65535, got ${target.port}`);
	}
	if (!target.path.startsWith("/")) {
		throw invalid(`path must start with "/", got "${target.path}"`);
	}

	const host = target.host.includes(":") && !target.host.startsWith("[") ? `[${target.host}]` : target.host;
	try {
		return new URL(`${target.protocol}://${host}:${target.port}${target.path}`).href;
	} catch {
		throw invalid(`Cannot build a URL from host "${target.host}" and path "${target.path}"`);
	}
}

/**
 * Validate input and fill in defaults.
 * This is the only place a run can fail fatally: it throws a ConfigError before any batch starts.
 */
export function createRunConfig(input: RunConfigInput = {}): RunConfig {
	const target: TargetConfig = {
		protocol: input.target?.protocol ?? DEFAULT_TARGET.protocol,
		host: input.target?.host ?? DEFAULT_TARGET.host,
		port: input.target?.port ?? DEFAULT_TARGET.port,
		path: input.target?.path ?? DEFAULT_TARGET.path,
		insecure: input.target?.insecure ?? DEFAULT_TARGET.insecure,
	};
	const timing: TimingConfig = {
		connectTimeoutMs: input.timing?.connectTimeoutMs ?? DEFAULT_TIMING.connectTimeoutMs,
		handshakeTimeoutMs: input.timing?.handshakeTimeoutMs ?? DEFAULT_TIMING.handshakeTimeoutMs,
		keepaliveTimeoutMs: input.timing?.keepaliveTimeoutMs ?? DEFAULT_TIMING.keepaliveTimeoutMs,
		checkIntervalMs: input.timing?.checkIntervalMs ?? DEFAULT_TIMING.checkIntervalMs,
		closeTimeoutMs: input.timing?.closeTimeoutMs ?? DEFAULT_TIMING.closeTimeoutMs,
		batchPauseMs: input.timing?.batchPauseMs ?? DEFAULT_TIMING.batchPauseMs,
	};

	const startConnections = requireInteger("startConnections", input.startConnections ?? 1, 1);
	const maxConnections = requireInteger("maxConnections", input.maxConnections ?? 10, 1);
	if (maxConnections < startConnections) {
		throw invalid(`maxConnections (${maxConnections}) must be >= startConnections (${startConnections})`);
	}

	for (const [name, value] of Object.entries(timing)) {
		requireNumber(`timing.${name}`, value, 0);
	}
	if (timing.checkIntervalMs <= 0) {
		throw invalid("timing.checkIntervalMs must be greater than 0");
	}

	return {
		target,
		url: buildTargetUrl(target),
		startConnections,
		maxConnections,
		increment: requireInteger("increment", input.increment ?? 1, 1),
		holdDurationSec: requireNumber("holdDurationSec", input.holdDurationSec ?? 5, 0),
		connectionDelaySec: requireNumber("connectionDelaySec", input.connectionDelaySec ?? 0, 0),
		stabilityThreshold: requireNumber("stabilityThreshold", input.stabilityThreshold ?? DEFAULT_STABILITY_THRESHOLD, 0, 100),
		mode: input.cumulative ? "cumulative" : "independent",
		verbose: input.verbose ?? false,
		timing,
	};
}
