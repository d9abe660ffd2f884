import { createRunConfig, type RunConfig, type RunConfigInput } from "../config/run-config.js";
import type { BatchResult } from "../domain/results.js";
import { EMPTY_LATENCY_STATS } from "../utils/stats.js";

/**
 * A run config with millisecond-scale timing, for tests.
 */
export function createTestConfig(input: RunConfigInput = {}): RunConfig {
	return createRunConfig({
		holdDurationSec: 0.05,
		...input,
		timing: {
			connectTimeoutMs: 200,
			handshakeTimeoutMs: 50,
			keepaliveTimeoutMs: 50,
			checkIntervalMs: 20,
			closeTimeoutMs: 50,
			batchPauseMs: 0,
			...input.timing,
		},
	});
}

/**
 * A BatchResult with the given counts and no per-connection results.
 */
export function makeBatchResult(params: {
	batch: number;
	connections: number;
	successful: number;
	totalConnections?: number;
	mode?: BatchResult["mode"];
}): BatchResult {
	const { batch, connections, successful } = params;
	return {
		batch,
		mode: params.mode ?? "independent",
		connections,
		totalConnections: params.totalConnections ?? connections,
		successful,
		failed: connections - successful,
		successRate: connections > 0 ? (successful / connections) * 100 : 0,
		latency: EMPTY_LATENCY_STATS,
		durationMs: 0,
		results: [],
	};
}
