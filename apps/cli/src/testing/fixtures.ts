import {
	analyzeStability,
	type BatchResult,
	type ConnectionResult,
	createRunConfig,
	ErrorCode,
	type RunConfig,
	type RunReport,
} from "@socket-ramp/core";

export function succeeded(id: number, batch: number, responseTimes: number[]): ConnectionResult {
	return {
		id,
		batch,
		durationMs: 1000,
		connectTimeMs: 5,
		responseTimes,
		avgResponse: 0,
		minResponse: 0,
		maxResponse: 0,
		success: true,
		state: "completed",
	};
}

export function failed(id: number, batch: number, errorCode: ErrorCode, error: string): ConnectionResult {
	return {
		id,
		batch,
		durationMs: 10,
		connectTimeMs: null,
		responseTimes: [],
		avgResponse: 0,
		minResponse: 0,
		maxResponse: 0,
		success: false,
		state: errorCode === ErrorCode.PROTOCOL_ERROR || errorCode === ErrorCode.CONNECT_FAILED ? "failed" : "timed_out",
		errorCode,
		error,
	};
}

/**
 * A batch with fixed latency figures: min 1, avg 1.5, max 2.
 */
export function batchOf(params: {
	batch: number;
	results: ConnectionResult[];
	mode?: BatchResult["mode"];
	totalConnections?: number;
	durationMs?: number;
}): BatchResult {
	const successful = params.results.filter((r) => r.success).length;
	const connections = params.results.length;
	return {
		batch: params.batch,
		mode: params.mode ?? "independent",
		connections,
		totalConnections: params.totalConnections ?? connections,
		successful,
		failed: connections - successful,
		successRate: connections > 0 ? (successful / connections) * 100 : 0,
		latency: { min: 1, max: 2, avg: 1.5, p50: 1.5, p95: 2, p99: 2 },
		durationMs: params.durationMs ?? 1234,
		results: params.results,
	};
}

export const TEST_CONFIG: RunConfig = createRunConfig({ startConnections: 3, maxConnections: 6, increment: 1, holdDurationSec: 1 });

/**
 * A run that found a ceiling at 3: batch 1 with 3 of 3, batch 2 with 3 of 4.
 */
export function ceilingReport(): RunReport {
	const batches = [
		batchOf({ batch: 1, results: [succeeded(1, 1, [1, 2]), succeeded(2, 1, [1, 2]), succeeded(3, 1, [1, 2])] }),
		batchOf({
			batch: 2,
			results: [succeeded(1, 2, [1, 2]), succeeded(2, 2, [1, 2]), succeeded(3, 2, [1, 2]), failed(4, 2, ErrorCode.PROTOCOL_ERROR, "Connection closed (code 1013: Server at capacity)")],
		}),
	];
	return {
		url: TEST_CONFIG.url,
		mode: "independent",
		stabilityThreshold: 90,
		increment: 1,
		batches,
		lastStable: batches[0] ?? null,
		stopReason: "regression",
		startedAt: "2026-01-01T00:00:00.000Z",
		finishedAt: "2026-01-01T00:00:05.000Z",
		durationMs: 5000,
		verdict: analyzeStability(batches, { threshold: 90, increment: 1 }),
		releasedConnections: 0,
	};
}
