import type { LatencyStats } from "../utils/stats.js";
import type { ErrorCode } from "./errors.js";

/**
 * Lifecycle states of a single connection.
 * The last three are terminal.
 */
export type ConnectionState = "connecting" | "handshaking" | "holding" | "completed" | "failed" | "timed_out";

export type TerminalState = Extract<ConnectionState, "completed" | "failed" | "timed_out">;

/**
 * Admission discipline of a run:
 * - independent: every batch opens its own connections and closes them at the end of the batch
 * - cumulative: connections of earlier batches stay open while each batch adds new ones
 */
export type AdmissionMode = "independent" | "cumulative";

interface ConnectionResultBase {
	/** Connection id (1-based; globally unique across batches in cumulative mode) */
	id: number;
	/** Batch that launched the connection */
	batch: number;
	/** Total time from launch to result, in ms */
	durationMs: number;
	/** Time to establish the connection in ms, null if it never connected */
	connectTimeMs: number | null;
	/** Round-trip latencies in ms, handshake first, then keepalives */
	responseTimes: readonly number[];
	avgResponse: number;
	minResponse: number;
	maxResponse: number;
}

export interface SuccessfulConnectionResult extends ConnectionResultBase {
	success: true;
	state: "completed" | "holding";
}

export interface FailedConnectionResult extends ConnectionResultBase {
	success: false;
	state: "failed" | "timed_out";
	errorCode: ErrorCode;
	error: string;
}

/**
 * Outcome of one connection.
 * `state` is "holding" only for cumulative-mode checkpoints of connections that are still open.
 */
export type ConnectionResult = SuccessfulConnectionResult | FailedConnectionResult;

/**
 * Outcome of one batch.
 */
export interface BatchResult {
	batch: number;
	mode: AdmissionMode;
	/** Connections attempted by this batch (new connections in cumulative mode) */
	connections: number;
	/** Connections the remote is expected to hold open (equal to `connections` in independent mode) */
	totalConnections: number;
	successful: number;
	failed: number;
	/** successful / connections * 100 */
	successRate: number;
	/** Latency over the samples of successful connections */
	latency: LatencyStats;
	durationMs: number;
	results: readonly ConnectionResult[];
}
