import type { AdmissionMode, LatencyStats, StabilityVerdict, StopReason } from "@socket-ramp/core";
import type { SystemInfo } from "../diagnostics/system-info.js";

/**
 * One batch as written to the JSON report. Per-connection samples are
 * reduced to counts of failure reasons.
 */
export interface BatchSummary {
	batch: number;
	mode: AdmissionMode;
	/** Connections attempted by this batch */
	connections: number;
	/** Connections open at once while this batch ran */
	totalConnections: number;
	successful: number;
	failed: number;
	successRate: number;
	stable: boolean;
	latency: LatencyStats;
	durationMs: number;
	/** Failed connections by error code */
	failures: Record<string, number>;
}

/**
 * Complete run results structure for JSON output.
 */
export interface RampReport {
	runId: string;
	timestamp: string;
	target: string;
	config: {
		mode: AdmissionMode;
		startConnections: number;
		maxConnections: number;
		increment: number;
		holdDurationSec: number;
		connectionDelaySec: number;
		stabilityThreshold: number;
	};
	results: {
		batches: BatchSummary[];
		lastStableConnections: number | null;
		stopReason: StopReason;
		durationMs: number;
		releasedConnections: number;
		verdict: {
			kind: StabilityVerdict["kind"];
			description: string;
		};
	};
	/** Only present when system info was requested */
	system?: SystemInfo;
}
