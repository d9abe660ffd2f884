import type { AdmissionMode, BatchResult, ConnectionResult } from "../domain/results.js";
import { calculateLatencyStats, percentage } from "../utils/stats.js";
import { roundMs } from "../utils/timing.js";

export interface AggregateBatchParams {
	batch: number;
	mode: AdmissionMode;
	totalConnections: number;
	results: readonly ConnectionResult[];
	durationMs: number;
}

/**
 * Fold the results of every worker in a batch into one BatchResult.
 * Latency statistics cover the samples of successful connections only.
 */
export function aggregateBatch(params: AggregateBatchParams): BatchResult {
	const { batch, mode, totalConnections, results, durationMs } = params;
	const successful = results.filter((r) => r.success);
	const failed = results.length - successful.length;

	return Object.freeze({
		batch,
		mode,
		connections: results.length,
		totalConnections,
		successful: successful.length,
		failed,
		successRate: percentage(successful.length, results.length),
		latency: calculateLatencyStats(successful.flatMap((r) => r.responseTimes)),
		durationMs: roundMs(durationMs),
		results: Object.freeze([...results]),
	});
}
