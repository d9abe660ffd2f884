import * as fs from "node:fs";
import * as path from "node:path";
import { type BatchResult, describeVerdict, isStableBatch, type RunConfig, type RunReport } from "@socket-ramp/core";
import { v4 as uuid } from "uuid";
import type { SystemInfo } from "../diagnostics/system-info.js";
import type { BatchSummary, RampReport } from "./types.js";

/**
 * Count failed connections by error code.
 */
export function countFailures(batch: BatchResult): Record<string, number> {
	const failures: Record<string, number> = {};
	for (const result of batch.results) {
		if (!result.success) {
			failures[result.errorCode] = (failures[result.errorCode] ?? 0) + 1;
		}
	}
	return failures;
}

function summarizeBatch(batch: BatchResult, threshold: number): BatchSummary {
	return {
		batch: batch.batch,
		mode: batch.mode,
		connections: batch.connections,
		totalConnections: batch.totalConnections,
		successful: batch.successful,
		failed: batch.failed,
		successRate: batch.successRate,
		stable: isStableBatch(batch, threshold),
		latency: batch.latency,
		durationMs: batch.durationMs,
		failures: countFailures(batch),
	};
}

/**
 * Build the JSON report of a finished run.
 */
export function buildReport(report: RunReport, config: RunConfig, extras: { runId?: string; system?: SystemInfo } = {}): RampReport {
	return {
		runId: extras.runId ?? uuid(),
		timestamp: report.finishedAt,
		target: report.url,
		config: {
			mode: config.mode,
			startConnections: config.startConnections,
			maxConnections: config.maxConnections,
			increment: config.increment,
			holdDurationSec: config.holdDurationSec,
			connectionDelaySec: config.connectionDelaySec,
			stabilityThreshold: config.stabilityThreshold,
		},
		results: {
			batches: report.batches.map((batch) => summarizeBatch(batch, report.stabilityThreshold)),
			lastStableConnections: report.lastStable?.totalConnections ?? null,
			stopReason: report.stopReason,
			durationMs: report.durationMs,
			releasedConnections: report.releasedConnections,
			verdict: {
				kind: report.verdict.kind,
				description: describeVerdict(report.verdict),
			},
		},
		system: extras.system,
	};
}

/**
 * Write the report to a JSON file.
 */
export function writeReport(outputPath: string, report: RampReport): void {
	const dir = path.dirname(outputPath);
	if (dir && !fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}
	fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
	console.log(`[socket-ramp] Results written to ${outputPath}`);
}
