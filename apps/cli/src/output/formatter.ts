import {
	type BatchResult,
	calculatePacingRate,
	describeVerdict,
	isStableBatch,
	type LatencyStats,
	type RunConfig,
	type RunReport,
	type StabilityVerdict,
} from "@socket-ramp/core";
import chalk from "chalk";
import { formatBytes, type NetworkCounters, type SystemInfo } from "../diagnostics/system-info.js";
import { countFailures } from "./writer.js";

export const STABILITY_FACTORS = [
	"Internet service provider bandwidth and quality",
	"Router/modem capabilities and configuration",
	"Network congestion or throttling",
	"Server capacity and responsiveness",
	"Operating system network stack limitations",
];

const RULE = chalk.gray("─".repeat(80));

function rateColor(rate: number, threshold: number): (text: string) => string {
	return rate >= threshold ? chalk.green : chalk.red;
}

function stableMark(batch: BatchResult, threshold: number): string {
	return isStableBatch(batch, threshold) ? "✓" : "✗";
}

/**
 * Format latency stats as a compact string.
 */
export function formatLatency(stats: LatencyStats): string {
	const p99Color = stats.p99 <= 100 ? chalk.green : stats.p99 <= 400 ? chalk.yellow : chalk.red;
	return `min=${stats.min}ms, avg=${stats.avg}ms, p50=${stats.p50}ms, p95=${stats.p95}ms, p99=${p99Color(`${stats.p99}ms`)}, max=${stats.max}ms`;
}

export function formatRunHeader(config: RunConfig): string[] {
	const delayMs = config.connectionDelaySec * 1000;
	return [
		chalk.bold.blue("╔══════════════════════════════════════╗"),
		chalk.bold.blue("║       WEBSOCKET RAMP TEST            ║"),
		chalk.bold.blue("╚══════════════════════════════════════╝"),
		"",
		chalk.bold("Configuration:"),
		`  Target:      ${chalk.dim(config.url)}`,
		`  Mode:        ${chalk.cyan(config.mode)}`,
		`  Connections: ${config.startConnections} → ${config.maxConnections} (step ${config.increment})`,
		`  Hold:        ${config.holdDurationSec}s per batch`,
		`  Pacing:      ${config.connectionDelaySec}s between connections (${calculatePacingRate(delayMs)} conn/sec)`,
		`  Threshold:   ${config.stabilityThreshold}% success`,
	];
}

export function formatSystemInfo(info: SystemInfo): string[] {
	const lines = [
		chalk.bold("System:"),
		`  OS:          ${info.os}`,
		`  Hostname:    ${info.hostname}`,
		`  CPUs:        ${info.cpus} (load ${info.loadAverage.map((l) => l.toFixed(2)).join(" ")})`,
		`  Memory:      ${info.memoryUsagePercent.toFixed(1)}% used`,
	];
	for (const iface of info.interfaces) {
		lines.push(`  ${iface.name}: ${iface.address} / ${iface.netmask}`);
	}
	return lines;
}

export function formatNetworkCounters(label: string, counters: NetworkCounters): string {
	const errors = counters.receiveErrors + counters.sendErrors;
	const errorText = errors > 0 ? chalk.red(`${errors} errors`) : "0 errors";
	return `${label}: sent ${formatBytes(counters.bytesSent)} (${counters.packetsSent} packets) | received ${formatBytes(counters.bytesReceived)} (${counters.packetsReceived} packets) | ${errorText}`;
}

/**
 * Lines printed when a batch completes.
 */
export function formatBatchSummary(batch: BatchResult, threshold: number): string[] {
	const color = rateColor(batch.successRate, threshold);
	const rate = color(`${batch.successRate.toFixed(1)}% ${stableMark(batch, threshold)}`);
	const lines =
		batch.mode === "cumulative"
			? [`Batch ${batch.batch}: ${batch.successful}/${batch.connections} new connections successful (${rate}), ${batch.totalConnections} total`]
			: [`Batch ${batch.batch}: ${batch.successful}/${batch.connections} connections successful (${rate})`];

	if (batch.successful > 0) {
		lines.push(`  Latency:   ${formatLatency(batch.latency)}`);
	}
	for (const [code, count] of Object.entries(countFailures(batch))) {
		lines.push(chalk.red(`  ✗ ${code}: ${count}`));
	}
	return lines;
}

/**
 * Lines printed when the run stops on a regression.
 */
export function formatStopNotice(batch: BatchResult, lastStable: BatchResult | null, threshold: number): string[] {
	const lines = [
		chalk.yellow.bold("Stability threshold crossed, stopping the run"),
		`  Batch ${batch.batch} with ${batch.totalConnections} connections: ${batch.successRate.toFixed(1)}% success (below ${threshold}%)`,
	];
	if (lastStable) {
		lines.push(`  Last stable batch: ${lastStable.batch} with ${lastStable.totalConnections} connections`);
	}
	return lines;
}

function independentTable(batches: readonly BatchResult[], threshold: number): string[] {
	const header = ["Batch #".padEnd(8), "Connections".padEnd(12), "Success Rate".padEnd(15), "Avg Response".padEnd(14), "Min/Max (ms)".padEnd(16), "Duration"];
	const rows = batches.map((b) =>
		[
			String(b.batch).padEnd(8),
			String(b.connections).padEnd(12),
			rateColor(b.successRate, threshold)(`${b.successRate.toFixed(1)}% ${stableMark(b, threshold)}`.padEnd(15)),
			`${b.latency.avg.toFixed(2)}ms`.padEnd(14),
			`${b.latency.min.toFixed(2)}/${b.latency.max.toFixed(2)}`.padEnd(16),
			`${(b.durationMs / 1000).toFixed(2)}s`,
		].join(" "),
	);
	return [chalk.bold(header.join(" ")), ...rows];
}

function cumulativeTable(batches: readonly BatchResult[], threshold: number): string[] {
	const header = ["Batch #".padEnd(8), "New Conns".padEnd(10), "Total Conns".padEnd(12), "Success Rate"];
	const rows = batches.map((b) =>
		[
			String(b.batch).padEnd(8),
			String(b.connections).padEnd(10),
			String(b.totalConnections).padEnd(12),
			rateColor(b.successRate, threshold)(`${b.successRate.toFixed(1)}% ${stableMark(b, threshold)}`),
		].join(" "),
	);
	return [chalk.bold(header.join(" ")), ...rows];
}

/**
 * The batch table, in the layout of the run's mode.
 */
export function formatSummaryTable(report: RunReport): string[] {
	const table =
		report.mode === "cumulative"
			? cumulativeTable(report.batches, report.stabilityThreshold)
			: independentTable(report.batches, report.stabilityThreshold);
	return [RULE, ...table, RULE];
}

export function formatVerdict(verdict: StabilityVerdict): string[] {
	const lines: string[] = [];
	if (verdict.kind === "ceiling" || verdict.kind === "range") {
		const { maxStable, minUnstable } = verdict;
		lines.push(
			`${chalk.green("✓")} Maximum stable:   ${maxStable.totalConnections} connections (batch ${maxStable.batch}, ${maxStable.successRate.toFixed(1)}% success)`,
			`${chalk.red("✗")} Minimum unstable: ${minUnstable.totalConnections} connections (batch ${minUnstable.batch}, ${minUnstable.successRate.toFixed(1)}% success)`,
		);
	}
	lines.push(chalk.bold(`Verdict: ${describeVerdict(verdict)}`));
	return lines;
}

const STOP_REASONS: Record<RunReport["stopReason"], string> = {
	regression: "stability regression",
	max_reached: "maximum connections reached",
	interrupted: "interrupted",
};

/**
 * Everything printed once the run is over.
 */
export function formatFinalResults(report: RunReport): string[] {
	return [
		chalk.bold("         FINAL TEST RESULTS"),
		`Target:      ${report.url}`,
		`Duration:    ${(report.durationMs / 1000).toFixed(2)}s`,
		`Batches:     ${report.batches.length} (${STOP_REASONS[report.stopReason]})`,
		"",
		...formatSummaryTable(report),
		"",
		...formatVerdict(report.verdict),
		"",
		"Possible factors affecting connection stability:",
		...STABILITY_FACTORS.map((factor) => `- ${factor}`),
	];
}

export function printLines(lines: readonly string[]): void {
	for (const line of lines) {
		console.log(line);
	}
}
