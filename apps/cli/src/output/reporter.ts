import type { BatchResult, BatchStartedEvent, ConnectionProbeEvent, ConnectionResult, ConnectionStateEvent, RampEmitter, RampEvents } from "@socket-ramp/core";
import chalk from "chalk";
import type { SingleBar } from "cli-progress";
import { diffCounters, type NetworkCounters, readNetworkCounters } from "../diagnostics/system-info.js";
import { BatchProgress, createConnectionProgressBar } from "../utils/progress.js";
import { formatBatchSummary, formatNetworkCounters, formatStopNotice } from "./formatter.js";

export interface ReporterOptions {
	verbose: boolean;
	stabilityThreshold: number;
	showNetworkStats: boolean;
	log?: (line: string) => void;
	createBar?: (label: string) => SingleBar;
	readCounters?: () => NetworkCounters | null;
}

function prefix(event: { id: number; batch: number }): string {
	return chalk.gray(`[batch ${event.batch}] connection ${event.id}`);
}

/**
 * Print a run's progress as it happens.
 *
 * Normal mode prints batch-level lines and a progress bar per batch; verbose
 * mode prints every connection event instead of the bar.
 *
 * @returns A function that detaches the reporter
 */
export function attachConsoleReporter(events: RampEmitter, options: ReporterOptions): () => void {
	const log = options.log ?? ((line: string) => console.log(line));
	const createBar = options.createBar ?? createConnectionProgressBar;
	const readCounters = options.readCounters ?? (() => readNetworkCounters());
	const { verbose, stabilityThreshold } = options;

	let currentBatch = 0;
	let progress: BatchProgress | null = null;
	let countersBefore: NetworkCounters | null = null;

	const onBatchStarted = (info: BatchStartedEvent) => {
		currentBatch = info.batch;
		log("");
		log(
			chalk.bold(
				info.mode === "cumulative"
					? `[socket-ramp] Batch ${info.batch}: adding ${info.connections} connections (${info.totalConnections} total)`
					: `[socket-ramp] Batch ${info.batch}: testing ${info.connections} connections`,
			),
		);

		if (options.showNetworkStats) {
			countersBefore = readCounters();
			if (countersBefore === null) {
				log(chalk.dim("[socket-ramp] Network counters are not available on this platform"));
			}
		}
		if (!verbose) {
			progress = new BatchProgress(createBar(`Batch ${info.batch}`), info.connections);
		}
	};

	const onConnectionState = (event: ConnectionStateEvent) => {
		if (event.state === "holding" && event.batch === currentBatch) {
			progress?.established();
		}
		if (!verbose) return;

		switch (event.state) {
			case "handshaking":
				log(`${prefix(event)} connected (${event.elapsedMs}ms)`);
				break;
			case "holding":
				log(`${prefix(event)} handshake echoed, holding`);
				break;
			case "completed":
				log(`${prefix(event)} ${chalk.green("completed")}`);
				break;
		}
	};

	const onConnectionProbe = (event: ConnectionProbeEvent) => {
		log(chalk.dim(`${prefix(event)} ${event.kind} echo in ${event.latencyMs}ms`));
	};

	const onConnectionFinished = (result: ConnectionResult) => {
		if (result.success) return;
		// Never established: no echo was ever received
		if (result.responseTimes.length === 0 && result.batch === currentBatch) {
			progress?.failed();
		}
		if (verbose) {
			const outcome = result.state === "timed_out" ? "TIMED OUT" : "FAILED";
			log(`${prefix(result)} ${chalk.red(`${outcome} [${result.errorCode}] ${result.error}`)}`);
		}
	};

	const onHoldStarted = (info: RampEvents["hold_started"][0]) => {
		if (verbose) {
			log(`[socket-ramp] All ${info.launched} connections launched, holding for ${info.holdDurationSec}s`);
		}
	};

	const onBatchCompleted = (result: BatchResult) => {
		progress?.stop();
		progress = null;
		for (const line of formatBatchSummary(result, stabilityThreshold)) {
			log(line);
		}

		if (countersBefore) {
			const after = readCounters();
			if (after) {
				log(formatNetworkCounters(`[socket-ramp] Batch ${result.batch} traffic`, diffCounters(countersBefore, after)));
			}
			countersBefore = null;
		}
	};

	const onRunStopped = (info: RampEvents["run_stopped"][0]) => {
		log("");
		for (const line of formatStopNotice(info.batch, info.lastStable, stabilityThreshold)) {
			log(line);
		}
	};

	const onReleasing = (info: RampEvents["releasing"][0]) => {
		log("");
		log(chalk.yellow(`[socket-ramp] Closing all ${info.openConnections} held connections...`));
	};

	events.on("batch_started", onBatchStarted);
	events.on("connection_state", onConnectionState);
	events.on("connection_probe", onConnectionProbe);
	events.on("connection_finished", onConnectionFinished);
	events.on("hold_started", onHoldStarted);
	events.on("batch_completed", onBatchCompleted);
	events.on("run_stopped", onRunStopped);
	events.on("releasing", onReleasing);

	return () => {
		progress?.stop();
		events.off("batch_started", onBatchStarted);
		events.off("connection_state", onConnectionState);
		events.off("connection_probe", onConnectionProbe);
		events.off("connection_finished", onConnectionFinished);
		events.off("hold_started", onHoldStarted);
		events.off("batch_completed", onBatchCompleted);
		events.off("run_stopped", onRunStopped);
		events.off("releasing", onReleasing);
	};
}
