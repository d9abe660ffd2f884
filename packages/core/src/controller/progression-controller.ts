import EventEmitter from "eventemitter3";
import { analyzeStability, isStableBatch } from "../analysis/stability-analyzer.js";
import { createBatchCoordinator, type IBatchCoordinator } from "../batch/batch-coordinator.js";
import type { RunConfig } from "../config/run-config.js";
import type { ConnectionFactory } from "../domain/connection.js";
import type { RampEvents, RunReport, StopReason } from "../domain/events.js";
import type { BatchResult } from "../domain/results.js";
import { roundMs, sleep } from "../utils/timing.js";

/**
 * Mutable state of a run in progress.
 */
export interface RunState {
	batchNumber: number;
	/** Connections the next batch puts under test */
	targetConnections: number;
	/** Connections held open by the most recent batch (cumulative total in cumulative mode) */
	totalConnections: number;
	lastStable: BatchResult | null;
	history: BatchResult[];
}

export interface ProgressionControllerOptions {
	/** Used by the default coordinator to open connections */
	connect?: ConnectionFactory;
	/** Replaces the coordinator selected from the configured mode */
	coordinator?: IBatchCoordinator;
}

/**
 * Drives a run: ramps the target count batch by batch, applies the stop rule,
 * and analyzes the history once the run ends.
 *
 * Stop rule: the most recent batch at or above the stability threshold is the
 * last stable one. An unstable batch after a stable one ends the run; an
 * unstable batch before any stable one does not, so the run then continues
 * up to the configured maximum.
 */
export class ProgressionController extends EventEmitter<RampEvents> {
	private readonly coordinator: IBatchCoordinator;
	private stopRequested = false;

	constructor(
		private readonly config: RunConfig,
		options: ProgressionControllerOptions = {},
	) {
		super();
		this.coordinator = options.coordinator ?? createBatchCoordinator({ config, connect: options.connect, events: this });
	}

	/**
	 * End the run after the batch in flight. Results so far are still reported.
	 */
	requestStop(): void {
		this.stopRequested = true;
	}

	async run(): Promise<RunReport> {
		const { startConnections, maxConnections, increment, stabilityThreshold, timing } = this.config;
		const startedAt = new Date();
		const startTime = performance.now();

		const state: RunState = {
			batchNumber: 1,
			targetConnections: startConnections,
			totalConnections: 0,
			lastStable: null,
			history: [],
		};
		let stopReason: StopReason = "max_reached";
		let releasedConnections = 0;

		this.emit("run_started", { url: this.config.url, mode: this.config.mode, startConnections, maxConnections, increment });

		try {
			while (state.targetConnections <= maxConnections) {
				if (this.stopRequested) {
					stopReason = "interrupted";
					break;
				}

				const result = await this.coordinator.runBatch(state.batchNumber, state.targetConnections);
				state.history.push(result);
				state.totalConnections = result.totalConnections;
				this.emit("batch_completed", result);

				if (isStableBatch(result, stabilityThreshold)) {
					state.lastStable = result;
				} else if (state.lastStable) {
					// Regression after proven stability
					stopReason = "regression";
					this.emit("run_stopped", { reason: stopReason, batch: result, lastStable: state.lastStable });
					break;
				}

				state.batchNumber++;
				state.targetConnections += increment;

				// Short pause between batches
				if (state.targetConnections <= maxConnections && !this.stopRequested) {
					await sleep(timing.batchPauseMs);
				}
			}
		} finally {
			releasedConnections = this.coordinator.openConnections;
			if (releasedConnections > 0) {
				this.emit("releasing", { openConnections: releasedConnections });
			}
			await this.coordinator.release();
		}

		const report: RunReport = {
			url: this.config.url,
			mode: this.config.mode,
			stabilityThreshold,
			increment,
			batches: [...state.history],
			lastStable: state.lastStable,
			stopReason,
			startedAt: startedAt.toISOString(),
			finishedAt: new Date().toISOString(),
			durationMs: roundMs(performance.now() - startTime),
			verdict: analyzeStability(state.history, { threshold: stabilityThreshold, increment }),
			releasedConnections,
		};

		this.emit("run_completed", report);
		return report;
	}
}
