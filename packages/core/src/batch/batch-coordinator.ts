import type { RunConfig } from "../config/run-config.js";
import type { ConnectionFactory } from "../domain/connection.js";
import type { RampEmitter } from "../domain/events.js";
import type { BatchResult, ConnectionResult } from "../domain/results.js";
import { TerminationSignal } from "../signal/termination-signal.js";
import { launchWithPacing } from "../utils/pacing.js";
import { sleep } from "../utils/timing.js";
import { ConnectionWorker } from "../worker/connection-worker.js";
import { aggregateBatch } from "./aggregate.js";

/**
 * Runs one batch at a time for the ProgressionController.
 */
export interface IBatchCoordinator {
	/**
	 * Run batch `batch` so that `targetConnections` connections are under test.
	 * Always resolves once every launched worker has reported.
	 */
	runBatch(batch: number, targetConnections: number): Promise<BatchResult>;

	/**
	 * Release every connection still open. Resolves with their final results.
	 */
	release(): Promise<ConnectionResult[]>;

	/** Connections launched and not yet finished */
	readonly openConnections: number;
}

export interface BatchCoordinatorOptions {
	config: RunConfig;
	connect?: ConnectionFactory;
	events?: RampEmitter;
}

interface LaunchedWorker {
	worker: ConnectionWorker;
	completion: Promise<ConnectionResult>;
}

function isOpen(worker: ConnectionWorker): boolean {
	return worker.state === "connecting" || worker.state === "handshaking" || worker.state === "holding";
}

abstract class BaseBatchCoordinator implements IBatchCoordinator {
	protected readonly config: RunConfig;
	protected readonly connect: ConnectionFactory | undefined;
	protected readonly events: RampEmitter | undefined;

	constructor(options: BatchCoordinatorOptions) {
		this.config = options.config;
		this.connect = options.connect;
		this.events = options.events;
	}

	abstract runBatch(batch: number, targetConnections: number): Promise<BatchResult>;
	abstract release(): Promise<ConnectionResult[]>;
	abstract get openConnections(): number;

	/**
	 * Launch `count` workers governed by `signal`, staggered by the configured delay.
	 * Resolves once all are launched and the hold duration has elapsed after that.
	 */
	protected async launchAndHold(batch: number, firstId: number, count: number, signal: TerminationSignal): Promise<LaunchedWorker[]> {
		const launched = await launchWithPacing({
			count,
			delayMs: this.config.connectionDelaySec * 1000,
			onStart: (index): LaunchedWorker => {
				const worker = new ConnectionWorker({
					id: firstId + index,
					batch,
					config: this.config,
					signal,
					connect: this.connect,
					events: this.events,
				});
				return { worker, completion: worker.start() };
			},
		});

		this.events?.emit("hold_started", { batch, launched: launched.length, holdDurationSec: this.config.holdDurationSec });
		await sleep(this.config.holdDurationSec * 1000);
		return launched;
	}
}

/**
 * Independent admission: each batch opens its own connections, holds them for
 * the batch duration, then closes all of them before reporting.
 */
export class IndependentBatchCoordinator extends BaseBatchCoordinator {
	private current: LaunchedWorker[] = [];

	get openConnections(): number {
		return this.current.filter(({ worker }) => isOpen(worker)).length;
	}

	async runBatch(batch: number, targetConnections: number): Promise<BatchResult> {
		const startTime = performance.now();
		const signal = new TerminationSignal();

		this.events?.emit("batch_started", {
			batch,
			mode: "independent",
			connections: targetConnections,
			totalConnections: targetConnections,
		});

		this.current = await this.launchAndHold(batch, 1, targetConnections, signal);

		// Signal all connections to end, then wait for every worker to report
		signal.set();
		const results = await Promise.all(this.current.map(({ completion }) => completion));

		return aggregateBatch({
			batch,
			mode: "independent",
			totalConnections: targetConnections,
			results,
			durationMs: performance.now() - startTime,
		});
	}

	async release(): Promise<ConnectionResult[]> {
		// Every batch closes its own connections before reporting
		return [];
	}
}

interface LiveBatch {
	batch: number;
	signal: TerminationSignal;
	launched: LaunchedWorker[];
}

/**
 * Cumulative admission: every batch adds new connections on top of the ones
 * earlier batches left open.
 *
 * Each batch gets its own signal, left unset until `release()`, so earlier
 * connections keep holding while later batches run. A batch reports a
 * checkpoint of its own new connections once they are established and the
 * hold duration has elapsed.
 */
export class CumulativeBatchCoordinator extends BaseBatchCoordinator {
	private readonly live: LiveBatch[] = [];
	private total = 0;

	get totalConnections(): number {
		return this.total;
	}

	get openConnections(): number {
		return this.live.reduce((open, { launched }) => open + launched.filter(({ worker }) => isOpen(worker)).length, 0);
	}

	/**
	 * The signal of every batch whose connections have not been released yet.
	 */
	get liveSignals(): ReadonlyArray<{ batch: number; signal: TerminationSignal }> {
		return this.live.map(({ batch, signal }) => ({ batch, signal }));
	}

	async runBatch(batch: number, targetConnections: number): Promise<BatchResult> {
		const newConnections = targetConnections - this.total;
		if (newConnections <= 0) {
			throw new RangeError(`Batch ${batch} targets ${targetConnections} connections but ${this.total} are already open`);
		}

		const startTime = performance.now();
		const firstId = this.total + 1;
		this.total = targetConnections;

		// This batch's signal; earlier batches' signals stay unset
		const signal = new TerminationSignal();

		this.events?.emit("batch_started", {
			batch,
			mode: "cumulative",
			connections: newConnections,
			totalConnections: this.total,
		});

		const launched = await this.launchAndHold(batch, firstId, newConnections, signal);
		this.live.push({ batch, signal, launched });

		// Checkpoint: wait until each new connection is holding or finished, without closing any
		await Promise.all(launched.map(({ worker }) => worker.established));
		const results = launched.map(({ worker }) => worker.snapshot());

		return aggregateBatch({
			batch,
			mode: "cumulative",
			totalConnections: this.total,
			results,
			durationMs: performance.now() - startTime,
		});
	}

	async release(): Promise<ConnectionResult[]> {
		for (const { signal } of this.live) {
			signal.set();
		}
		const completions = this.live.flatMap(({ launched }) => launched.map(({ completion }) => completion));
		this.live.length = 0;
		return Promise.all(completions);
	}
}

/**
 * Select the coordinator for the configured admission mode.
 */
export function createBatchCoordinator(options: BatchCoordinatorOptions): IBatchCoordinator {
	return options.config.mode === "cumulative" ? new CumulativeBatchCoordinator(options) : new IndependentBatchCoordinator(options);
}
