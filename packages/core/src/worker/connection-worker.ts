import type { RunConfig } from "../config/run-config.js";
import type { ConnectionFactory, IEchoConnection } from "../domain/connection.js";
import { ConnectionError, ErrorCode, isTimeoutCode } from "../domain/errors.js";
import type { RampEmitter } from "../domain/events.js";
import type { ConnectionResult, ConnectionState, FailedConnectionResult, SuccessfulConnectionResult } from "../domain/results.js";
import type { TerminationSignal } from "../signal/termination-signal.js";
import { connectWebSocket } from "../transport/websocket-connection.js";
import { calculateLatencyStats } from "../utils/stats.js";
import { elapsedMs } from "../utils/timing.js";

export interface ConnectionWorkerOptions {
	id: number;
	batch: number;
	config: RunConfig;
	/** Set by the owning coordinator when the connection should finish */
	signal: TerminationSignal;
	connect?: ConnectionFactory;
	events?: RampEmitter;
}

type Failure = { code: ErrorCode; message: string };

/** Longest echo excerpt quoted in a protocol error. */
const MAX_QUOTED_PAYLOAD = 64;

export function identificationPayload(id: number): string {
	return `Test message from connection ${id}`;
}

export function keepalivePayload(id: number): string {
	return `keepalive-${id}`;
}

function quote(payload: string): string {
	return payload.length > MAX_QUOTED_PAYLOAD ? `${payload.slice(0, MAX_QUOTED_PAYLOAD)}...` : payload;
}

/**
 * Drives one connection through its lifecycle:
 *
 *   connecting → handshaking → holding → completed | failed | timed_out
 *
 * - connecting: open the connection (bounded by the connect timeout)
 * - handshaking: send the identification payload and await its echo
 * - holding: until the signal is set, probe with a keepalive, then wait for
 *   the signal or the check interval, whichever comes first
 * - completed: the signal was observed between probes; the connection is closed
 *
 * `start()` always resolves with exactly one ConnectionResult. Failures become
 * data, never exceptions.
 */
export class ConnectionWorker {
	readonly id: number;
	readonly batch: number;
	private readonly config: RunConfig;
	private readonly signal: TerminationSignal;
	private readonly connect: ConnectionFactory;
	private readonly events: RampEmitter | undefined;

	private _state: ConnectionState = "connecting";
	private readonly responseTimes: number[] = [];
	private connectTimeMs: number | null = null;
	private startedAt = performance.now();
	private result: ConnectionResult | null = null;
	private completion: Promise<ConnectionResult> | null = null;
	private markEstablished: () => void = () => {};

	/**
	 * Settles once the worker has left the connecting and handshaking states,
	 * either holding its connection or finished.
	 */
	readonly established: Promise<void> = new Promise((resolve) => {
		this.markEstablished = resolve;
	});

	constructor(options: ConnectionWorkerOptions) {
		this.id = options.id;
		this.batch = options.batch;
		this.config = options.config;
		this.signal = options.signal;
		this.connect = options.connect ?? connectWebSocket;
		this.events = options.events;
	}

	get state(): ConnectionState {
		return this._state;
	}

	/**
	 * Run the lifecycle. Calling it again returns the same promise.
	 */
	start(): Promise<ConnectionResult> {
		if (!this.completion) {
			this.startedAt = performance.now();
			this.completion = this.execute().catch((error: unknown) => this.fail(this.toFailure(error)));
		}
		return this.completion;
	}

	/**
	 * The result so far. For a connection that is still holding, this is a
	 * successful result carrying the samples collected up to now.
	 */
	snapshot(): ConnectionResult {
		if (this.result) return this.result;

		switch (this._state) {
			case "connecting":
				return this.buildFailed("timed_out", {
					code: ErrorCode.CONNECT_TIMEOUT,
					message: "Still connecting when results were collected",
				});
			case "handshaking":
				return this.buildFailed("timed_out", {
					code: ErrorCode.HANDSHAKE_TIMEOUT,
					message: "Still waiting for the handshake echo when results were collected",
				});
			default:
				return this.buildSuccessful("holding");
		}
	}

	private async execute(): Promise<ConnectionResult> {
		const { timing, url, target } = this.config;
		let connection: IEchoConnection | null = null;

		try {
			// CONNECT PHASE
			connection = await this.connect(url, { timeoutMs: timing.connectTimeoutMs, insecure: target.insecure });
			this.connectTimeMs = elapsedMs(this.startedAt);

			// HANDSHAKE PHASE
			this.transition("handshaking");
			await this.probe(connection, identificationPayload(this.id), timing.handshakeTimeoutMs, "handshake");

			// HOLD PHASE - keep alive until the signal is set
			this.transition("holding");
			while (!this.signal.isSet) {
				await this.probe(connection, keepalivePayload(this.id), timing.keepaliveTimeoutMs, "keepalive");
				await this.signal.wait(timing.checkIntervalMs);
			}
		} catch (error) {
			const failure = this.toFailure(error);
			if (connection) await connection.close(timing.closeTimeoutMs);
			return this.fail(failure);
		}

		await connection.close(timing.closeTimeoutMs);
		return this.finish(this.buildSuccessful("completed"));
	}

	private async probe(
		connection: IEchoConnection,
		payload: string,
		timeoutMs: number,
		kind: "handshake" | "keepalive",
	): Promise<void> {
		const sentAt = performance.now();
		await connection.send(payload);
		const echo = await connection.receive(timeoutMs);
		const latencyMs = elapsedMs(sentAt);

		if (echo !== payload) {
			throw new ConnectionError(ErrorCode.PROTOCOL_ERROR, `Unexpected echo: expected "${quote(payload)}", got "${quote(echo)}"`);
		}

		this.responseTimes.push(latencyMs);
		if (this.config.verbose) {
			this.events?.emit("connection_probe", { id: this.id, batch: this.batch, kind, latencyMs });
		}
	}

	/**
	 * Map an error to the taxonomy, according to the phase it interrupted.
	 */
	private toFailure(error: unknown): Failure {
		const message = error instanceof Error ? error.message : String(error);

		if (error instanceof ConnectionError && error.code !== ErrorCode.RECEIVE_TIMEOUT) {
			return { code: error.code, message };
		}

		const timedOut = error instanceof ConnectionError;
		switch (this._state) {
			case "connecting":
				return { code: ErrorCode.CONNECT_FAILED, message };
			case "handshaking":
				return timedOut
					? { code: ErrorCode.HANDSHAKE_TIMEOUT, message: `Timeout waiting for handshake echo (${this.config.timing.handshakeTimeoutMs}ms)` }
					: { code: ErrorCode.PROTOCOL_ERROR, message };
			default:
				return timedOut
					? { code: ErrorCode.KEEPALIVE_TIMEOUT, message: `Timeout waiting for keepalive echo (${this.config.timing.keepaliveTimeoutMs}ms)` }
					: { code: ErrorCode.PROTOCOL_ERROR, message };
		}
	}

	private transition(state: ConnectionState): void {
		this._state = state;
		if (state !== "connecting" && state !== "handshaking") {
			this.markEstablished();
		}
		this.events?.emit("connection_state", { id: this.id, batch: this.batch, state, elapsedMs: elapsedMs(this.startedAt) });
	}

	private fail(failure: Failure): ConnectionResult {
		return this.finish(this.buildFailed(isTimeoutCode(failure.code) ? "timed_out" : "failed", failure));
	}

	private finish(result: ConnectionResult): ConnectionResult {
		if (this.result) return this.result;
		this.transition(result.state);
		this.result = result;
		this.events?.emit("connection_finished", result);
		return result;
	}

	private buildSuccessful(state: SuccessfulConnectionResult["state"]): SuccessfulConnectionResult {
		return Object.freeze({ ...this.measurements(), success: true, state });
	}

	private buildFailed(state: FailedConnectionResult["state"], failure: Failure): FailedConnectionResult {
		return Object.freeze({
			...this.measurements(),
			success: false,
			state,
			errorCode: failure.code,
			error: failure.message,
		});
	}

	private measurements() {
		const stats = calculateLatencyStats(this.responseTimes);
		return {
			id: this.id,
			batch: this.batch,
			durationMs: elapsedMs(this.startedAt),
			connectTimeMs: this.connectTimeMs,
			responseTimes: Object.freeze([...this.responseTimes]),
			avgResponse: stats.avg,
			minResponse: stats.min,
			maxResponse: stats.max,
		};
	}
}
