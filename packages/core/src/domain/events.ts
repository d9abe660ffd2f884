import type EventEmitter from "eventemitter3";
import type { StabilityVerdict } from "../analysis/stability-analyzer.js";
import type { AdmissionMode, BatchResult, ConnectionResult, ConnectionState } from "./results.js";

export type StopReason = "regression" | "max_reached" | "interrupted";

/**
 * Everything a run produced, including results gathered before an early stop.
 */
export interface RunReport {
	url: string;
	mode: AdmissionMode;
	stabilityThreshold: number;
	increment: number;
	batches: readonly BatchResult[];
	lastStable: BatchResult | null;
	stopReason: StopReason;
	startedAt: string;
	finishedAt: string;
	durationMs: number;
	verdict: StabilityVerdict;
	/** Connections still open at run end and released then (cumulative mode) */
	releasedConnections: number;
}

export interface BatchStartedEvent {
	batch: number;
	mode: AdmissionMode;
	/** Connections this batch launches */
	connections: number;
	totalConnections: number;
}

export interface ConnectionStateEvent {
	id: number;
	batch: number;
	state: ConnectionState;
	elapsedMs: number;
}

export interface ConnectionProbeEvent {
	id: number;
	batch: number;
	kind: "handshake" | "keepalive";
	latencyMs: number;
}

/**
 * Events published while a run is in progress.
 * The library never prints; front ends subscribe to these instead.
 */
export type RampEvents = {
	run_started: [info: { url: string; mode: AdmissionMode; startConnections: number; maxConnections: number; increment: number }];
	batch_started: [info: BatchStartedEvent];
	connection_state: [event: ConnectionStateEvent];
	/** Only published when the run is verbose */
	connection_probe: [event: ConnectionProbeEvent];
	connection_finished: [result: ConnectionResult];
	hold_started: [info: { batch: number; launched: number; holdDurationSec: number }];
	batch_completed: [result: BatchResult];
	run_stopped: [info: { reason: StopReason; batch: BatchResult; lastStable: BatchResult | null }];
	releasing: [info: { openConnections: number }];
	run_completed: [report: RunReport];
};

export type RampEmitter = EventEmitter<RampEvents>;
