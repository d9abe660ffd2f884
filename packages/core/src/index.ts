export { analyzeStability, describeVerdict, isStableBatch, type StabilityCriteria, type StabilityVerdict } from "./analysis/stability-analyzer.js";
export { aggregateBatch } from "./batch/aggregate.js";
export {
	createBatchCoordinator,
	CumulativeBatchCoordinator,
	type IBatchCoordinator,
	IndependentBatchCoordinator,
} from "./batch/batch-coordinator.js";
export {
	buildTargetUrl,
	createRunConfig,
	DEFAULT_STABILITY_THRESHOLD,
	DEFAULT_TARGET,
	DEFAULT_TIMING,
	type RunConfig,
	type RunConfigInput,
	type TargetConfig,
	type TargetProtocol,
	type TimingConfig,
} from "./config/run-config.js";
export { ProgressionController, type ProgressionControllerOptions, type RunState } from "./controller/progression-controller.js";
export type { ConnectionFactory, ConnectOptions, IEchoConnection } from "./domain/connection.js";
export { ConfigError, ConnectionError, ErrorCode, RampError } from "./domain/errors.js";
export type { BatchStartedEvent, ConnectionProbeEvent, ConnectionStateEvent, RampEmitter, RampEvents, RunReport, StopReason } from "./domain/events.js";
export type {
	AdmissionMode,
	BatchResult,
	ConnectionResult,
	ConnectionState,
	FailedConnectionResult,
	SuccessfulConnectionResult,
} from "./domain/results.js";
export { CLOSE_CODE_AT_CAPACITY, EchoServer, type EchoServerOptions } from "./server/echo-server.js";
export { TerminationSignal } from "./signal/termination-signal.js";
export { connectWebSocket, WebSocketEchoConnection } from "./transport/websocket-connection.js";
export { calculatePacingRate } from "./utils/pacing.js";
export { calculateLatencyStats, type LatencyStats } from "./utils/stats.js";
export { ConnectionWorker, type ConnectionWorkerOptions } from "./worker/connection-worker.js";
