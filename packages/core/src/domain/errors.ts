export enum ErrorCode {
	// Connection errors
	CONNECT_FAILED = "CONNECT_FAILED",
	CONNECT_TIMEOUT = "CONNECT_TIMEOUT",
	HANDSHAKE_TIMEOUT = "HANDSHAKE_TIMEOUT",
	KEEPALIVE_TIMEOUT = "KEEPALIVE_TIMEOUT",
	PROTOCOL_ERROR = "PROTOCOL_ERROR",

	// Transport errors (mapped to one of the above by the worker)
	RECEIVE_TIMEOUT = "RECEIVE_TIMEOUT",

	// Configuration errors
	CONFIG_INVALID = "CONFIG_INVALID",

	// Generic fallback
	UNKNOWN = "UNKNOWN",
}

export class RampError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
	) {
		super(message || code);
		this.name = code;
	}
}

export class ConnectionError extends RampError {}
export class ConfigError extends RampError {}

/**
 * Codes that end a connection in the `timed_out` state rather than `failed`.
 */
export function isTimeoutCode(code: ErrorCode): boolean {
	return (
		code === ErrorCode.CONNECT_TIMEOUT ||
		code === ErrorCode.HANDSHAKE_TIMEOUT ||
		code === ErrorCode.KEEPALIVE_TIMEOUT ||
		code === ErrorCode.RECEIVE_TIMEOUT
	);
}
