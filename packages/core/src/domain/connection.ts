/**
 * Defines the contract for an echo connection.
 * This keeps the worker agnostic to the underlying socket library,
 * and lets tests substitute an in-memory fake.
 */
export interface IEchoConnection {
	/**
	 * Sends a text payload.
	 * Resolves once the payload has been handed to the socket.
	 */
	send(payload: string): Promise<void>;

	/**
	 * Waits for the next text message.
	 * Rejects with RECEIVE_TIMEOUT if none arrives within `timeoutMs`,
	 * or with PROTOCOL_ERROR if the connection closes first.
	 */
	receive(timeoutMs: number): Promise<string>;

	/**
	 * Closes the connection. Resolves once closed or after `timeoutMs`.
	 */
	close(timeoutMs?: number): Promise<void>;
}

export interface ConnectOptions {
	/** Bound on establishing the connection */
	timeoutMs: number;
	/** Accept self-signed TLS certificates (wss only) */
	insecure: boolean;
}

/**
 * Opens a connection to `url`.
 * Rejects with CONNECT_FAILED or CONNECT_TIMEOUT.
 */
export type ConnectionFactory = (url: string, options: ConnectOptions) => Promise<IEchoConnection>;
