import WebSocket from "ws";
import type { ConnectOptions, IEchoConnection } from "../domain/connection.js";
import { ConnectionError, ErrorCode } from "../domain/errors.js";

/** Bound on closing a connection when the caller gives none. */
const DEFAULT_CLOSE_TIMEOUT_MS = 2000;

type Waiter = {
	resolve: (message: string) => void;
	reject: (error: Error) => void;
	timer: ReturnType<typeof setTimeout>;
};

function rawToString(data: WebSocket.RawData): string {
	if (Buffer.isBuffer(data)) return data.toString("utf8");
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
	return Buffer.from(data).toString("utf8");
}

/**
 * An IEchoConnection over a `ws` WebSocket.
 *
 * Incoming messages are queued until `receive` picks them up, so an echo that
 * arrives before the caller starts waiting is not lost.
 */
export class WebSocketEchoConnection implements IEchoConnection {
	private readonly inbox: string[] = [];
	private waiter: Waiter | null = null;
	private closedReason: string | null = null;

	/**
	 * Open a WebSocket to `url`.
	 * Rejects with CONNECT_TIMEOUT or CONNECT_FAILED.
	 */
	static open(url: string, options: ConnectOptions): Promise<WebSocketEchoConnection> {
		return new Promise((resolve, reject) => {
			const socket = new WebSocket(url, { rejectUnauthorized: !options.insecure });

			const timer = setTimeout(() => {
				reject(new ConnectionError(ErrorCode.CONNECT_TIMEOUT, `Connection timeout after ${options.timeoutMs}ms`));
				socket.terminate();
			}, options.timeoutMs);

			// Stays attached after a timeout: terminate() reports an error we have already accounted for
			const onError = (error: Error) => {
				clearTimeout(timer);
				reject(new ConnectionError(ErrorCode.CONNECT_FAILED, error.message));
			};
			socket.on("error", onError);

			socket.once("open", () => {
				clearTimeout(timer);
				socket.off("error", onError);
				resolve(new WebSocketEchoConnection(socket));
			});
		});
	}

	private constructor(private readonly socket: WebSocket) {
		socket.on("message", (data) => this.onMessage(rawToString(data)));
		socket.on("close", (code, reason) => this.onClose(code, reason.toString("utf8")));
		socket.on("error", (error) => this.onError(error));
	}

	async send(payload: string): Promise<void> {
		if (this.closedReason !== null || this.socket.readyState !== WebSocket.OPEN) {
			throw new ConnectionError(ErrorCode.PROTOCOL_ERROR, this.closedReason ?? "Connection is not open");
		}
		// Write errors surface through the error/close events and fail the pending receive
		this.socket.send(payload, (error) => {
			if (error) this.onError(error);
		});
	}

	receive(timeoutMs: number): Promise<string> {
		const queued = this.inbox.shift();
		if (queued !== undefined) return Promise.resolve(queued);

		if (this.closedReason !== null) {
			return Promise.reject(new ConnectionError(ErrorCode.PROTOCOL_ERROR, this.closedReason));
		}
		if (this.waiter) {
			return Promise.reject(new ConnectionError(ErrorCode.PROTOCOL_ERROR, "A receive is already pending"));
		}

		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => {
				this.waiter = null;
				reject(new ConnectionError(ErrorCode.RECEIVE_TIMEOUT, `No message within ${timeoutMs}ms`));
			}, timeoutMs);
			this.waiter = { resolve, reject, timer };
		});
	}

	close(timeoutMs = DEFAULT_CLOSE_TIMEOUT_MS): Promise<void> {
		if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();

		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				this.socket.terminate();
				resolve();
			}, timeoutMs);
			this.socket.once("close", () => {
				clearTimeout(timer);
				resolve();
			});
			if (this.socket.readyState === WebSocket.OPEN) {
				this.socket.close(1000, "Test complete");
			}
		});
	}

	private onMessage(message: string): void {
		const waiter = this.waiter;
		if (waiter) {
			clearTimeout(waiter.timer);
			this.waiter = null;
			waiter.resolve(message);
			return;
		}
		this.inbox.push(message);
	}

	private onClose(code: number, reason: string): void {
		this.closedReason = `Connection closed (code ${code}${reason ? `: ${reason}` : ""})`;
		this.failWaiter(this.closedReason);
	}

	private onError(error: Error): void {
		this.failWaiter(error.message);
	}

	private failWaiter(message: string): void {
		const waiter = this.waiter;
		if (!waiter) return;
		clearTimeout(waiter.timer);
		this.waiter = null;
		waiter.reject(new ConnectionError(ErrorCode.PROTOCOL_ERROR, message));
	}
}

/**
 * The default ConnectionFactory.
 */
export function connectWebSocket(url: string, options: ConnectOptions): Promise<IEchoConnection> {
	return WebSocketEchoConnection.open(url, options);
}
