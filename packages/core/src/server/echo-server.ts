import * as http from "node:http";
import * as https from "node:https";
import EventEmitter from "eventemitter3";
import WebSocket, { WebSocketServer } from "ws";

/** Close code sent to clients refused because the server is at capacity. */
export const CLOSE_CODE_AT_CAPACITY = 1013;

export interface EchoServerOptions {
	/** Interface to bind (default: 127.0.0.1) */
	host?: string;
	/** Port to listen on, 0 for any free port (default: 0) */
	port?: number;
	/** Refuse connections beyond this many open ones (default: unlimited) */
	maxConnections?: number;
	/** Serve wss with this certificate and key */
	tls?: { cert: string | Buffer; key: string | Buffer };
	/** Accept messages without echoing them back */
	silent?: boolean;
}

export type EchoServerEvents = {
	connection: [info: { active: number; remoteAddress: string | undefined }];
	disconnection: [info: { active: number }];
	rejected: [info: { active: number }];
	message: [info: { bytes: number }];
};

/**
 * A WebSocket echo server: the target side of a local ramp test.
 *
 * Every text message is sent back unchanged. With `maxConnections` set, it
 * models a remote with a hard connection ceiling by closing surplus
 * connections right after they open.
 */
export class EchoServer extends EventEmitter<EchoServerEvents> {
	private readonly clients = new Set<WebSocket>();

	private constructor(
		private readonly httpServer: http.Server,
		private readonly wss: WebSocketServer,
		private readonly options: EchoServerOptions,
		readonly url: string,
		readonly port: number,
	) {
		super();
		wss.on("connection", (socket, request) => this.onConnection(socket, request.socket.remoteAddress));
	}

	/**
	 * Start listening. Resolves once the server accepts connections.
	 */
	static start(options: EchoServerOptions = {}): Promise<EchoServer> {
		const host = options.host ?? "127.0.0.1";
		const httpServer = options.tls ? https.createServer({ cert: options.tls.cert, key: options.tls.key }) : http.createServer();
		const wss = new WebSocketServer({ server: httpServer });

		return new Promise((resolve, reject) => {
			httpServer.once("error", reject);
			httpServer.listen(options.port ?? 0, host, () => {
				httpServer.off("error", reject);
				const address = httpServer.address();
				if (address === null || typeof address === "string") {
					reject(new Error(`Echo server is not listening on a TCP port: ${String(address)}`));
					return;
				}
				const urlHost = host.includes(":") ? `[${host}]` : host;
				const url = `${options.tls ? "wss" : "ws"}://${urlHost}:${address.port}/`;
				resolve(new EchoServer(httpServer, wss, options, url, address.port));
			});
		});
	}

	get activeConnections(): number {
		return this.clients.size;
	}

	/**
	 * Terminate every client and stop listening.
	 */
	async close(): Promise<void> {
		for (const client of this.clients) {
			client.terminate();
		}
		this.clients.clear();
		await new Promise<void>((resolve, reject) => {
			this.wss.close((error) => (error ? reject(error) : resolve()));
		});
		await new Promise<void>((resolve, reject) => {
			this.httpServer.close((error) => (error ? reject(error) : resolve()));
		});
	}

	private onConnection(socket: WebSocket, remoteAddress: string | undefined): void {
		const { maxConnections } = this.options;
		if (maxConnections !== undefined && this.clients.size >= maxConnections) {
			socket.close(CLOSE_CODE_AT_CAPACITY, "Server at capacity");
			this.emit("rejected", { active: this.clients.size });
			return;
		}

		this.clients.add(socket);
		this.emit("connection", { active: this.clients.size, remoteAddress });

		socket.on("message", (data, isBinary) => {
			const bytes = Array.isArray(data) ? data.reduce((sum, chunk) => sum + chunk.length, 0) : data.byteLength;
			this.emit("message", { bytes });
			if (!this.options.silent) {
				socket.send(data, { binary: isBinary });
			}
		});
		socket.on("close", () => {
			if (this.clients.delete(socket)) {
				this.emit("disconnection", { active: this.clients.size });
			}
		});
		socket.on("error", () => {
			socket.terminate();
		});
	}
}
