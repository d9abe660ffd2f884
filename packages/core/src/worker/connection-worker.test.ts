import EventEmitter from "eventemitter3";
import * as t from "vitest";
import { ConnectionError, ErrorCode } from "../domain/errors.js";
import type { RampEvents } from "../domain/events.js";
import { TerminationSignal } from "../signal/termination-signal.js";
import { createFakeFactory, type FakeEchoBehaviour } from "../testing/fake-echo-connection.js";
import { createTestConfig } from "../testing/fixtures.js";
import { ConnectionWorker, identificationPayload, keepalivePayload } from "./connection-worker.js";

function setup(behaviour: FakeEchoBehaviour | Error = {}, configInput: Parameters<typeof createTestConfig>[0] = {}) {
	const factory = createFakeFactory(() => behaviour);
	const signal = new TerminationSignal();
	const events = new EventEmitter<RampEvents>();
	const worker = new ConnectionWorker({ id: 3, batch: 2, config: createTestConfig(configInput), signal, connect: factory.connect, events });
	return { ...factory, signal, events, worker };
}

t.describe("ConnectionWorker", () => {
	t.test("payloads carry the connection id", () => {
		t.expect(identificationPayload(7)).toBe("Test message from connection 7");
		t.expect(keepalivePayload(7)).toBe("keepalive-7");
	});

	t.describe("successful lifecycle", () => {
		t.test("completes once the signal is set, then closes the connection", async () => {
			const { worker, signal, connections } = setup();
			const completion = worker.start();
			setTimeout(() => signal.set(), 70);

			const result = await completion;

			t.expect(result.success).toBe(true);
			t.expect(result.state).toBe("completed");
			t.expect(result.id).toBe(3);
			t.expect(result.batch).toBe(2);
			t.expect(result.connectTimeMs).not.toBeNull();
			t.expect(result.responseTimes.length).toBeGreaterThanOrEqual(2);
			t.expect(result.minResponse).toBeLessThanOrEqual(result.avgResponse);
			t.expect(result.avgResponse).toBeLessThanOrEqual(result.maxResponse);
			t.expect(connections[0]?.sent.slice(0, 2)).toEqual(["Test message from connection 3", "keepalive-3"]);
			t.expect(connections[0]?.closed).toBe(true);
			t.expect(worker.state).toBe("completed");
		});

		t.test("transitions through handshaking and holding", async () => {
			const { worker, signal, events } = setup();
			const states: string[] = [];
			const finished = t.vi.fn();
			events.on("connection_state", ({ state }) => states.push(state));
			events.on("connection_finished", finished);

			const completion = worker.start();
			await worker.established;
			signal.set();
			await completion;

			t.expect(states).toEqual(["handshaking", "holding", "completed"]);
			t.expect(finished).toHaveBeenCalledTimes(1);
		});

		t.test("start returns the same promise when called again", async () => {
			const { worker, signal, calls } = setup();
			signal.set();
			const first = worker.start();
			t.expect(worker.start()).toBe(first);
			await first;
			t.expect(calls).toHaveLength(1);
		});

		t.test("only reports probes in verbose mode", async () => {
			const quiet = setup();
			const quietProbe = t.vi.fn();
			quiet.events.on("connection_probe", quietProbe);
			quiet.signal.set();
			await quiet.worker.start();
			t.expect(quietProbe).not.toHaveBeenCalled();

			const verbose = setup({}, { verbose: true });
			const kinds: string[] = [];
			verbose.events.on("connection_probe", ({ kind }) => kinds.push(kind));
			verbose.signal.set();
			await verbose.worker.start();
			// The signal is already set, so the handshake is the only probe
			t.expect(kinds).toEqual(["handshake"]);
		});

		t.test("reacts to the signal without waiting out the check interval", async () => {
			const { worker, signal } = setup({}, { timing: { checkIntervalMs: 5000 } });
			const completion = worker.start();
			await worker.established;

			const setAt = performance.now();
			signal.set();
			const result = await completion;

			t.expect(result.state).toBe("completed");
			t.expect(performance.now() - setAt).toBeLessThan(1000);
		});
	});

	t.describe("failures", () => {
		t.test("records a refused connection", async () => {
			const { worker } = setup(new ConnectionError(ErrorCode.CONNECT_FAILED, "connect ECONNREFUSED 127.0.0.1:7070"));
			const result = await worker.start();

			t.expect(result).toMatchObject({
				success: false,
				state: "failed",
				errorCode: ErrorCode.CONNECT_FAILED,
				error: "connect ECONNREFUSED 127.0.0.1:7070",
				connectTimeMs: null,
				responseTimes: [],
			});
		});

		t.test("classifies an unexpected error while connecting as a connect failure", async () => {
			const { worker } = setup(new Error("getaddrinfo ENOTFOUND nowhere.test"));
			const result = await worker.start();

			t.expect(result.success).toBe(false);
			t.expect(result.success === false && result.errorCode).toBe(ErrorCode.CONNECT_FAILED);
			t.expect(result.success === false && result.error).toBe("getaddrinfo ENOTFOUND nowhere.test");
		});

		t.test("records a connect timeout as timed out", async () => {
			const { worker } = setup(new ConnectionError(ErrorCode.CONNECT_TIMEOUT, "Connection timeout (200ms)"));
			const result = await worker.start();

			t.expect(result).toMatchObject({ success: false, state: "timed_out", errorCode: ErrorCode.CONNECT_TIMEOUT });
		});

		t.test("times out when the handshake is never echoed", async () => {
			const { worker, connections } = setup({ echoLimit: 0 });
			const result = await worker.start();

			t.expect(result).toMatchObject({
				success: false,
				state: "timed_out",
				errorCode: ErrorCode.HANDSHAKE_TIMEOUT,
				error: "Timeout waiting for handshake echo (50ms)",
				responseTimes: [],
			});
			t.expect(result.connectTimeMs).not.toBeNull();
			t.expect(connections[0]?.closed).toBe(true);
		});

		t.test("times out on a missed keepalive and keeps earlier samples", async () => {
			const { worker } = setup({ echoLimit: 1 });
			const result = await worker.start();

			t.expect(result).toMatchObject({
				success: false,
				state: "timed_out",
				errorCode: ErrorCode.KEEPALIVE_TIMEOUT,
				error: "Timeout waiting for keepalive echo (50ms)",
			});
			t.expect(result.responseTimes).toHaveLength(1);
		});

		t.test("treats a wrong echo as a protocol error", async () => {
			const { worker } = setup({ reply: () => "nope" });
			const result = await worker.start();

			t.expect(result).toMatchObject({
				success: false,
				state: "failed",
				errorCode: ErrorCode.PROTOCOL_ERROR,
				error: 'Unexpected echo: expected "Test message from connection 3", got "nope"',
				responseTimes: [],
			});
		});

		t.test("truncates long echoes in the error", async () => {
			const { worker } = setup({ reply: () => "x".repeat(100) });
			const result = await worker.start();

			t.expect(result.success === false && result.error).toBe(`Unexpected echo: expected "Test message from connection 3", got "${"x".repeat(64)}..."`);
		});

		t.test("records the server closing the connection while holding", async () => {
			const closed = new ConnectionError(ErrorCode.PROTOCOL_ERROR, "Connection closed (code 1006)");
			const { worker } = setup({ failAfter: { echoes: 1, error: closed } });
			const result = await worker.start();

			t.expect(result).toMatchObject({
				success: false,
				state: "failed",
				errorCode: ErrorCode.PROTOCOL_ERROR,
				error: "Connection closed (code 1006)",
			});
			t.expect(result.responseTimes).toHaveLength(1);
		});
	});

	t.describe("snapshot", () => {
		t.test("reports a connection that never got going as a connect timeout", () => {
			const { worker } = setup();
			t.expect(worker.snapshot()).toMatchObject({ success: false, state: "timed_out", errorCode: ErrorCode.CONNECT_TIMEOUT });
		});

		t.test("reports a holding connection as successful without ending it", async () => {
			const { worker, signal, connections } = setup();
			const completion = worker.start();
			await worker.established;

			const snapshot = worker.snapshot();
			t.expect(snapshot).toMatchObject({ success: true, state: "holding", id: 3 });
			t.expect(snapshot.responseTimes.length).toBeGreaterThanOrEqual(1);
			t.expect(connections[0]?.closed).toBe(false);

			signal.set();
			t.expect((await completion).state).toBe("completed");
		});

		t.test("returns the final result once finished", async () => {
			const { worker } = setup({ echoLimit: 0 });
			const result = await worker.start();
			t.expect(worker.snapshot()).toBe(result);
		});
	});
});
