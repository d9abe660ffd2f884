import EventEmitter from "eventemitter3";
import * as t from "vitest";
import { ConnectionError, ErrorCode } from "../domain/errors.js";
import type { BatchStartedEvent, RampEvents } from "../domain/events.js";
import { createFakeFactory } from "../testing/fake-echo-connection.js";
import { createTestConfig } from "../testing/fixtures.js";
import { createBatchCoordinator, CumulativeBatchCoordinator, IndependentBatchCoordinator } from "./batch-coordinator.js";

t.describe("createBatchCoordinator", () => {
	t.test("selects the coordinator for the configured mode", () => {
		t.expect(createBatchCoordinator({ config: createTestConfig() })).toBeInstanceOf(IndependentBatchCoordinator);
		t.expect(createBatchCoordinator({ config: createTestConfig({ cumulative: true }) })).toBeInstanceOf(CumulativeBatchCoordinator);
	});
});

t.describe("IndependentBatchCoordinator", () => {
	t.test("opens, holds and closes every connection of a batch", async () => {
		const { connect, connections } = createFakeFactory();
		const coordinator = new IndependentBatchCoordinator({ config: createTestConfig(), connect });

		const result = await coordinator.runBatch(1, 3);

		t.expect(result).toMatchObject({
			batch: 1,
			mode: "independent",
			connections: 3,
			totalConnections: 3,
			successful: 3,
			failed: 0,
			successRate: 100,
		});
		t.expect(result.results.map((r) => r.id)).toEqual([1, 2, 3]);
		t.expect(result.results.every((r) => r.state === "completed")).toBe(true);
		t.expect(result.latency.max).toBeGreaterThanOrEqual(result.latency.min);
		t.expect(connections.every((c) => c.closed)).toBe(true);
		t.expect(coordinator.openConnections).toBe(0);
		t.expect(await coordinator.release()).toEqual([]);
	});

	t.test("counts failed connections against the success rate", async () => {
		const { connect } = createFakeFactory((call) => (call === 1 ? new ConnectionError(ErrorCode.CONNECT_FAILED, "connect ECONNREFUSED") : {}));
		const coordinator = new IndependentBatchCoordinator({ config: createTestConfig(), connect });

		const result = await coordinator.runBatch(1, 3);

		t.expect(result.successful).toBe(2);
		t.expect(result.failed).toBe(1);
		t.expect(result.successRate).toBeCloseTo(66.67, 2);
		t.expect(result.results[1]).toMatchObject({ id: 2, success: false, errorCode: ErrorCode.CONNECT_FAILED });
	});

	t.test("numbers connections from 1 in every batch", async () => {
		const { connect } = createFakeFactory();
		const coordinator = new IndependentBatchCoordinator({ config: createTestConfig(), connect });

		await coordinator.runBatch(1, 2);
		const second = await coordinator.runBatch(2, 3);

		t.expect(second.results.map((r) => r.id)).toEqual([1, 2, 3]);
		t.expect(second.results.every((r) => r.batch === 2)).toBe(true);
	});

	t.test("paces launches and starts the hold once all are launched", async () => {
		const { connect, calls } = createFakeFactory();
		const events = new EventEmitter<RampEvents>();
		const coordinator = new IndependentBatchCoordinator({ config: createTestConfig({ connectionDelaySec: 0.03 }), connect, events });

		const started: BatchStartedEvent[] = [];
		let launchedAtHold = -1;
		events.on("batch_started", (event) => started.push(event));
		events.on("hold_started", ({ launched }) => {
			launchedAtHold = launched;
		});

		await coordinator.runBatch(1, 3);

		t.expect(started).toEqual([{ batch: 1, mode: "independent", connections: 3, totalConnections: 3 }]);
		t.expect(launchedAtHold).toBe(3);
		t.expect(calls).toHaveLength(3);
		t.expect((calls[2] ?? 0) - (calls[0] ?? 0)).toBeGreaterThanOrEqual(55);
	});
});

t.describe("CumulativeBatchCoordinator", () => {
	t.test("adds connections on top of the ones still held", async () => {
		const { connect, connections } = createFakeFactory();
		const events = new EventEmitter<RampEvents>();
		const coordinator = new CumulativeBatchCoordinator({ config: createTestConfig({ cumulative: true }), connect, events });
		const started: BatchStartedEvent[] = [];
		events.on("batch_started", (event) => started.push(event));

		const first = await coordinator.runBatch(1, 2);
		const second = await coordinator.runBatch(2, 3);

		t.expect(first).toMatchObject({ mode: "cumulative", connections: 2, totalConnections: 2, successRate: 100 });
		t.expect(second).toMatchObject({ mode: "cumulative", connections: 1, totalConnections: 3, successRate: 100 });
		t.expect(second.results.map((r) => [r.id, r.state])).toEqual([[3, "holding"]]);
		t.expect(started.map((e) => [e.connections, e.totalConnections])).toEqual([
			[2, 2],
			[1, 3],
		]);

		// Nothing is closed between batches
		t.expect(coordinator.totalConnections).toBe(3);
		t.expect(coordinator.openConnections).toBe(3);
		t.expect(coordinator.liveSignals.map(({ batch, signal }) => [batch, signal.isSet])).toEqual([
			[1, false],
			[2, false],
		]);
		t.expect(connections.some((c) => c.closed)).toBe(false);

		const released = await coordinator.release();

		t.expect(released.map((r) => r.id)).toEqual([1, 2, 3]);
		t.expect(released.every((r) => r.state === "completed")).toBe(true);
		t.expect(connections.every((c) => c.closed)).toBe(true);
		t.expect(coordinator.liveSignals).toHaveLength(0);
		t.expect(coordinator.openConnections).toBe(0);
	});

	t.test("reports a new connection that fails its handshake", async () => {
		const { connect } = createFakeFactory((call) => (call === 2 ? { echoLimit: 0 } : {}));
		const coordinator = new CumulativeBatchCoordinator({ config: createTestConfig({ cumulative: true }), connect });

		await coordinator.runBatch(1, 2);
		const second = await coordinator.runBatch(2, 3);

		t.expect(second.successRate).toBe(0);
		t.expect(second.results[0]).toMatchObject({ id: 3, state: "timed_out", errorCode: ErrorCode.HANDSHAKE_TIMEOUT });
		t.expect(coordinator.openConnections).toBe(2);

		await coordinator.release();
	});

	t.test("rejects a target that adds no connections", async () => {
		const { connect } = createFakeFactory();
		const coordinator = new CumulativeBatchCoordinator({ config: createTestConfig({ cumulative: true }), connect });

		await coordinator.runBatch(1, 2);
		await t.expect(coordinator.runBatch(2, 2)).rejects.toThrow(new RangeError("Batch 2 targets 2 connections but 2 are already open"));

		await coordinator.release();
	});
});
