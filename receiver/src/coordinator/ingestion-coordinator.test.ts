import { afterEach, describe, it, expect, vi } from "vitest";
import type { ChangeEvent } from "@rtl433-bridge/common";

import { createFakeSpawner, flushIO } from "../testing/fake-process";
import type { FakeProcessBehaviour } from "../testing/fake-process";
import { createTestLogger } from "../testing/logger";
import { IngestionCoordinator } from "./ingestion-coordinator";
import type { IngestionCoordinatorOptions } from "./ingestion-coordinator";

const POOR_SIGNAL = "Device %s: poor signal for several consecutive readings (rssi=%s snr=%s noise=%s)";

function setup(overrides: Partial<IngestionCoordinatorOptions> = {}, behaviour: FakeProcessBehaviour = { spawnAfterMs: 0 }) {
	const logger = createTestLogger();
	const spawner = createFakeSpawner(behaviour);
	const coordinator = new IngestionCoordinator({
		logger,
		spawnProcess: spawner.spawn,
		...overrides
	});
	return { logger, spawner, coordinator };
}

function line(record: Record<string, unknown>): string {
	return JSON.stringify(record);
}

describe("IngestionCoordinator ingestion", () => {
	it("counts every good and malformed line under load", () => {
		let now = 0;
		const { logger, coordinator } = setup({ now: () => now });
		const warn = vi.spyOn(logger, "warn");

		let good = 0;
		for (let i = 0; i < 11_000; i++) {
			if (i % 11 === 10) {
				coordinator.ingestLine(`garbage ${i}`);
			} else {
				coordinator.ingestLine(line({ model: "Stress", id: good % 50, temperature_C: (good % 300) / 10 }));
				good++;
			}
		}

		const { counters, devices } = coordinator.getStatus();
		expect(counters.linesReceived).toBe(11_000);
		expect(counters.readingsAccepted).toBe(10_000);
		expect(counters.rejections).toEqual({ MalformedJson: 1000, MissingIdentity: 0 });
		expect(devices).toBe(50);

		expect(warn.mock.calls).toEqual([["Rejected decoder line (%s): %s", "MalformedJson", "not valid JSON: garbage 10"]]);

		now = 60_000;
		coordinator.runSweep();
		expect(warn).toHaveBeenCalledTimes(2);
		expect(warn).toHaveBeenLastCalledWith(
			"Rejected %d more decoder line(s) (%s) in the last %d s; last: %s",
			999,
			"MalformedJson",
			60,
			"not valid JSON: garbage 10999"
		);
	});

	it("counts records without identity and stats reports apart", () => {
		const { coordinator } = setup();
		coordinator.ingestLine('{"temperature_C": 19.4}');
		coordinator.ingestLine('{"time":"2026-01-23T12:00:00","frames":{"count":3}}');

		const { counters } = coordinator.getStatus();
		expect(counters.rejections.MissingIdentity).toBe(1);
		expect(counters.decoderReports).toBe(1);
		expect(counters.readingsAccepted).toBe(0);
	});

	it("publishes change events to the emitter and every subscriber", async () => {
		const { coordinator } = setup();
		const emitted: ChangeEvent[] = [];
		coordinator.on("change", e => emitted.push(e));

		const a = coordinator.subscribe();
		const b = coordinator.subscribe();
		const nextA = a.next();
		const nextB = b.next();

		const event = coordinator.ingestLine(line({ model: "X", id: 1, temperature_C: 19.4 }));

		expect(event?.kind).toBe("created");
		expect(emitted).toHaveLength(1);
		await expect(nextA).resolves.toMatchObject({ done: false, value: { identity: "X_1", kind: "created" } });
		await expect(nextB).resolves.toMatchObject({ done: false, value: { identity: "X_1" } });

		expect(coordinator.device("X_1")?.measurements).toEqual({ temperature_C: 19.4 });
		expect(coordinator.device("X_1")?.available).toBe(true);
	});

	it("keeps delivering to other subscribers after one detaches", async () => {
		const { coordinator } = setup();
		const a = coordinator.subscribe();
		const b = coordinator.subscribe();

		await a.return();
		expect(coordinator.getStatus().subscribers).toBe(1);

		coordinator.ingestLine(line({ model: "X", id: 1, humidity: 40 }));
		await expect(b.next()).resolves.toMatchObject({ value: { identity: "X_1" } });
		await expect(a.next()).resolves.toEqual({ value: undefined, done: true });
	});

	it("counts events dropped for a slow subscriber", () => {
		const { coordinator } = setup({ maxBuffered: 2 });
		coordinator.subscribe();

		for (let i = 0; i < 5; i++) {
			coordinator.ingestLine(line({ model: "X", id: 1, temperature_C: i }));
		}

		expect(coordinator.getStatus().counters.droppedEvents).toBe(3);
	});

	it("survives a throwing change listener", () => {
		const { logger, coordinator } = setup();
		const error = vi.spyOn(logger, "error");
		coordinator.on("change", () => {
			throw new Error("listener broke");
		});

		expect(() => coordinator.ingestLine(line({ model: "X", id: 1, temperature_C: 1 }))).not.toThrow();
		expect(error).toHaveBeenCalledWith("Change listener failed for %s: %s", "X_1", "listener broke");
		expect(coordinator.getStatus().counters.readingsAccepted).toBe(1);
	});

	it("warns once per stretch of poor signal", () => {
		const { logger, coordinator } = setup();
		const warn = vi.spyOn(logger, "warn");
		const poorWarnings = () => warn.mock.calls.filter(c => String(c[0]) === POOR_SIGNAL);

		for (let i = 0; i < 6; i++) {
			coordinator.ingestLine(line({ model: "Weak", id: 3, temperature_C: 5, rssi: -45 }));
		}
		expect(poorWarnings()).toEqual([[POOR_SIGNAL, "Weak_3", "-45", "-", "-"]]);

		coordinator.ingestLine(line({ model: "Weak", id: 3, temperature_C: 5, rssi: -5 }));
		for (let i = 0; i < 5; i++) {
			coordinator.ingestLine(line({ model: "Weak", id: 3, temperature_C: 5, rssi: -45 }));
		}
		expect(poorWarnings()).toHaveLength(2);
	});
});

describe("IngestionCoordinator lifecycle", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("rejects invalid settings before spawning anything", async () => {
		const { coordinator, spawner } = setup();
		await expect(coordinator.start({ gain: 99 })).rejects.toMatchObject({ code: "CONFIG_ERROR" });
		expect(spawner.processes).toHaveLength(0);
		expect(coordinator.isRunning).toBe(false);
	});

	it("runs decoder output through the registry", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup({ binary: "/opt/rtl_433" });

		const started = coordinator.start({ frequency: "868M", protocolFilter: [40] });
		await vi.advanceTimersByTimeAsync(500);
		await started;

		const proc = spawner.last();
		expect(proc.command).toBe("/opt/rtl_433");
		expect(proc.args).toContain("868M");
		expect(proc.args.slice(-2)).toEqual(["-R", "40"]);

		proc.writeStdout(line({ model: "Acurite-Tower", id: 7, protocol: 40, temperature_C: 21.5 }));
		proc.writeStdout(line({ model: "Other", id: 1, protocol: 41, temperature_C: 3 }));
		proc.writeStdout(line({ model: "NoProto", id: 2, temperature_C: 4 }));
		await flushIO(10);

		expect(coordinator.devices().map(d => d.identity)).toEqual(["Acurite-Tower_7", "NoProto_2"]);
		expect(coordinator.getStatus().counters).toMatchObject({ linesReceived: 3, readingsAccepted: 2, filtered: 1 });

		await coordinator.stop();
		expect(coordinator.getStatus().running).toBe(false);
		expect(proc.signals).toEqual(["SIGTERM"]);
	});

	it("marks silent devices unavailable on the sweep timer", async () => {
		vi.useFakeTimers();
		const { coordinator } = setup({ sweepIntervalMs: 1000 });
		const kinds: string[] = [];
		coordinator.on("change", e => kinds.push(e.kind));

		const started = coordinator.start({ deviceTimeoutSec: 60 });
		await vi.advanceTimersByTimeAsync(500);
		await started;

		coordinator.ingestLine(line({ model: "X", id: 1, temperature_C: 1 }));

		await vi.advanceTimersByTimeAsync(60_000);
		expect(coordinator.device("X_1")?.available).toBe(true);

		await vi.advanceTimersByTimeAsync(1000);
		expect(coordinator.device("X_1")?.available).toBe(false);
		expect(kinds).toEqual(["created", "unavailable"]);

		await vi.advanceTimersByTimeAsync(10_000);
		expect(kinds).toEqual(["created", "unavailable"]);

		await coordinator.stop();
	});

	it("restarts the decoder only when its command line changes", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup();

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(500);
		await started;
		coordinator.ingestLine(line({ model: "X", id: 1, temperature_C: 1 }));

		await expect(coordinator.reconfigure({ deviceTimeoutSec: 120 })).resolves.toBe(false);
		expect(spawner.processes).toHaveLength(1);
		expect(coordinator.getStatus().settings?.deviceTimeoutSec).toBe(120);

		const restarted = coordinator.reconfigure({ deviceTimeoutSec: 120, frequency: "915M" });
		await vi.advanceTimersByTimeAsync(500);
		await expect(restarted).resolves.toBe(true);

		expect(spawner.processes).toHaveLength(2);
		expect(spawner.processes[0]?.signals).toEqual(["SIGTERM"]);
		expect(spawner.last().args).toContain("915M");
		expect(coordinator.device("X_1")?.measurements).toEqual({ temperature_C: 1 });
		expect(coordinator.getStatus().supervisor.state).toBe("running");

		await coordinator.stop();
	});

	it("rejects invalid settings on reconfigure and keeps running", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup();

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(500);
		await started;

		await expect(coordinator.reconfigure({ frequency: "fast" })).rejects.toMatchObject({ code: "CONFIG_ERROR" });
		expect(spawner.processes).toHaveLength(1);
		expect(coordinator.isRunning).toBe(true);

		await coordinator.stop();
	});

	it("ends subscriptions normally on stop", async () => {
		vi.useFakeTimers();
		const { coordinator } = setup();

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(500);
		await started;

		const sub = coordinator.subscribe();
		const pending = sub.next();
		await coordinator.stop();

		await expect(pending).resolves.toEqual({ value: undefined, done: true });
		expect(coordinator.getStatus().subscribers).toBe(0);
	});

	it("ends subscriptions with the error on a fatal decoder failure", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup();
		const fatal = vi.fn();
		coordinator.on("fatal", fatal);

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(500);
		await started;

		const sub = coordinator.subscribe();
		const ended = expect(sub.next()).rejects.toMatchObject({ kind: "DeviceNotFound" });

		spawner.last().writeStderr("No supported devices found.");
		await flushIO(10);
		await ended;

		expect(fatal).toHaveBeenCalledTimes(1);
		expect(coordinator.isRunning).toBe(false);
	});

	it("applies a reconfigure only after a pending start settles", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup();

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(100);
		const reconfigured = coordinator.reconfigure({ frequency: "915M" });

		await vi.advanceTimersByTimeAsync(900);
		await started;
		await expect(reconfigured).resolves.toBe(true);

		expect(spawner.processes).toHaveLength(2);
		expect(spawner.processes[0]?.signals).toEqual(["SIGTERM"]);
		expect(spawner.last().args).toContain("915M");
		expect(coordinator.getStatus().settings?.frequency).toBe("915M");

		await coordinator.stop();
		expect(spawner.processes.every(p => p.exited)).toBe(true);
	});

	it("leaves no decoder behind when stopped during a start with a reconfigure queued", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup();

		const startResult = expect(coordinator.start({})).rejects.toMatchObject({ code: "INVALID_STATE" });
		await vi.advanceTimersByTimeAsync(100);
		const reconfigured = coordinator.reconfigure({ frequency: "915M" });

		await coordinator.stop();
		await startResult;
		await expect(reconfigured).resolves.toBe(false);

		expect(spawner.processes).toHaveLength(1);
		expect(spawner.processes[0]?.exited).toBe(true);
		expect(coordinator.isRunning).toBe(false);
		expect(coordinator.getStatus().supervisor.state).toBe("stopped");

		await vi.advanceTimersByTimeAsync(60_000);
		expect(spawner.processes).toHaveLength(1);
	});

	it("runs back-to-back reconfigures in order", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup();

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(500);
		await started;

		const first = coordinator.reconfigure({ frequency: "915M" });
		const second = coordinator.reconfigure({ frequency: "868M" });
		await vi.advanceTimersByTimeAsync(1000);

		await expect(first).resolves.toBe(true);
		await expect(second).resolves.toBe(true);

		expect(spawner.processes).toHaveLength(3);
		expect(spawner.processes[1]?.args).toContain("915M");
		expect(spawner.last().args).toContain("868M");
		expect(coordinator.getStatus().settings?.frequency).toBe("868M");
		expect(coordinator.getStatus().supervisor.state).toBe("running");

		await coordinator.stop();
	});

	it("hands out closed subscriptions after stop", async () => {
		vi.useFakeTimers();
		const { coordinator } = setup();

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(500);
		await started;
		await coordinator.stop();

		const late = coordinator.subscribe();
		await expect(late.next()).resolves.toEqual({ value: undefined, done: true });
		expect(coordinator.getStatus().subscribers).toBe(0);
	});

	it("hands out failed subscriptions after a fatal decoder failure", async () => {
		vi.useFakeTimers();
		const { coordinator, spawner } = setup();

		const started = coordinator.start({});
		await vi.advanceTimersByTimeAsync(500);
		await started;

		spawner.last().writeStderr("No supported devices found.");
		await flushIO(10);
		expect(coordinator.isRunning).toBe(false);

		const late = coordinator.subscribe();
		await expect(late.next()).rejects.toMatchObject({ kind: "DeviceNotFound" });
		await expect(late.next()).resolves.toEqual({ value: undefined, done: true });
	});
});
