import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { SupervisorError } from "../lib/errors";
import { createFakeSpawner, flushIO } from "../testing/fake-process";
import { createTestLogger } from "../testing/logger";
import { ProcessSupervisor } from "./process-supervisor";
import type { FailureInfo, ProcessSupervisorOptions } from "./process-supervisor";
import type { DecoderCommand } from "./command";
import type { FakeProcessBehaviour } from "../testing/fake-process";

const CMD: DecoderCommand = { command: "rtl_433", args: ["-d", "0", "-f", "433.92M", "-F", "json"] };

function setup(
	behaviour: FakeProcessBehaviour | ((attempt: number) => FakeProcessBehaviour),
	overrides: Partial<ProcessSupervisorOptions> = {}
) {
	const spawner = createFakeSpawner(behaviour);
	const supervisor = new ProcessSupervisor({
		logger: createTestLogger(),
		spawnProcess: spawner.spawn,
		...overrides
	});

	const failures: FailureInfo[] = [];
	const fatal = vi.fn<(err: SupervisorError) => void>();
	supervisor.on("failure", info => failures.push(info));
	supervisor.on("fatal", fatal);

	return { spawner, supervisor, failures, fatal };
}

describe("ProcessSupervisor", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("confirms running after the start grace period", async () => {
		const { supervisor } = setup({ spawnAfterMs: 0 });
		const states: string[] = [];
		supervisor.on("state", s => states.push(s));

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(499);
		expect(supervisor.getState()).toBe("starting");

		await vi.advanceTimersByTimeAsync(1);
		await expect(started).resolves.toBeUndefined();
		expect(supervisor.getState()).toBe("running");
		expect(states).toEqual(["starting", "running"]);
	});

	it("confirms running on the first stdout line and forwards lines", async () => {
		const { supervisor, spawner } = setup({ spawnAfterMs: 0 });
		const lines: string[] = [];
		supervisor.on("line", l => lines.push(l));

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(0);

		spawner.last().writeStdout('{"model":"X","id":1}');
		spawner.last().writeStdout("   ");
		await flushIO(10);

		await expect(started).resolves.toBeUndefined();
		expect(supervisor.getState()).toBe("running");
		expect(lines).toEqual(['{"model":"X","id":1}']);
	});

	it("rejects a second start", async () => {
		const { supervisor } = setup({ spawnAfterMs: 0 });
		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(500);
		await started;

		await expect(supervisor.start(CMD)).rejects.toMatchObject({ code: "INVALID_STATE" });
	});

	it("backs off exponentially and gives up after the ceiling", async () => {
		const spawnTimes: number[] = [];
		const { supervisor, spawner, failures, fatal } = setup(
			() => {
				spawnTimes.push(Date.now());
				return { spawnAfterMs: 0, exitAfterMs: 10, exitCode: 1 };
			},
			{ maxConsecutiveFailures: 4 }
		);

		const rejection = expect(supervisor.start(CMD)).rejects.toMatchObject({ kind: "MaxRetriesExceeded" });

		await vi.advanceTimersByTimeAsync(20_000);
		await rejection;

		expect(spawner.processes).toHaveLength(5);
		expect(failures.map(f => f.kind)).toEqual([
			"UnexpectedExit",
			"UnexpectedExit",
			"UnexpectedExit",
			"UnexpectedExit",
			"UnexpectedExit"
		]);
		expect(failures.map(f => f.retryInMs)).toEqual([1000, 2000, 4000, 8000, undefined]);

		const gaps = spawnTimes.slice(1).map((t, i) => t - (spawnTimes[i] ?? 0));
		expect(gaps).toEqual([1010, 2010, 4010, 8010]);

		expect(fatal).toHaveBeenCalledTimes(1);
		expect(fatal.mock.calls[0]?.[0]).toBeInstanceOf(SupervisorError);
		expect(fatal.mock.calls[0]?.[0].kind).toBe("MaxRetriesExceeded");
		expect(supervisor.getState()).toBe("failed");

		await vi.advanceTimersByTimeAsync(120_000);
		expect(spawner.processes).toHaveLength(5);
		expect(fatal).toHaveBeenCalledTimes(1);
	});

	it("resets the failure count after a healthy run", async () => {
		const { supervisor, failures } = setup(
			attempt => (attempt === 1 ? { spawnAfterMs: 0, exitAfterMs: 1000 } : { spawnAfterMs: 0 }),
			{ healthyResetMs: 5000 }
		);

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(500);
		await started;

		await vi.advanceTimersByTimeAsync(2500);
		expect(failures).toHaveLength(1);
		expect(supervisor.getStatus()).toMatchObject({
			state: "running",
			consecutiveFailures: 1,
			restartCount: 1,
			currentDelayMs: 1000
		});

		await vi.advanceTimersByTimeAsync(5000);
		expect(supervisor.getStatus().consecutiveFailures).toBe(0);
	});

	it("fails fast on a device fault reported on stderr", async () => {
		const { supervisor, spawner, fatal } = setup({ spawnAfterMs: 0 });

		const rejection = expect(supervisor.start(CMD)).rejects.toMatchObject({ kind: "DeviceBusy" });
		await vi.advanceTimersByTimeAsync(0);

		spawner.last().writeStderr("usb_claim_interface error -6");
		await flushIO(10);
		await rejection;

		expect(fatal).toHaveBeenCalledTimes(1);
		expect(spawner.last().signals).toEqual(["SIGTERM"]);
		expect(supervisor.getState()).toBe("failed");
		expect(supervisor.getStatus().lastFailure?.kind).toBe("DeviceBusy");

		await vi.advanceTimersByTimeAsync(120_000);
		expect(spawner.processes).toHaveLength(1);
	});

	it("logs benign stderr without failing", async () => {
		const { supervisor, spawner, failures } = setup({ spawnAfterMs: 0 });
		const stderr: string[] = [];
		supervisor.on("stderr", l => stderr.push(l));

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(0);
		spawner.last().writeStderr("[R82XX] PLL not locked!");
		await flushIO(10);
		await vi.advanceTimersByTimeAsync(500);
		await started;

		expect(stderr).toEqual(["[R82XX] PLL not locked!"]);
		expect(failures).toEqual([]);
		expect(supervisor.getState()).toBe("running");
	});

	it("reports a missing binary without retrying", async () => {
		const { supervisor, spawner, failures } = setup({ spawnError: "ENOENT" });

		const rejection = expect(supervisor.start(CMD)).rejects.toMatchObject({ kind: "ProcessNotInstalled" });
		await vi.advanceTimersByTimeAsync(0);
		await rejection;

		expect(failures.map(f => f.kind)).toEqual(["ProcessNotInstalled"]);
		await vi.advanceTimersByTimeAsync(60_000);
		expect(spawner.processes).toHaveLength(1);
	});

	it("retries when the process never confirms its start", async () => {
		const { supervisor, spawner, failures } = setup(attempt => (attempt === 1 ? {} : { spawnAfterMs: 0 }));

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(5000);

		expect(failures).toHaveLength(1);
		expect(failures[0]).toMatchObject({ kind: "StartTimeout", consecutiveFailures: 1, retryInMs: 1000 });
		expect(spawner.processes[0]?.signals).toEqual(["SIGTERM"]);

		await vi.advanceTimersByTimeAsync(1500);
		await started;
		expect(spawner.processes).toHaveLength(2);
		expect(supervisor.getState()).toBe("running");
	});

	it("restarts a decoder that stops producing output", async () => {
		const { supervisor, failures } = setup({ spawnAfterMs: 0 }, { stallTimeoutMs: 2000 });

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(500);
		await started;

		await vi.advanceTimersByTimeAsync(1999);
		expect(failures).toEqual([]);

		await vi.advanceTimersByTimeAsync(1);
		expect(failures.map(f => f.kind)).toEqual(["Stalled"]);
	});

	it("escalates to SIGKILL when SIGTERM is ignored", async () => {
		const { supervisor, spawner } = setup({ spawnAfterMs: 0, ignoreSigterm: true });

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(500);
		await started;

		const stopped = supervisor.stop();
		expect(supervisor.getState()).toBe("stopping");
		expect(spawner.last().signals).toEqual(["SIGTERM"]);

		await vi.advanceTimersByTimeAsync(4999);
		expect(spawner.last().signals).toEqual(["SIGTERM"]);

		await vi.advanceTimersByTimeAsync(1);
		await stopped;
		expect(spawner.last().signals).toEqual(["SIGTERM", "SIGKILL"]);
		expect(supervisor.getState()).toBe("stopped");
	});

	it("stops idempotently", async () => {
		const { supervisor, spawner } = setup({ spawnAfterMs: 0 });

		const started = supervisor.start(CMD);
		await vi.advanceTimersByTimeAsync(500);
		await started;

		const first = supervisor.stop();
		expect(supervisor.stop()).toBe(first);
		await first;
		await supervisor.stop();

		expect(spawner.last().signals).toEqual(["SIGTERM"]);
		expect(supervisor.getState()).toBe("stopped");

		await vi.advanceTimersByTimeAsync(120_000);
		expect(spawner.processes).toHaveLength(1);
	});

	it("cancels a pending retry on stop", async () => {
		const { supervisor, spawner, failures } = setup({ spawnAfterMs: 0, exitAfterMs: 10 });

		const rejection = expect(supervisor.start(CMD)).rejects.toMatchObject({ code: "INVALID_STATE" });
		await vi.advanceTimersByTimeAsync(10);
		expect(failures).toHaveLength(1);

		await supervisor.stop();
		await rejection;

		await vi.advanceTimersByTimeAsync(60_000);
		expect(spawner.processes).toHaveLength(1);
		expect(supervisor.getState()).toBe("stopped");
	});
});
