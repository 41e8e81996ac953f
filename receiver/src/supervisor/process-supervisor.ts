import { EventEmitter } from "node:events";
import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Interface as LineReader } from "node:readline";
import type { Readable } from "node:stream";
import type winston from "winston";
import type { FailureKind, SupervisorState } from "@rtl433-bridge/common";

import { DEFAULT_SUPERVISOR_SETTINGS } from "../lib/config";
import type { SupervisorSettings } from "../lib/config";
import { SupervisorError, describeFailure, errorMessage, invalidState, isLifecycleFailure } from "../lib/errors";
import { retryDelayMs } from "./backoff";
import type { BackoffPolicy } from "./backoff";
import { formatCommand } from "./command";
import type { DecoderCommand } from "./command";
import { classifyStderrLine } from "./stderr-policy";

/** The part of a ChildProcess the supervisor relies on. */
export interface DecoderProcess extends EventEmitter {
	readonly pid?: number | undefined;
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnDecoder = (command: string, args: readonly string[]) => DecoderProcess;

export const spawnDecoder: SpawnDecoder = (command, args) =>
	spawn(command, [...args], {
		stdio: ["ignore", "pipe", "pipe"],
		// Keep decoder output in a stable, untranslated format.
		env: { ...process.env, LANG: "C" }
	});

export interface ProcessSupervisorOptions extends Partial<SupervisorSettings> {
	logger: winston.Logger;
	spawnProcess?: SpawnDecoder;
	now?: () => number;
}

export interface FailureInfo {
	kind: FailureKind;
	message: string;
	at: number;
	consecutiveFailures: number;
	retryInMs?: number;
}

export interface SupervisorStatus {
	state: SupervisorState;
	pid?: number;
	command?: string;
	consecutiveFailures: number;
	restartCount: number;
	currentDelayMs: number;
	lastFailure?: FailureInfo;
}

interface RunFailure {
	kind: FailureKind;
	message: string;
}

interface ActiveRun {
	id: number;
	child: DecoderProcess;
	readers: LineReader[];

	spawned: boolean;
	confirmed: boolean;
	exited: boolean;
	terminating: boolean;

	pendingFailure?: RunFailure;
	failureHandled: boolean;

	exit: Promise<void>;
	resolveExit: () => void;

	startTimer?: NodeJS.Timeout;
	graceTimer?: NodeJS.Timeout;
	stallTimer?: NodeJS.Timeout;
	healthyTimer?: NodeJS.Timeout;
	killTimer?: NodeJS.Timeout;
}

interface StartWaiter {
	resolve: () => void;
	reject: (err: Error) => void;
}

export interface ProcessSupervisor {
	on(event: "state", listener: (state: SupervisorState, previous: SupervisorState) => void): this;
	on(event: "line", listener: (line: string) => void): this;
	on(event: "stderr", listener: (line: string) => void): this;
	on(event: "failure", listener: (info: FailureInfo) => void): this;
	on(event: "fatal", listener: (err: SupervisorError) => void): this;
}

/**
 * Owns the decoder process: Stopped -> Starting -> Running -> (Failed | Stopping) -> Stopped.
 *
 * At most one child is alive at any time; a retry is only scheduled once the
 * previous child has exited.
 */
export class ProcessSupervisor extends EventEmitter {
	private readonly logger: winston.Logger;
	private readonly spawnProcess: SpawnDecoder;
	private readonly now: () => number;
	private readonly settings: SupervisorSettings;
	private readonly policy: BackoffPolicy;

	private state: SupervisorState = "stopped";
	private command?: DecoderCommand;
	private run?: ActiveRun;
	private runSeq = 0;

	private consecutiveFailures = 0;
	private restartCount = 0;
	private currentDelayMs = 0;
	private lastFailure?: FailureInfo;
	private fatalRaised = false;

	private retryTimer?: NodeJS.Timeout;
	private startWaiter?: StartWaiter;
	private stopping?: Promise<void>;

	constructor(opts: ProcessSupervisorOptions) {
		super();
		const { logger, spawnProcess, now, ...overrides } = opts;
		this.logger = logger;
		this.spawnProcess = spawnProcess ?? spawnDecoder;
		this.now = now ?? Date.now;
		this.settings = { ...DEFAULT_SUPERVISOR_SETTINGS, ...overrides };
		this.policy = {
			baseDelayMs: this.settings.baseDelayMs,
			maxDelayMs: this.settings.maxDelayMs,
			maxConsecutiveFailures: this.settings.maxConsecutiveFailures
		};
		this.currentDelayMs = this.settings.baseDelayMs;
	}

	getState(): SupervisorState {
		return this.state;
	}

	getStatus(): SupervisorStatus {
		return {
			state: this.state,
			pid: this.run?.child.pid,
			command: this.command ? formatCommand(this.command) : undefined,
			consecutiveFailures: this.consecutiveFailures,
			restartCount: this.restartCount,
			currentDelayMs: this.currentDelayMs,
			lastFailure: this.lastFailure ? { ...this.lastFailure } : undefined
		};
	}

	/**
	 * Launch the decoder. Resolves once it is confirmed running (first stdout line or
	 * the start grace period). Rejects with a SupervisorError when a failure that is
	 * not retried happens first.
	 */
	async start(command: DecoderCommand): Promise<void> {
		if (this.state !== "stopped") {
			throw invalidState(`Cannot start decoder while ${this.state}`);
		}

		this.command = { command: command.command, args: [...command.args] };
		this.consecutiveFailures = 0;
		this.restartCount = 0;
		this.currentDelayMs = this.settings.baseDelayMs;
		this.lastFailure = undefined;
		this.fatalRaised = false;

		const started = new Promise<void>((resolve, reject) => {
			this.startWaiter = { resolve, reject };
		});

		this.launch();
		return started;
	}

	/** Idempotent; concurrent callers share one shutdown. */
	stop(): Promise<void> {
		if (this.stopping) return this.stopping;
		if (this.state === "stopped") return Promise.resolve();

		this.stopping = this.shutdown().finally(() => {
			this.stopping = undefined;
		});
		return this.stopping;
	}

	private async shutdown(): Promise<void> {
		this.setState("stopping");

		if (this.retryTimer) {
			clearTimeout(this.retryTimer);
			this.retryTimer = undefined;
		}

		if (this.startWaiter) {
			const waiter = this.startWaiter;
			this.startWaiter = undefined;
			waiter.reject(invalidState("Decoder stopped before it was confirmed running"));
		}

		const run = this.run;
		if (run && !run.exited) {
			this.clearRunTimers(run);
			this.terminate(run);
			await run.exit;
		}

		this.run = undefined;
		this.setState("stopped");
	}

	private launch(): void {
		const command = this.command;
		if (!command) return;

		this.setState("starting");
		this.logger.info("Starting decoder: %s", formatCommand(command));

		let child: DecoderProcess;
		try {
			child = this.spawnProcess(command.command, command.args);
		} catch (err) {
			this.handleFailure(spawnFailureKind(err), errorMessage(err));
			return;
		}

		let resolveExit: () => void = () => undefined;
		const exit = new Promise<void>(resolve => {
			resolveExit = resolve;
		});

		const run: ActiveRun = {
			id: ++this.runSeq,
			child,
			readers: [],
			spawned: false,
			confirmed: false,
			exited: false,
			terminating: false,
			failureHandled: false,
			exit,
			resolveExit
		};
		this.run = run;

		child.once("spawn", () => this.onSpawn(run));
		child.on("error", (err: Error) => this.onError(run, err));
		child.once("close", (code: number | null, signal: NodeJS.Signals | null) => this.onClose(run, code, signal));

		if (child.stdout) {
			const rl = createInterface({ input: child.stdout, crlfDelay: Infinity });
			rl.on("line", line => this.onStdoutLine(run, line));
			run.readers.push(rl);
		}
		if (child.stderr) {
			const rl = createInterface({ input: child.stderr, crlfDelay: Infinity });
			rl.on("line", line => this.onStderrLine(run, line));
			run.readers.push(rl);
		}

		run.startTimer = setTimeout(() => {
			run.startTimer = undefined;
			if (!run.spawned) {
				this.failRun(run, "StartTimeout", `no spawn confirmation within ${this.settings.startTimeoutMs} ms`);
			}
		}, this.settings.startTimeoutMs);
	}

	private onSpawn(run: ActiveRun): void {
		if (run.exited || run !== this.run) return;
		run.spawned = true;
		if (run.startTimer) {
			clearTimeout(run.startTimer);
			run.startTimer = undefined;
		}
		this.logger.info("Decoder process spawned (pid=%s, run=%d)", String(run.child.pid ?? "?"), run.id);

		run.graceTimer = setTimeout(() => {
			run.graceTimer = undefined;
			this.confirmRunning(run);
		}, this.settings.startGraceMs);
	}

	private confirmRunning(run: ActiveRun): void {
		if (run.confirmed || run.exited || run.pendingFailure || this.state !== "starting") return;
		run.confirmed = true;

		if (run.graceTimer) {
			clearTimeout(run.graceTimer);
			run.graceTimer = undefined;
		}

		this.setState("running");

		if (this.startWaiter) {
			const waiter = this.startWaiter;
			this.startWaiter = undefined;
			waiter.resolve();
		}

		run.healthyTimer = setTimeout(() => {
			run.healthyTimer = undefined;
			if (this.run !== run || this.state !== "running") return;
			if (this.consecutiveFailures > 0) {
				this.logger.info(
					"Decoder healthy for %d ms; resetting failure count (was %d)",
					this.settings.healthyResetMs,
					this.consecutiveFailures
				);
			}
			this.consecutiveFailures = 0;
			this.currentDelayMs = this.settings.baseDelayMs;
		}, this.settings.healthyResetMs);

		this.armStallWatchdog(run);
	}

	private armStallWatchdog(run: ActiveRun): void {
		if (this.settings.stallTimeoutMs <= 0) return;
		if (run.stallTimer) clearTimeout(run.stallTimer);
		run.stallTimer = setTimeout(() => {
			run.stallTimer = undefined;
			this.failRun(run, "Stalled", `no output for ${this.settings.stallTimeoutMs} ms`);
		}, this.settings.stallTimeoutMs);
	}

	private onStdoutLine(run: ActiveRun, line: string): void {
		if (run !== this.run) return;

		if (!run.confirmed && run.spawned) {
			this.confirmRunning(run);
		} else if (run.confirmed && !run.exited) {
			this.armStallWatchdog(run);
		}

		const trimmed = line.trim();
		if (trimmed) this.emit("line", trimmed);
	}

	private onStderrLine(run: ActiveRun, line: string): void {
		const trimmed = line.trim();
		if (!trimmed) return;
		this.emit("stderr", trimmed);

		const cls = classifyStderrLine(trimmed);
		switch (cls.kind) {
			case "benign":
				this.logger.debug("rtl_433 (%s): %s", cls.label, trimmed);
				return;
			case "fault":
				this.logger.error("rtl_433 fault (%s): %s", cls.label, trimmed);
				this.failRun(run, cls.failure, trimmed);
				return;
			case "other":
				this.logger.debug("rtl_433: %s", trimmed);
				return;
		}
	}

	private onError(run: ActiveRun, err: Error): void {
		if (run.exited) return;

		if (!run.spawned) {
			// The process never came up (binary missing, not executable, ...).
			this.finishRun(run, { kind: spawnFailureKind(err), message: err.message });
			return;
		}

		this.logger.warn("Decoder process error (run=%d): %s", run.id, err.message);
	}

	private onClose(run: ActiveRun, code: number | null, signal: NodeJS.Signals | null): void {
		const how = signal ? `signal ${signal}` : `code ${String(code)}`;
		this.logger.info("Decoder process exited (%s, run=%d)", how, run.id);
		this.finishRun(run, run.pendingFailure ?? { kind: "UnexpectedExit", message: `exited with ${how}` });
	}

	/** Decide a run has failed while its process may still be alive. */
	private failRun(run: ActiveRun, kind: FailureKind, message: string): void {
		if (run.exited || run.pendingFailure || this.state === "stopping" || run !== this.run) return;

		run.pendingFailure = { kind, message };
		this.clearRunTimers(run);
		this.setState("failed");

		if (isLifecycleFailure(kind)) {
			// Surface right away; there is nothing to wait for before giving up.
			run.failureHandled = true;
			this.handleFailure(kind, message);
		}

		this.terminate(run);
	}

	private finishRun(run: ActiveRun, failure: RunFailure): void {
		if (run.exited) return;
		run.exited = true;

		this.clearRunTimers(run);
		if (run.killTimer) {
			clearTimeout(run.killTimer);
			run.killTimer = undefined;
		}
		for (const rl of run.readers) rl.close();
		run.resolveExit();

		if (this.run === run) this.run = undefined;

		if (this.state === "stopping" || run.failureHandled) return;
		run.failureHandled = true;
		this.handleFailure(failure.kind, failure.message);
	}

	private handleFailure(kind: FailureKind, message: string): void {
		const at = this.now();

		if (isLifecycleFailure(kind)) {
			this.lastFailure = { kind, message, at, consecutiveFailures: this.consecutiveFailures };
			this.setState("failed");
			this.emit("failure", { ...this.lastFailure });
			this.raiseFatal(new SupervisorError(kind, message));
			return;
		}

		this.consecutiveFailures += 1;
		const delay = retryDelayMs(this.policy, this.consecutiveFailures);
		this.lastFailure = {
			kind,
			message,
			at,
			consecutiveFailures: this.consecutiveFailures,
			retryInMs: delay
		};
		this.setState("failed");
		this.emit("failure", { ...this.lastFailure });

		if (delay === undefined) {
			this.raiseFatal(
				new SupervisorError(
					"MaxRetriesExceeded",
					`${this.consecutiveFailures} consecutive failures, last: ${describeFailure(kind)} (${message})`
				)
			);
			return;
		}

		this.currentDelayMs = delay;
		this.logger.warn(
			"%s (%s); retry %d/%d in %d ms",
			describeFailure(kind),
			message,
			this.consecutiveFailures,
			this.policy.maxConsecutiveFailures,
			delay
		);

		this.retryTimer = setTimeout(() => {
			this.retryTimer = undefined;
			if (this.state !== "failed") return;
			this.restartCount += 1;
			this.launch();
		}, delay);
	}

	private raiseFatal(err: SupervisorError): void {
		if (this.fatalRaised) return;
		this.fatalRaised = true;

		this.logger.error("Decoder supervision stopped: %s", err.message);

		if (this.startWaiter) {
			const waiter = this.startWaiter;
			this.startWaiter = undefined;
			waiter.reject(err);
		}
		this.emit("fatal", err);
	}

	private terminate(run: ActiveRun): void {
		if (run.exited || run.terminating) return;
		run.terminating = true;

		run.child.kill("SIGTERM");
		if (run.exited) return;

		run.killTimer = setTimeout(() => {
			run.killTimer = undefined;
			if (run.exited) return;
			this.logger.warn(
				"Decoder did not exit within %d ms of SIGTERM; sending SIGKILL",
				this.settings.stopTimeoutMs
			);
			run.child.kill("SIGKILL");
		}, this.settings.stopTimeoutMs);
	}

	private clearRunTimers(run: ActiveRun): void {
		for (const t of [run.startTimer, run.graceTimer, run.stallTimer, run.healthyTimer]) {
			if (t) clearTimeout(t);
		}
		run.startTimer = undefined;
		run.graceTimer = undefined;
		run.stallTimer = undefined;
		run.healthyTimer = undefined;
	}

	private setState(next: SupervisorState): void {
		if (this.state === next) return;
		const previous = this.state;
		this.state = next;
		this.logger.debug("Supervisor state %s -> %s", previous, next);
		this.emit("state", next, previous);
	}
}

function spawnFailureKind(err: unknown): FailureKind {
	const code = err instanceof Error && "code" in err ? String(err.code) : "";
	if (code === "ENOENT") return "ProcessNotInstalled";
	if (code === "EACCES" || code === "EPERM") return "PermissionDenied";
	return "UnexpectedExit";
}
