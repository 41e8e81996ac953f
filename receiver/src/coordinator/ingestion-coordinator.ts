import { EventEmitter } from "node:events";
import type winston from "winston";
import type { ChangeEvent, DecoderSettings, DeviceStateSnapshot, RejectReason } from "@rtl433-bridge/common";

import { parseDecoderSettings } from "../lib/config";
import type { SupervisorSettings } from "../lib/config";
import { SupervisorError, errorMessage, invalidState } from "../lib/errors";
import { normalizeRecord } from "../ingest/normalizer";
import { DeviceRegistry } from "../registry/device-registry";
import { isPoorTier, isSustainedPoorSignal } from "../signal/quality";
import { buildDecoderCommand, formatCommand, sameCommand } from "../supervisor/command";
import type { DecoderCommand } from "../supervisor/command";
import { ProcessSupervisor } from "../supervisor/process-supervisor";
import type { FailureInfo, SpawnDecoder, SupervisorStatus } from "../supervisor/process-supervisor";
import { DEFAULT_MAX_BUFFERED, EventChannel } from "./event-channel";
import { RejectionLogLimiter } from "./rejection-log-limiter";

export type Subscription = EventChannel<ChangeEvent>;

// Stats reports are expected output, not rejections.
export type CountedRejection = Exclude<RejectReason, "DecoderReport">;

export interface IngestionCounters {
	linesReceived: number;
	readingsAccepted: number;
	rejections: Record<CountedRejection, number>;
	filtered: number;
	decoderReports: number;
	droppedEvents: number;
}

export interface CoordinatorStatus {
	running: boolean;
	settings?: DecoderSettings;
	supervisor: SupervisorStatus;
	counters: IngestionCounters;
	devices: number;
	subscribers: number;
}

export interface IngestionCoordinatorOptions {
	logger: winston.Logger;
	binary?: string;
	supervisor?: Partial<SupervisorSettings>;
	spawnProcess?: SpawnDecoder;
	registry?: DeviceRegistry;
	now?: () => number;

	sweepIntervalMs?: number;
	rejectionLogIntervalMs?: number;
	maxBuffered?: number;
}

export interface IngestionCoordinator {
	on(event: "change", listener: (event: ChangeEvent) => void): this;
	on(event: "failure", listener: (info: FailureInfo) => void): this;
	on(event: "fatal", listener: (err: SupervisorError) => void): this;
}

const DEFAULT_SWEEP_INTERVAL_MS = 30_000;
const DEFAULT_REJECTION_LOG_INTERVAL_MS = 60_000;

/**
 * Owns the decoder supervisor, turns its output into registry updates and
 * fans the resulting change events out to subscribers.
 *
 * Decoder lines arrive one at a time on the event loop and each is applied to
 * the registry synchronously, so readings for one identity are applied in
 * decoder order and a sweep never interleaves with a half-done upsert.
 */
export class IngestionCoordinator extends EventEmitter {
	private readonly logger: winston.Logger;
	private readonly binary: string;
	private readonly registry: DeviceRegistry;
	private readonly supervisor: ProcessSupervisor;
	private readonly limiter: RejectionLogLimiter;
	private readonly now: () => number;
	private readonly sweepIntervalMs: number;
	private readonly maxBuffered: number;

	private readonly subscriptions = new Set<Subscription>();
	private readonly poorSignalWarned = new Set<string>();

	private settings?: DecoderSettings;
	private command?: DecoderCommand;
	private running = false;
	private sweepTimer?: NodeJS.Timeout;
	private lifecycle: Promise<void> = Promise.resolve();
	private pendingStops = 0;
	private ended?: { reason?: SupervisorError };

	private readonly counters: IngestionCounters = {
		linesReceived: 0,
		readingsAccepted: 0,
		rejections: { MalformedJson: 0, MissingIdentity: 0 },
		filtered: 0,
		decoderReports: 0,
		droppedEvents: 0
	};

	constructor(opts: IngestionCoordinatorOptions) {
		super();
		this.logger = opts.logger;
		this.binary = opts.binary ?? "rtl_433";
		this.registry = opts.registry ?? new DeviceRegistry();
		this.now = opts.now ?? Date.now;
		this.sweepIntervalMs = opts.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
		this.maxBuffered = opts.maxBuffered ?? DEFAULT_MAX_BUFFERED;

		this.limiter = new RejectionLogLimiter({
			logger: this.logger,
			intervalMs: opts.rejectionLogIntervalMs ?? DEFAULT_REJECTION_LOG_INTERVAL_MS,
			now: this.now
		});

		this.supervisor = new ProcessSupervisor({
			...opts.supervisor,
			logger: this.logger,
			spawnProcess: opts.spawnProcess,
			now: this.now
		});

		this.supervisor.on("line", line => {
			this.ingestLine(line);
		});
		this.supervisor.on("failure", info => {
			this.emit("failure", info);
		});
		this.supervisor.on("fatal", err => {
			this.onFatal(err);
		});
	}

	get isRunning(): boolean {
		return this.running;
	}

	/**
	 * Validate the decoder settings and start the decoder. Rejects with a
	 * CONFIG_ERROR before anything is spawned when the settings are invalid, and
	 * with a SupervisorError when the decoder fails for good before it runs.
	 * A `stop()` issued while the decoder is still starting rejects with
	 * INVALID_STATE.
	 */
	async start(settingsInput: unknown = {}): Promise<void> {
		const settings = parseDecoderSettings(settingsInput);
		const command = buildDecoderCommand(this.binary, settings);

		return this.serialize(async () => {
			if (this.running) {
				throw invalidState("Coordinator is already running");
			}
			if (this.pendingStops > 0) {
				throw invalidState("Coordinator was stopped before it started");
			}

			this.ended = undefined;
			this.applySettings(settings);
			this.command = command;
			this.running = true;

			this.logger.info(
				"Coordinator starting (frequency=%s gain=%s protocols=%s timeout=%ds)",
				settings.frequency,
				String(settings.gain),
				settings.protocolFilter.length ? settings.protocolFilter.join(",") : "all",
				settings.deviceTimeoutSec
			);

			this.sweepTimer = setInterval(() => this.runSweep(), this.sweepIntervalMs);

			try {
				await this.supervisor.start(command);
			} catch (err) {
				await this.teardown(err instanceof SupervisorError ? err : undefined);
				throw err;
			}
		});
	}

	/**
	 * Apply new decoder settings. The decoder is restarted only when its command
	 * line changes; registry state is kept either way. Returns whether it restarted.
	 * Waits for any start or reconfigure still in progress. Settings are stored
	 * only once the restarted decoder is confirmed running.
	 */
	async reconfigure(settingsInput: unknown): Promise<boolean> {
		const settings = parseDecoderSettings(settingsInput);
		const command = buildDecoderCommand(this.binary, settings);

		return this.serialize(async () => {
			if (!this.running || this.pendingStops > 0) {
				this.applySettings(settings);
				this.command = command;
				return false;
			}

			if (this.command && sameCommand(this.command, command)) {
				this.applySettings(settings);
				this.logger.info("Reconfigured without restart");
				return false;
			}

			this.logger.info("Decoder command changed; restarting: %s", formatCommand(command));
			await this.supervisor.stop();
			if (!this.running || this.pendingStops > 0) {
				throw invalidState("Coordinator was stopped during reconfigure");
			}

			await this.supervisor.start(command);
			this.applySettings(settings);
			this.command = command;
			return true;
		});
	}

	/**
	 * Stop the decoder and the sweep timer and end every subscription. A start or
	 * restart still waiting on the decoder is cut short.
	 */
	stop(): Promise<void> {
		this.pendingStops += 1;
		const interrupted = this.supervisor.stop().catch((err: unknown) => {
			this.logger.error("Stopping the decoder failed: %s", errorMessage(err));
		});

		return this.serialize(async () => {
			try {
				await interrupted;
				await this.teardown();
			} finally {
				this.pendingStops -= 1;
			}
		});
	}

	/**
	 * Feed one decoder output line. Called for every stdout line of the decoder;
	 * public so hosts and tests can drive ingestion directly.
	 */
	ingestLine(line: string): ChangeEvent | undefined {
		this.counters.linesReceived += 1;

		const res = normalizeRecord(line, { receivedAt: this.now() });

		if (!res.ok) {
			if (res.reason === "DecoderReport") {
				this.counters.decoderReports += 1;
				this.logger.debug("Decoder stats report received");
				return undefined;
			}
			this.counters.rejections[res.reason] += 1;
			this.limiter.record(res.reason, res.detail);
			return undefined;
		}

		const { reading, warnings } = res;
		for (const w of warnings) {
			this.logger.debug("%s: %s", reading.identity, w);
		}

		const filter = this.settings?.protocolFilter ?? [];
		if (filter.length > 0 && reading.protocol !== undefined && !filter.includes(reading.protocol)) {
			this.counters.filtered += 1;
			return undefined;
		}

		const event = this.registry.upsert(reading);
		this.counters.readingsAccepted += 1;

		if (event.kind === "created") {
			this.logger.info("New device: %s", event.identity);
		} else if (event.kind === "available") {
			this.logger.info("Device %s is available again", event.identity);
		}

		this.checkSignal(event);
		this.publish(event);
		return event;
	}

	/**
	 * After `stop()` the returned subscription is already closed; after a fatal
	 * decoder failure it throws that failure once.
	 */
	subscribe(): Subscription {
		const channel = new EventChannel<ChangeEvent>(this.maxBuffered, ch => {
			this.subscriptions.delete(ch);
		});

		if (this.ended) {
			if (this.ended.reason) channel.fail(this.ended.reason);
			else channel.close();
			return channel;
		}

		this.subscriptions.add(channel);
		return channel;
	}

	devices(): DeviceStateSnapshot[] {
		return this.registry.all();
	}

	device(identity: string): DeviceStateSnapshot | undefined {
		return this.registry.snapshot(identity);
	}

	getStatus(): CoordinatorStatus {
		return {
			running: this.running,
			settings: this.settings ? { ...this.settings, protocolFilter: [...this.settings.protocolFilter] } : undefined,
			supervisor: this.supervisor.getStatus(),
			counters: { ...this.counters, rejections: { ...this.counters.rejections } },
			devices: this.registry.size,
			subscribers: this.subscriptions.size
		};
	}

	/** One sweep pass; runs on the sweep timer. */
	runSweep(): ChangeEvent[] {
		const events = this.registry.sweep(this.now());
		for (const event of events) {
			this.logger.info(
				"Device %s unavailable (last seen %s)",
				event.identity,
				new Date(event.state.lastSeen).toISOString()
			);
			this.publish(event);
		}
		this.limiter.flush();
		return events;
	}

	private applySettings(settings: DecoderSettings): void {
		this.settings = settings;
		const timeoutMs = settings.deviceTimeoutSec * 1000;
		if (timeoutMs === this.registry.deviceTimeoutMs) return;

		for (const event of this.registry.setDeviceTimeout(timeoutMs, this.now())) {
			this.publish(event);
		}
	}

	private checkSignal(event: ChangeEvent): void {
		const { identity, state } = event;

		if (isSustainedPoorSignal(state.qualityHistory)) {
			if (!this.poorSignalWarned.has(identity)) {
				this.poorSignalWarned.add(identity);
				this.logger.warn(
					"Device %s: poor signal for several consecutive readings (rssi=%s snr=%s noise=%s)",
					identity,
					String(state.signal?.rssi ?? "-"),
					String(state.signal?.snr ?? "-"),
					String(state.signal?.noise ?? "-")
				);
			}
			return;
		}

		if (state.quality !== "unknown" && !isPoorTier(state.quality)) {
			this.poorSignalWarned.delete(identity);
		}
	}

	private publish(event: ChangeEvent): void {
		for (const sub of this.subscriptions) {
			this.counters.droppedEvents += sub.push(event);
		}

		try {
			this.emit("change", event);
		} catch (err) {
			this.logger.error("Change listener failed for %s: %s", event.identity, errorMessage(err));
		}
	}

	private onFatal(err: SupervisorError): void {
		this.logger.error("Decoder failed permanently (%s): %s", err.kind, err.message);
		this.emit("fatal", err);
		this.serialize(() => this.teardown(err)).catch((stopErr: unknown) => {
			this.logger.error("Shutdown after fatal failure failed: %s", errorMessage(stopErr));
		});
	}

	// start, reconfigure and stop run one at a time, in call order.
	private serialize<T>(op: () => Promise<T>): Promise<T> {
		const result = this.lifecycle.then(op);
		this.lifecycle = result.then(
			() => undefined,
			() => undefined
		);
		return result;
	}

	private async teardown(reason?: SupervisorError): Promise<void> {
		const wasRunning = this.running;

		if (this.sweepTimer) {
			clearInterval(this.sweepTimer);
			this.sweepTimer = undefined;
		}

		try {
			if (wasRunning) await this.supervisor.stop();
		} finally {
			this.running = false;
			this.ended = { reason: reason ?? this.ended?.reason };

			for (const sub of [...this.subscriptions]) {
				if (reason) sub.fail(reason);
				else sub.close();
			}
			this.subscriptions.clear();

			if (wasRunning) {
				this.limiter.flush(true);
				this.logger.info("Coordinator stopped");
			}
		}
	}
}
