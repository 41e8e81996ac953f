import type { ChangeEvent, ChangeKind, DeviceStateSnapshot, MeasurementValue, Reading } from "@rtl433-bridge/common";

export const DEFAULT_DEVICE_TIMEOUT_MS = 3_600_000;
export const QUALITY_HISTORY_LENGTH = 10;

export interface DeviceRegistryOptions {
	deviceTimeoutMs?: number;
}

type DeviceState = DeviceStateSnapshot;

function copyState(s: DeviceState): DeviceStateSnapshot {
	return {
		...s,
		measurements: { ...s.measurements },
		signal: s.signal ? { ...s.signal } : undefined,
		qualityHistory: [...s.qualityHistory]
	};
}

function sameSignal(a: DeviceState["signal"], b: DeviceState["signal"]): boolean {
	if (!a || !b) return a === b;
	return a.rssi === b.rssi && a.snr === b.snr && a.noise === b.noise;
}

/**
 * Last-known state per device identity.
 *
 * All writes are synchronous, so on the Node event loop there is exactly one
 * writer at a time and no write ever observes a half-applied update. Readers get
 * copies; the live map never leaves this class.
 *
 * Invariant after every upsert/sweep/setDeviceTimeout: `available` is false iff
 * `now - lastSeen > timeout`.
 */
export class DeviceRegistry {
	private readonly devices = new Map<string, DeviceState>();
	private timeoutMs: number;

	constructor(opts: DeviceRegistryOptions = {}) {
		this.timeoutMs = opts.deviceTimeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS;
		if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
			throw new Error("deviceTimeoutMs must be a positive number");
		}
	}

	get size(): number {
		return this.devices.size;
	}

	get deviceTimeoutMs(): number {
		return this.timeoutMs;
	}

	upsert(reading: Reading): ChangeEvent {
		const existing = this.devices.get(reading.identity);

		if (!existing) {
			const state: DeviceState = {
				identity: reading.identity,
				model: reading.model,
				deviceId: reading.deviceId,
				channel: reading.channel,
				protocol: reading.protocol,
				measurements: { ...reading.measurements },
				signal: reading.signal ? { ...reading.signal } : undefined,
				quality: reading.quality,
				qualityHistory: reading.quality === "unknown" ? [] : [reading.quality],
				firstSeen: reading.receivedAt,
				lastSeen: reading.receivedAt,
				lastTimestamp: reading.timestamp,
				readingCount: 1,
				available: true
			};
			this.devices.set(state.identity, state);

			const changedFields = Object.keys(state.measurements);
			if (state.quality !== "unknown") changedFields.push("quality");
			if (state.signal) changedFields.push("signal");
			changedFields.push("available");

			return this.event(state, "created", changedFields);
		}

		const changedFields = this.mergeMeasurements(existing.measurements, reading.measurements);

		if (reading.signal && !sameSignal(existing.signal, reading.signal)) {
			existing.signal = { ...reading.signal };
			changedFields.push("signal");
		}

		// A reading without level data says nothing about the link; keep the last known tier.
		if (reading.quality !== "unknown") {
			if (existing.quality !== reading.quality) changedFields.push("quality");
			existing.quality = reading.quality;
			existing.qualityHistory.push(reading.quality);
			if (existing.qualityHistory.length > QUALITY_HISTORY_LENGTH) {
				existing.qualityHistory.splice(0, existing.qualityHistory.length - QUALITY_HISTORY_LENGTH);
			}
		}

		if (reading.model !== undefined) existing.model = reading.model;
		if (reading.channel !== undefined) existing.channel = reading.channel;
		if (reading.protocol !== undefined) existing.protocol = reading.protocol;

		existing.lastSeen = Math.max(existing.lastSeen, reading.receivedAt);
		existing.lastTimestamp = reading.timestamp;
		existing.readingCount += 1;

		let kind: ChangeKind = "updated";
		if (!existing.available) {
			existing.available = true;
			changedFields.push("available");
			kind = "available";
		}

		return this.event(existing, kind, changedFields);
	}

	/**
	 * Mark devices not heard from for longer than the timeout as unavailable.
	 * Never marks a device available; calling it again with the same `now` yields nothing.
	 */
	sweep(now: number): ChangeEvent[] {
		const events: ChangeEvent[] = [];
		for (const state of this.devices.values()) {
			if (state.available && now - state.lastSeen > this.timeoutMs) {
				state.available = false;
				events.push(this.event(state, "unavailable", ["available"]));
			}
		}
		return events;
	}

	/**
	 * Change the timeout and re-evaluate every device in both directions, so the
	 * availability invariant holds for the new timeout straight away.
	 */
	setDeviceTimeout(timeoutMs: number, now: number): ChangeEvent[] {
		if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
			throw new Error("deviceTimeoutMs must be a positive number");
		}
		this.timeoutMs = timeoutMs;

		const events: ChangeEvent[] = [];
		for (const state of this.devices.values()) {
			const shouldBeAvailable = now - state.lastSeen <= this.timeoutMs;
			if (shouldBeAvailable === state.available) continue;
			state.available = shouldBeAvailable;
			events.push(this.event(state, shouldBeAvailable ? "available" : "unavailable", ["available"]));
		}
		return events;
	}

	/**
	 * Seed the registry from persisted snapshots. Entries already present win;
	 * availability is recomputed against `now`.
	 */
	restore(snapshots: readonly DeviceStateSnapshot[], now: number): number {
		let restored = 0;
		for (const snap of snapshots) {
			if (this.devices.has(snap.identity)) continue;
			const state = copyState(snap);
			state.available = now - state.lastSeen <= this.timeoutMs;
			this.devices.set(state.identity, state);
			restored++;
		}
		return restored;
	}

	snapshot(identity: string): DeviceStateSnapshot | undefined {
		const state = this.devices.get(identity);
		return state ? copyState(state) : undefined;
	}

	all(): DeviceStateSnapshot[] {
		return Array.from(this.devices.values(), copyState);
	}

	private mergeMeasurements(
		target: Record<string, MeasurementValue>,
		incoming: Readonly<Record<string, MeasurementValue>>
	): string[] {
		const changed: string[] = [];
		for (const [key, value] of Object.entries(incoming)) {
			if (target[key] !== value) changed.push(key);
			target[key] = value;
		}
		return changed;
	}

	private event(state: DeviceState, kind: ChangeKind, changedFields: string[]): ChangeEvent {
		return {
			identity: state.identity,
			kind,
			changedFields,
			state: copyState(state)
		};
	}
}
