export type MeasurementValue = number | boolean;

export type QualityTier = "excellent" | "good" | "fair" | "poor" | "unusable" | "unknown";

export interface SignalLevels {
	rssi?: number;  // dBm
	snr?: number;   // dB
	noise?: number; // dB
}

export interface Reading {
	identity: string;  // "{model}_{deviceId}"

	model?: string;
	deviceId?: string | number;
	channel?: string | number;
	protocol?: number;
	brand?: string;

	timestamp: string; // Ex. 2026-01-23T12:34:56.000Z
	receivedAt: number; // epoch ms

	measurements: Record<string, MeasurementValue>;
	signal?: SignalLevels;
	quality: QualityTier;
}

export interface DeviceStateSnapshot {
	identity: string;
	model?: string;
	deviceId?: string | number;
	channel?: string | number;
	protocol?: number;

	measurements: Record<string, MeasurementValue>;
	signal?: SignalLevels;
	quality: QualityTier;
	qualityHistory: QualityTier[];

	firstSeen: number;
	lastSeen: number;
	lastTimestamp: string;
	readingCount: number;

	available: boolean;
}

export type ChangeKind = "created" | "updated" | "available" | "unavailable";

export interface ChangeEvent {
	identity: string;
	kind: ChangeKind;
	changedFields: string[];
	state: DeviceStateSnapshot;
}

export type SupervisorState = "stopped" | "starting" | "running" | "failed" | "stopping";

export type FailureKind =
	| "DeviceNotFound"
	| "DeviceBusy"
	| "PermissionDenied"
	| "ProcessNotInstalled"
	| "UnexpectedExit"
	| "StartTimeout"
	| "Stalled"
	| "MaxRetriesExceeded";

export type RejectReason = "MalformedJson" | "MissingIdentity" | "DecoderReport";
