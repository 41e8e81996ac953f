// Event feed shapes (used by the receiver and by whatever consumes its feed)
export type {
	ChangeEvent,
	ChangeKind,
	DeviceStateSnapshot,
	FailureKind,
	MeasurementValue,
	QualityTier,
	Reading,
	RejectReason,
	SignalLevels,
	SupervisorState
} from "./telemetry";

// Validation schemas (decoder settings from the host, persisted device state)
export { DecoderSettingsSchema, DeviceStateSchema, FREQUENCY_PATTERN } from "./schema";
export type { DecoderSettings } from "./schema";
