import { z } from "zod";

// rtl_433 accepts a plain number in Hz or a value with a k/M/G suffix.
export const FREQUENCY_PATTERN = /^\d+(\.\d+)?[kMG]?$/;

function splitList(v: unknown): unknown {
	if (typeof v === "string") {
		return v
			.split(",")
			.map(p => p.trim())
			.filter(p => p.length > 0);
	}
	return v;
}

export const DecoderSettingsSchema = z.object({
	deviceId: z.coerce.number().int().nonnegative().default(0),
	frequency: z.string().trim().regex(FREQUENCY_PATTERN, "frequency must look like 433.92M").default("433.92M"),
	gain: z.union([z.literal("auto"), z.coerce.number().int().min(0).max(50)]).default(40),
	protocolFilter: z.preprocess(splitList, z.array(z.coerce.number().int().positive())).default([]),
	deviceTimeoutSec: z.coerce.number().positive().default(3600)
});

export type DecoderSettings = z.infer<typeof DecoderSettingsSchema>;

const QualityTierSchema = z.enum(["excellent", "good", "fair", "poor", "unusable", "unknown"]);

const SignalLevelsSchema = z.object({
	rssi: z.number().optional(),
	snr: z.number().optional(),
	noise: z.number().optional()
});

export const DeviceStateSchema = z.object({
	identity: z.string().min(1),
	model: z.string().optional(),
	deviceId: z.union([z.string(), z.number()]).optional(),
	channel: z.union([z.string(), z.number()]).optional(),
	protocol: z.number().int().optional(),
	measurements: z.record(z.union([z.number(), z.boolean()])),
	signal: SignalLevelsSchema.optional(),
	quality: QualityTierSchema,
	qualityHistory: z.array(QualityTierSchema),
	firstSeen: z.number(),
	lastSeen: z.number(),
	lastTimestamp: z.string(),
	readingCount: z.number().int().nonnegative(),
	available: z.boolean()
});
