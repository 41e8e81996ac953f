import type { MeasurementValue, Reading, RejectReason, SignalLevels } from "@rtl433-bridge/common";

import { classifySignal } from "../signal/quality";
import { implausibleReason, roundTo, toCanonicalUnit } from "./units";

export type NormalizeResult =
	| { ok: true; reading: Reading; warnings: string[] }
	| { ok: false; reason: RejectReason; detail: string };

export interface NormalizeOptions {
	receivedAt: number;
}

// Keys that describe the record rather than measure something.
const METADATA_KEYS: ReadonlySet<string> = new Set([
	"model",
	"id",
	"device_id",
	"channel",
	"protocol",
	"brand",
	"subtype",
	"time",
	"rssi",
	"snr",
	"noise",
	"mod",
	"freq",
	"freq1",
	"freq2",
	"mic"
]);

// Flags rtl_433 reports as 0/1.
const BOOLEAN_KEYS: ReadonlySet<string> = new Set(["battery_ok", "tamper", "alarm"]);

// `-M stats` periodically emits decoder statistics on the same stream.
const REPORT_KEYS: readonly string[] = ["frames", "stats"];

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

function previewLine(line: string, maxLen = 120): string {
	const trimmed = line.trim();
	if (trimmed.length <= maxLen) return trimmed;
	return trimmed.slice(0, maxLen) + "…";
}

function toFiniteNumber(v: unknown): number | undefined {
	if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
	if (typeof v === "string") {
		const s = v.trim();
		if (!s) return undefined;
		const n = Number(s);
		return Number.isFinite(n) ? n : undefined;
	}
	return undefined;
}

function identityPart(v: unknown): string | number | undefined {
	if (typeof v === "string") {
		const s = v.trim();
		return s ? s : undefined;
	}
	if (typeof v === "number" && Number.isFinite(v)) return v;
	return undefined;
}

function coerceMeasurement(key: string, raw: unknown): MeasurementValue | string {
	if (typeof raw === "boolean") return raw;

	const n = toFiniteNumber(raw);
	if (n === undefined) {
		if (raw === null) return "null value";
		if (typeof raw === "object") return "not a scalar";
		return `not numeric (${previewLine(String(raw), 24)})`;
	}

	if (BOOLEAN_KEYS.has(key)) return n !== 0;
	return n;
}

function parseTimestamp(raw: unknown, receivedAt: number): { iso: string; fallback: boolean } {
	let d: Date | undefined;
	if (typeof raw === "string" && raw.trim()) {
		d = new Date(raw.trim());
	} else if (typeof raw === "number" && Number.isFinite(raw)) {
		// time:unix gives seconds
		d = new Date(raw < 1e12 ? raw * 1000 : raw);
	}

	if (d && !Number.isNaN(d.getTime())) {
		return { iso: d.toISOString(), fallback: false };
	}
	return { iso: new Date(receivedAt).toISOString(), fallback: true };
}

function extractSignal(rec: Record<string, unknown>): SignalLevels | undefined {
	const rssi = toFiniteNumber(rec.rssi);
	const snr = toFiniteNumber(rec.snr);
	const noise = toFiniteNumber(rec.noise);
	if (rssi === undefined && snr === undefined && noise === undefined) return undefined;

	const out: SignalLevels = {};
	if (rssi !== undefined) out.rssi = rssi;
	if (snr !== undefined) out.snr = snr;
	if (noise !== undefined) out.noise = noise;
	return out;
}

/**
 * Turn one decoder output line into a Reading.
 *
 * Only a line that is not a JSON object, or that carries neither `model` nor `id`,
 * is rejected. Individual fields that cannot be used are dropped and reported in
 * `warnings`; a bad timestamp falls back to `receivedAt`.
 */
export function normalizeRecord(line: string, opts: NormalizeOptions): NormalizeResult {
	let parsed: unknown;
	try {
		parsed = JSON.parse(line) as unknown;
	} catch {
		return { ok: false, reason: "MalformedJson", detail: `not valid JSON: ${previewLine(line)}` };
	}

	if (!isRecord(parsed)) {
		return { ok: false, reason: "MalformedJson", detail: `not a JSON object: ${previewLine(line)}` };
	}
	const rec = parsed;

	const model = identityPart(rec.model);
	const deviceId = identityPart(rec.id ?? rec.device_id);

	if (model === undefined && deviceId === undefined) {
		if (REPORT_KEYS.some(k => k in rec)) {
			return { ok: false, reason: "DecoderReport", detail: "decoder statistics report" };
		}
		return { ok: false, reason: "MissingIdentity", detail: `no model or id: ${previewLine(line)}` };
	}

	const identity = [model, deviceId].filter(p => p !== undefined).map(String).join("_");
	const warnings: string[] = [];

	const measurements: Record<string, MeasurementValue> = {};
	for (const [key, raw] of Object.entries(rec)) {
		if (METADATA_KEYS.has(key)) continue;

		const value = coerceMeasurement(key, raw);
		if (typeof value === "string") {
			warnings.push(`dropped ${key}: ${value}`);
			continue;
		}
		if (typeof value === "boolean") {
			measurements[key] = value;
			continue;
		}

		const canon = toCanonicalUnit(key, value);
		// A value the decoder already reported in the canonical unit wins over a converted one.
		if (canon.converted && canon.key in rec) continue;

		const implausible = implausibleReason(canon.key, canon.value);
		if (implausible) {
			warnings.push(`dropped ${key}: ${implausible} (${value})`);
			continue;
		}

		measurements[canon.key] = roundTo(canon.value);
	}

	const ts = parseTimestamp(rec.time, opts.receivedAt);
	if (ts.fallback && rec.time !== undefined) {
		warnings.push(`unparseable time (${previewLine(String(rec.time), 40)}); using ingestion time`);
	}

	const signal = extractSignal(rec);
	const protocol = toFiniteNumber(rec.protocol);
	const channel = identityPart(rec.channel);
	const brand = typeof rec.brand === "string" && rec.brand.trim() ? rec.brand.trim() : undefined;

	const reading: Reading = {
		identity,
		model: model === undefined ? undefined : String(model),
		deviceId,
		channel,
		protocol: protocol !== undefined && Number.isInteger(protocol) ? protocol : undefined,
		brand,
		timestamp: ts.iso,
		receivedAt: opts.receivedAt,
		measurements,
		signal,
		quality: classifySignal(signal)
	};

	return { ok: true, reading, warnings };
}
