import type { QualityTier, SignalLevels } from "@rtl433-bridge/common";

type KnownTier = Exclude<QualityTier, "unknown">;

// Best to worst. A metric that passes no threshold is "unusable".
const TIER_ORDER: readonly KnownTier[] = ["excellent", "good", "fair", "poor", "unusable"];

// Thresholds observed on RTL-SDR dongles with rtl_433 `-M level`.
const RSSI_MIN_DBM = [-10, -20, -30, -40];
const SNR_MIN_DB = [30, 20, 10, 5];
const NOISE_MAX_DB = [-40, -35, -30, -25];

function isFiniteNumber(v: unknown): v is number {
	return typeof v === "number" && Number.isFinite(v);
}

function tierAtLeast(value: number, minimums: readonly number[]): KnownTier {
	const idx = minimums.findIndex(min => value >= min);
	return idx === -1 ? "unusable" : TIER_ORDER[idx];
}

function tierAtMost(value: number, maximums: readonly number[]): KnownTier {
	const idx = maximums.findIndex(max => value <= max);
	return idx === -1 ? "unusable" : TIER_ORDER[idx];
}

export function rssiTier(rssi: number): KnownTier {
	return tierAtLeast(rssi, RSSI_MIN_DBM);
}

export function snrTier(snr: number): KnownTier {
	return tierAtLeast(snr, SNR_MIN_DB);
}

export function noiseTier(noise: number): KnownTier {
	return tierAtMost(noise, NOISE_MAX_DB);
}

function worst(a: KnownTier, b: KnownTier): KnownTier {
	return TIER_ORDER.indexOf(a) >= TIER_ORDER.indexOf(b) ? a : b;
}

/**
 * Overall tier is the worst of the individually bucketed metrics.
 * Metrics the decoder did not report are ignored; with none reported the
 * result is "unknown", which is not the same as "unusable".
 */
export function classifySignal(levels: SignalLevels | undefined): QualityTier {
	if (!levels) return "unknown";

	const tiers: KnownTier[] = [];
	if (isFiniteNumber(levels.rssi)) tiers.push(rssiTier(levels.rssi));
	if (isFiniteNumber(levels.snr)) tiers.push(snrTier(levels.snr));
	if (isFiniteNumber(levels.noise)) tiers.push(noiseTier(levels.noise));

	if (tiers.length === 0) return "unknown";
	return tiers.reduce(worst);
}

export function isPoorTier(tier: QualityTier): boolean {
	return tier === "poor" || tier === "unusable";
}

export function isSustainedPoorSignal(history: readonly QualityTier[], window = 5): boolean {
	if (history.length < window) return false;
	return history.slice(-window).every(isPoorTier);
}
