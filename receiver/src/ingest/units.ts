/*
 * rtl_433 encodes the unit in the key suffix (temperature_F, wind_avg_km_h, pressure_kPa, ...).
 * The `-C` flag is process-wide and not every decoder honours it, so every record is
 * brought to one unit system here: °C, m/s, hPa (= millibar), mm.
 */

interface UnitRule {
	suffix: string;
	canonical: string;
	convert: (v: number) => number;
	appliesTo?: (base: string) => boolean;
}

const isTemperature = (base: string): boolean => base.startsWith("temperature") || base.endsWith("temperature");
const isRain = (base: string): boolean => base.startsWith("rain");
const isPressure = (base: string): boolean => base.startsWith("pressure");

// Longer suffixes first so "_in_h" is not taken for "_in".
const RULES: readonly UnitRule[] = [
	{ suffix: "_F", canonical: "_C", convert: f => ((f - 32) * 5) / 9, appliesTo: isTemperature },
	{ suffix: "_km_h", canonical: "_m_s", convert: v => v / 3.6 },
	{ suffix: "_kph", canonical: "_m_s", convert: v => v / 3.6 },
	{ suffix: "_mi_h", canonical: "_m_s", convert: v => v * 0.44704 },
	{ suffix: "_mph", canonical: "_m_s", convert: v => v * 0.44704 },
	{ suffix: "_kPa", canonical: "_hPa", convert: v => v * 10 },
	{ suffix: "_inHg", canonical: "_hPa", convert: v => v * 33.8639 },
	{ suffix: "_PSI", canonical: "_hPa", convert: v => v * 68.9476, appliesTo: isPressure },
	{ suffix: "_psi", canonical: "_hPa", convert: v => v * 68.9476, appliesTo: isPressure },
	{ suffix: "_bar", canonical: "_hPa", convert: v => v * 1000, appliesTo: isPressure },
	{ suffix: "_in_h", canonical: "_mm_h", convert: v => v * 25.4, appliesTo: isRain },
	{ suffix: "_in", canonical: "_mm", convert: v => v * 25.4, appliesTo: isRain }
];

export interface CanonicalValue {
	key: string;
	value: number;
	converted: boolean;
}

export function toCanonicalUnit(key: string, value: number): CanonicalValue {
	for (const rule of RULES) {
		if (!key.endsWith(rule.suffix)) continue;
		const base = key.slice(0, -rule.suffix.length);
		if (!base) continue;
		if (rule.appliesTo && !rule.appliesTo(base)) continue;
		return { key: base + rule.canonical, value: rule.convert(value), converted: true };
	}
	return { key, value, converted: false };
}

/**
 * Physical plausibility of a canonical measurement. Returns a reason when the
 * value cannot be right, undefined otherwise.
 */
export function implausibleReason(key: string, value: number): string | undefined {
	if (key === "humidity" || key.startsWith("humidity_")) {
		if (value < 0 || value > 100) return "humidity outside 0..100";
	}
	if (key === "wind_dir_deg" && (value < 0 || value > 360)) {
		return "wind direction outside 0..360";
	}
	if (key.endsWith("_C") && isTemperature(key.slice(0, -2)) && value < -273.15) {
		return "temperature below absolute zero";
	}
	if ((key.endsWith("_m_s") || (isRain(key) && key.endsWith("_mm"))) && value < 0) {
		return "negative speed or rain total";
	}
	return undefined;
}

export function roundTo(value: number, decimals = 2): number {
	const f = 10 ** decimals;
	return Math.round(value * f) / f;
}
