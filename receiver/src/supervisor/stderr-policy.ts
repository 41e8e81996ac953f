import type { FailureKind } from "@rtl433-bridge/common";

export type StderrClass =
	| { kind: "benign"; label: string }
	| { kind: "fault"; failure: FailureKind; label: string }
	| { kind: "other" };

interface StderrPattern {
	pattern: RegExp;
	label: string;
}

interface FaultPattern extends StderrPattern {
	failure: FailureKind;
}

/*
 * rtl_433 and librtlsdr write everything to stderr: tuner chatter, warnings and the
 * few messages that mean the dongle cannot be used. Keep this table current; an
 * unknown line is never treated as a failure.
 */
export const BENIGN_PATTERNS: readonly StderrPattern[] = [
	{ pattern: /PLL not locked/i, label: "pll-not-locked" },
	{ pattern: /Found (Rafael Micro|Elonics|Fitipower|FCI|Realtek)/i, label: "tuner-found" },
	{ pattern: /Exact sample rate is/i, label: "sample-rate" },
	{ pattern: /Allocating \d+ zero-copy buffers/i, label: "buffers" },
	{ pattern: /Tuner gain set to/i, label: "gain" },
	{ pattern: /Tuned to/i, label: "tuned" },
	{ pattern: /Detached kernel driver/i, label: "kernel-driver" },
	{ pattern: /Registered \d+ out of \d+ device decoding protocols/i, label: "protocols" }
];

export const FAULT_PATTERNS: readonly FaultPattern[] = [
	{ pattern: /No supported devices found/i, failure: "DeviceNotFound", label: "no-devices" },
	{ pattern: /No matching devices found/i, failure: "DeviceNotFound", label: "no-matching-device" },
	{ pattern: /device not found/i, failure: "DeviceNotFound", label: "device-not-found" },
	{ pattern: /usb_claim_interface error/i, failure: "DeviceBusy", label: "usb-claim" },
	{ pattern: /device or resource busy/i, failure: "DeviceBusy", label: "busy" },
	{ pattern: /LIBUSB_ERROR_BUSY/i, failure: "DeviceBusy", label: "libusb-busy" },
	{ pattern: /LIBUSB_ERROR_ACCESS/i, failure: "PermissionDenied", label: "libusb-access" },
	{ pattern: /permission denied/i, failure: "PermissionDenied", label: "permission" },
	{ pattern: /insufficient permissions/i, failure: "PermissionDenied", label: "permission" }
];

export function classifyStderrLine(line: string): StderrClass {
	// Faults take precedence over benign matches.
	for (const f of FAULT_PATTERNS) {
		if (f.pattern.test(line)) return { kind: "fault", failure: f.failure, label: f.label };
	}
	for (const b of BENIGN_PATTERNS) {
		if (b.pattern.test(line)) return { kind: "benign", label: b.label };
	}
	return { kind: "other" };
}
