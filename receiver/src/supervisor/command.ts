import type { DecoderSettings } from "@rtl433-bridge/common";

export interface DecoderCommand {
	command: string;
	args: string[];
}

/**
 * rtl_433 invocation: JSON on stdout, signal levels, ISO time, protocol number,
 * periodic stats and SI units. Gain "auto" leaves -g out, which is rtl_433's auto gain.
 */
export function buildDecoderCommand(binary: string, settings: DecoderSettings): DecoderCommand {
	const args = ["-d", String(settings.deviceId), "-f", settings.frequency];

	if (settings.gain !== "auto") {
		args.push("-g", String(settings.gain));
	}

	args.push(
		"-F", "json",
		"-M", "level",
		"-M", "time:iso",
		"-M", "protocol",
		"-M", "stats",
		"-v",
		"-C", "si"
	);

	for (const protocol of settings.protocolFilter) {
		args.push("-R", String(protocol));
	}

	return { command: binary, args };
}

export function sameCommand(a: DecoderCommand, b: DecoderCommand): boolean {
	return a.command === b.command && a.args.length === b.args.length && a.args.every((v, i) => v === b.args[i]);
}

export function formatCommand(cmd: DecoderCommand): string {
	return [cmd.command, ...cmd.args].join(" ");
}
