import type { FailureKind } from "@rtl433-bridge/common";

export type ErrorCode =
	| "CONFIG_ERROR"
	| "INVALID_STATE"
	| "PROCESS_ERROR"
	| "STORE_ERROR"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

const FAILURE_MESSAGES: Record<FailureKind, string> = {
	DeviceNotFound: "RTL-SDR device not found",
	DeviceBusy: "RTL-SDR device is busy (claimed by another program)",
	PermissionDenied: "Permission denied while opening the RTL-SDR device",
	ProcessNotInstalled: "rtl_433 binary not found",
	UnexpectedExit: "rtl_433 process exited unexpectedly",
	StartTimeout: "rtl_433 process did not start in time",
	Stalled: "rtl_433 process stopped producing output",
	MaxRetriesExceeded: "rtl_433 process kept failing; giving up"
};

// Failures that need user action; retrying cannot fix them.
const LIFECYCLE_FAILURES: ReadonlySet<FailureKind> = new Set<FailureKind>([
	"DeviceNotFound",
	"DeviceBusy",
	"PermissionDenied",
	"ProcessNotInstalled"
]);

export function describeFailure(kind: FailureKind): string {
	return FAILURE_MESSAGES[kind];
}

export function isLifecycleFailure(kind: FailureKind): boolean {
	return LIFECYCLE_FAILURES.has(kind);
}

export class SupervisorError extends AppError {
	public readonly kind: FailureKind;

	constructor(kind: FailureKind, detail?: string, cause?: unknown) {
		super({
			code: "PROCESS_ERROR",
			message: detail ? `${describeFailure(kind)}: ${detail}` : describeFailure(kind),
			details: { kind },
			cause
		});
		this.name = "SupervisorError";
		this.kind = kind;
	}
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function invalidState(message: string): AppError {
	return new AppError({
		code: "INVALID_STATE",
		message
	});
}

export function storeError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "STORE_ERROR",
		message,
		details,
		cause
	});
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
