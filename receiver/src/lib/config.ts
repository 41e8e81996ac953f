import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { Command } from "commander";
import { DecoderSettingsSchema } from "@rtl433-bridge/common";
import type { DecoderSettings } from "@rtl433-bridge/common";

import { configError, errorMessage } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface SupervisorSettings {
	startGraceMs: number;
	startTimeoutMs: number;
	stopTimeoutMs: number;
	stallTimeoutMs: number; // 0 disables the stall watchdog

	baseDelayMs: number;
	maxDelayMs: number;
	maxConsecutiveFailures: number;
	healthyResetMs: number;
}

export interface AppConfig {
	binary: string;
	decoder: DecoderSettings;
	supervisor: SupervisorSettings;

	paths: {
		sqlite: string;
		logDir: string;
	};

	logLevel: LogLevel;

	sweepIntervalMs: number;
	rejectionLogIntervalMs: number;
}

export interface CliOptions {
	configPath: string;
	json: boolean;
}

/* ---------- defaults ---------- */

const DEFAULT_BINARY = "rtl_433";
const DEFAULT_SQLITE = "/var/lib/rtl433-bridge/devices.sqlite";
const DEFAULT_LOG_DIR = "/var/log/rtl433-bridge";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_SWEEP_INTERVAL_MS = 30_000;
const DEFAULT_REJECTION_LOG_INTERVAL_MS = 60_000;

export const DEFAULT_SUPERVISOR_SETTINGS: SupervisorSettings = {
	startGraceMs: 500,
	startTimeoutMs: 5_000,
	stopTimeoutMs: 5_000,
	stallTimeoutMs: 0,
	baseDelayMs: 1_000,
	maxDelayMs: 60_000,
	maxConsecutiveFailures: 5,
	healthyResetMs: 60_000
};

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

export function parseCommandLine(argv: string[] = process.argv): CliOptions {
	const program = new Command();

	program
		.name("rtl433-receiver")
		.requiredOption("-c, --config <path>", "Path to configuration file")
		.option("--json", "Write change events to stdout as JSON lines", false)
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(argv);

	const opts = program.opts<{ config: string; json: boolean }>();
	return { configPath: opts.config, json: opts.json };
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(parent: Record<string, unknown>, key: string): Record<string, unknown> {
	const v = parent[key];
	if (v === undefined) return {};
	if (!isRecord(v)) {
		throw configError(`config.${key} must be an object`);
	}
	return v;
}

function optionalString(name: string, v: unknown, def: string): string {
	if (v === undefined) return def;
	if (typeof v !== "string" || v.trim() === "") {
		throw configError(`config.${name} must be a non-empty string`);
	}
	return v.trim();
}

function optionalNumber(name: string, v: unknown, def: number): number {
	if (v === undefined) return def;
	if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
		throw configError(`config.${name} must be a non-negative number`);
	}
	return v;
}

function isLogLevel(v: string): v is LogLevel {
	return LOG_LEVELS.some(l => l === v);
}

// Environment overrides for the decoder command line (useful from systemd units).
function decoderEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	if (env.RTL433_DEVICE_ID) out.deviceId = env.RTL433_DEVICE_ID;
	if (env.RTL433_FREQUENCY) out.frequency = env.RTL433_FREQUENCY;
	if (env.RTL433_GAIN) out.gain = env.RTL433_GAIN;
	if (env.RTL433_PROTOCOL_FILTER !== undefined) out.protocolFilter = env.RTL433_PROTOCOL_FILTER;
	return out;
}

export function parseDecoderSettings(input: unknown): DecoderSettings {
	const res = DecoderSettingsSchema.safeParse(input ?? {});
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid decoder settings: ${issues}`, res.error.issues);
	}
	return res.data;
}

function isSupervisorKey(key: string): key is keyof SupervisorSettings {
	return key in DEFAULT_SUPERVISOR_SETTINGS;
}

/* ---------- validation ---------- */

function validateConfig(cfg: AppConfig): void {
	const s = cfg.supervisor;

	if (s.startTimeoutMs <= 0) throw configError("config.supervisor.startTimeoutMs must be positive");
	if (s.stopTimeoutMs <= 0) throw configError("config.supervisor.stopTimeoutMs must be positive");
	if (s.baseDelayMs <= 0) throw configError("config.supervisor.baseDelayMs must be positive");
	if (s.maxDelayMs < s.baseDelayMs) {
		throw configError("config.supervisor.maxDelayMs must be >= baseDelayMs");
	}
	if (!Number.isInteger(s.maxConsecutiveFailures) || s.maxConsecutiveFailures < 1) {
		throw configError("config.supervisor.maxConsecutiveFailures must be a positive integer");
	}
	if (cfg.sweepIntervalMs <= 0) throw configError("config.sweepIntervalMs must be positive");
	if (cfg.rejectionLogIntervalMs <= 0) throw configError("config.rejectionLogIntervalMs must be positive");
}

/* ---------- public API ---------- */

export function buildConfig(parsed: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (!isRecord(parsed)) {
		throw configError("Configuration file must contain a JSON object");
	}

	const supervisorRaw = section(parsed, "supervisor");
	const pathsRaw = section(parsed, "paths");
	const decoderRaw = { ...section(parsed, "decoder"), ...decoderEnvOverrides(env) };

	const logLevel = optionalString("logLevel", env.LOG_LEVEL ?? parsed.logLevel, DEFAULT_LOG_LEVEL).toLowerCase();
	if (!isLogLevel(logLevel)) {
		throw configError(`config.logLevel must be one of: ${LOG_LEVELS.join(", ")}`);
	}

	const supervisor: SupervisorSettings = { ...DEFAULT_SUPERVISOR_SETTINGS };
	for (const key of Object.keys(DEFAULT_SUPERVISOR_SETTINGS)) {
		if (isSupervisorKey(key)) {
			supervisor[key] = optionalNumber(`supervisor.${key}`, supervisorRaw[key], DEFAULT_SUPERVISOR_SETTINGS[key]);
		}
	}

	const cfg: AppConfig = {
		binary: optionalString("binary", env.RTL433_BINARY ?? parsed.binary, DEFAULT_BINARY),
		decoder: parseDecoderSettings(decoderRaw),
		supervisor,
		paths: {
			sqlite: optionalString("paths.sqlite", pathsRaw.sqlite, DEFAULT_SQLITE),
			logDir: optionalString("paths.logDir", pathsRaw.logDir, DEFAULT_LOG_DIR)
		},
		logLevel,
		sweepIntervalMs: optionalNumber("sweepIntervalMs", parsed.sweepIntervalMs, DEFAULT_SWEEP_INTERVAL_MS),
		rejectionLogIntervalMs: optionalNumber(
			"rejectionLogIntervalMs",
			parsed.rejectionLogIntervalMs,
			DEFAULT_REJECTION_LOG_INTERVAL_MS
		)
	};

	validateConfig(cfg);
	return cfg;
}

export function loadConfig(configPath: string): AppConfig {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf8")) as unknown;
	} catch (err) {
		throw configError(`Cannot read configuration file ${configPath}: ${errorMessage(err)}`);
	}

	const cfg = buildConfig(parsed);

	// Verify that dirs exist
	if (cfg.paths.sqlite !== ":memory:") {
		ensureDir(path.dirname(cfg.paths.sqlite));
	}
	ensureDir(cfg.paths.logDir);

	return cfg;
}
