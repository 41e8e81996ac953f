import type winston from "winston";
import type Database from "better-sqlite3";
import type { ChangeEvent } from "@rtl433-bridge/common";

import { loadConfig, parseCommandLine } from "./lib/config";
import type { AppConfig, CliOptions } from "./lib/config";
import { createLogger } from "./lib/log";
import { asAppError, errorMessage } from "./lib/errors";
import { initDb, loadDevices, openDb, saveDevice } from "./lib/sqlite";
import { IngestionCoordinator } from "./coordinator/ingestion-coordinator";
import { runUntilStopped } from "./coordinator/run-until-stopped";
import { DeviceRegistry } from "./registry/device-registry";

interface Context {
	cli: CliOptions;
	config: AppConfig;
	logger: winston.Logger;
	db?: Database.Database;
	dbClose?: () => void;
}

function loadConfigAndInitLogger(): Context {
	const cli = parseCommandLine();
	const config = loadConfig(cli.configPath);

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "rtl433-receiver",
		level: config.logLevel,
		// stdout carries the JSON event feed
		consoleToStderr: cli.json
	});

	return { cli, config, logger };
}

function openStoreAndRestore(ctx: Context, registry: DeviceRegistry): void {
	const handle = openDb(ctx.config.paths.sqlite);
	initDb(handle.db);
	ctx.db = handle.db;
	ctx.dbClose = handle.close;

	const { ok, bad } = loadDevices(handle.db);
	for (const row of bad) {
		ctx.logger.warn("Skipping stored device %s: %s", row.identity, row.error);
	}

	const restored = registry.restore(ok, Date.now());
	ctx.logger.info("Restored %d device(s) from %s", restored, ctx.config.paths.sqlite);
}

function persistChange(ctx: Context, event: ChangeEvent): void {
	if (!ctx.db) return;
	try {
		saveDevice(ctx.db, event.state);
	} catch (err) {
		ctx.logger.error("Failed to persist device %s: %s", event.identity, errorMessage(err));
	}
}

function waitForSignal(): Promise<string> {
	return new Promise(resolve => {
		const onSignal = (signal: NodeJS.Signals): void => {
			resolve(signal);
		};
		process.once("SIGINT", onSignal);
		process.once("SIGTERM", onSignal);
	});
}

async function main(): Promise<number> {
	const ctx = loadConfigAndInitLogger();
	const { config, logger } = ctx;

	logger.info("rtl_433 receiver starting");
	logger.info("binary=%s sqlite=%s", config.binary, config.paths.sqlite);

	const registry = new DeviceRegistry({ deviceTimeoutMs: config.decoder.deviceTimeoutSec * 1000 });

	try {
		openStoreAndRestore(ctx, registry);

		const coordinator = new IngestionCoordinator({
			logger,
			binary: config.binary,
			supervisor: config.supervisor,
			registry,
			sweepIntervalMs: config.sweepIntervalMs,
			rejectionLogIntervalMs: config.rejectionLogIntervalMs
		});

		coordinator.on("change", event => {
			persistChange(ctx, event);
			if (ctx.cli.json) {
				process.stdout.write(JSON.stringify(event) + "\n");
			}
		});

		coordinator.on("failure", info => {
			logger.warn(
				"Decoder failure: %s (consecutive=%d%s)",
				info.kind,
				info.consecutiveFailures,
				info.retryInMs !== undefined ? `, retry in ${info.retryInMs} ms` : ""
			);
		});

		const reason = await runUntilStopped(coordinator, config.decoder, waitForSignal(), logger);

		const status = coordinator.getStatus();
		logger.info(
			"Lines=%d accepted=%d malformed=%d missingIdentity=%d filtered=%d devices=%d",
			status.counters.linesReceived,
			status.counters.readingsAccepted,
			status.counters.rejections.MalformedJson,
			status.counters.rejections.MissingIdentity,
			status.counters.filtered,
			status.devices
		);

		return reason === "fatal" ? 1 : 0;
	} finally {
		ctx.dbClose?.();
		logger.info("rtl_433 receiver exiting");
	}
}

main()
	.then(code => process.exit(code))
	.catch(err => {
		const appErr = asAppError(err);
		console.error(`${appErr.code}: ${appErr.message}`);
		process.exit(1);
	});
