import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DeviceStateSchema } from "@rtl433-bridge/common";
import type { DeviceStateSnapshot } from "@rtl433-bridge/common";

import { errorMessage, storeError } from "./errors";

export interface DbHandle {
	db: Database.Database;
	close: () => void;
}

interface DeviceRow {
	identity: string;
	payloadJson: string;
}

export interface BadDeviceRow {
	identity: string;
	error: string;
}

export interface LoadDevicesResult {
	ok: DeviceStateSnapshot[];
	bad: BadDeviceRow[];
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

export function openDb(sqlitePath: string): DbHandle {
	if (sqlitePath !== ":memory:") {
		ensureDir(path.dirname(sqlitePath));
	}

	let db: Database.Database;
	try {
		db = new Database(sqlitePath);
	} catch (err) {
		throw storeError(`Cannot open device store ${sqlitePath}`, undefined, err);
	}

	// The receiver is the only writer; WAL keeps ad-hoc readers (sqlite3 CLI) from blocking it.
	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = NORMAL");
	db.pragma("busy_timeout = 5000");

	return {
		db,
		close: () => db.close()
	};
}

export function initDb(db: Database.Database): void {
	const tx = db.transaction(() => {
		const ver = db.pragma("user_version", { simple: true });

		if (ver === 0) {
			db.exec(`
				CREATE TABLE IF NOT EXISTS devices (
					identity     TEXT    PRIMARY KEY,
					payloadJson  TEXT    NOT NULL,
					lastSeen     INTEGER NOT NULL,
					updatedAt    TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
				);

				CREATE INDEX IF NOT EXISTS idx_devices_last_seen
				ON devices (lastSeen);
			`);

			db.pragma("user_version = 1");
		}
	});

	tx();
}

export function saveDevice(db: Database.Database, state: DeviceStateSnapshot): void {
	db.prepare<{ identity: string; payloadJson: string; lastSeen: number }>(`
		INSERT INTO devices (identity, payloadJson, lastSeen)
		VALUES (@identity, @payloadJson, @lastSeen)
		ON CONFLICT(identity) DO UPDATE SET
			payloadJson = excluded.payloadJson,
			lastSeen    = excluded.lastSeen,
			updatedAt   = strftime('%Y-%m-%dT%H:%M:%fZ','now')
	`).run({
		identity: state.identity,
		payloadJson: JSON.stringify(state),
		lastSeen: state.lastSeen
	});
}

function parseDeviceRow(row: DeviceRow): DeviceStateSnapshot {
	let parsed: unknown;
	try {
		parsed = JSON.parse(row.payloadJson) as unknown;
	} catch {
		throw new Error("Invalid JSON in payloadJson");
	}

	const res = DeviceStateSchema.safeParse(parsed);
	if (!res.success) {
		// Keep the error compact so it fits into logs.
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw new Error(`Device state validation failed: ${issues}`);
	}
	if (res.data.identity !== row.identity) {
		throw new Error(`Identity mismatch (row=${row.identity} payload=${res.data.identity})`);
	}

	return res.data;
}

export function loadDevices(db: Database.Database): LoadDevicesResult {
	const rows = db
		.prepare<[], DeviceRow>("SELECT identity, payloadJson FROM devices ORDER BY identity ASC")
		.all();

	const ok: DeviceStateSnapshot[] = [];
	const bad: BadDeviceRow[] = [];

	for (const row of rows) {
		try {
			ok.push(parseDeviceRow(row));
		} catch (err) {
			bad.push({ identity: row.identity, error: errorMessage(err) });
		}
	}

	return { ok, bad };
}
