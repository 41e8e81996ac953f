import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	logDir: string;
	serviceName: string;
	level?: string;
	console?: boolean;
	// Send every console level to stderr, keeping stdout free for the JSON event feed.
	consoleToStderr?: boolean;
	rotate?: boolean;
	files?: boolean;
}

interface FileSink {
	suffix: string;
	// Falls back to the logger level.
	level?: string;
	keep: string;
}

const FILE_SINKS: readonly FileSink[] = [
	{ suffix: "", keep: "14d" },
	{ suffix: ".error", level: "error", keep: "30d" }
];

const ALL_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

export function createLogFormat(serviceName: string): winston.Logform.Format {
	return winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const meta = info.stack ? `\n${String(info.stack)}` : "";
			return `${ts} [${serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);
}

function fileTransport(opts: LoggerOptions, sink: FileSink, level: string, format: winston.Logform.Format): winston.transport {
	const base = `${opts.serviceName}${sink.suffix}`;

	if (opts.rotate ?? true) {
		return new DailyRotateFile({
			level,
			dirname: opts.logDir,
			filename: `${base}.%DATE%.log`,
			datePattern: "YYYY-MM-DD",
			maxFiles: sink.keep,
			zippedArchive: false
		});
	}

	return new winston.transports.File({ level, filename: path.join(opts.logDir, `${base}.log`), format });
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = (opts.level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
	const format = createLogFormat(opts.serviceName);
	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level,
				format,
				stderrLevels: opts.consoleToStderr ? ALL_LEVELS : ["error"]
			})
		);
	}

	if (opts.files ?? true) {
		fs.mkdirSync(opts.logDir, { recursive: true });
		for (const sink of FILE_SINKS) {
			transports.push(fileTransport(opts, sink, sink.level ?? level, format));
		}
	}

	return winston.createLogger({
		level,
		format,
		transports,
		// A logger with no transports makes winston complain on every write.
		silent: transports.length === 0
	});
}
