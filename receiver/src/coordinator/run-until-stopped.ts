import type winston from "winston";

import { SupervisorError, asAppError } from "../lib/errors";
import type { IngestionCoordinator } from "./ingestion-coordinator";

/**
 * Start the coordinator and keep it running until `stopRequested` settles or
 * the decoder fails for good. Returns the stop reason, or "fatal".
 *
 * A stop request arriving while the decoder is still starting (or retrying)
 * stops the coordinator right away instead of waiting for the start to settle.
 */
export async function runUntilStopped(
	coordinator: IngestionCoordinator,
	settings: unknown,
	stopRequested: Promise<string>,
	logger: winston.Logger
): Promise<string> {
	const fatal = new Promise<string>(resolve => {
		coordinator.once("fatal", () => resolve("fatal"));
	});

	const stopped = Promise.race([stopRequested, fatal]).then(async reason => {
		logger.info("Shutting down (%s)", reason);
		await coordinator.stop();
		return reason;
	});

	try {
		await coordinator.start(settings);
		logger.info("Receiver running");
	} catch (err) {
		// INVALID_STATE: cut short by the stop above. SupervisorError: reported through "fatal".
		if (!(err instanceof SupervisorError) && asAppError(err).code !== "INVALID_STATE") {
			await coordinator.stop();
			throw err;
		}
	}

	return stopped;
}
