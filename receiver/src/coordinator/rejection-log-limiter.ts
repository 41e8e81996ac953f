import type winston from "winston";
import type { RejectReason } from "@rtl433-bridge/common";

export interface RejectionLogLimiterOptions {
	logger: winston.Logger;
	intervalMs: number;
	now?: () => number;
}

interface Window {
	startedAt: number;
	suppressed: number;
	lastDetail: string;
}

/**
 * Rate limits rejection logging per reason: the first rejection in a window is
 * logged as is, the rest are folded into one summary line when the window
 * closes. Memory is one entry per reason, whatever the rejection rate.
 */
export class RejectionLogLimiter {
	private readonly logger: winston.Logger;
	private readonly intervalMs: number;
	private readonly now: () => number;
	private readonly windows = new Map<RejectReason, Window>();

	constructor(opts: RejectionLogLimiterOptions) {
		this.logger = opts.logger;
		this.intervalMs = opts.intervalMs;
		this.now = opts.now ?? Date.now;
	}

	record(reason: RejectReason, detail: string): void {
		const now = this.now();
		const open = this.windows.get(reason);

		if (open && now - open.startedAt < this.intervalMs) {
			open.suppressed += 1;
			open.lastDetail = detail;
			return;
		}

		if (open) this.summarize(reason, open);

		this.windows.set(reason, { startedAt: now, suppressed: 0, lastDetail: detail });
		this.logger.warn("Rejected decoder line (%s): %s", reason, detail);
	}

	/** Close expired windows; with `force`, close all of them. */
	flush(force = false): void {
		const now = this.now();
		for (const [reason, w] of this.windows) {
			if (!force && now - w.startedAt < this.intervalMs) continue;
			this.summarize(reason, w);
			this.windows.delete(reason);
		}
	}

	private summarize(reason: RejectReason, w: Window): void {
		if (w.suppressed === 0) return;
		this.logger.warn(
			"Rejected %d more decoder line(s) (%s) in the last %d s; last: %s",
			w.suppressed,
			reason,
			Math.round((this.now() - w.startedAt) / 1000),
			w.lastDetail
		);
	}
}
