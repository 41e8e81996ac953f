export interface BackoffPolicy {
	baseDelayMs: number;
	maxDelayMs: number;
	maxConsecutiveFailures: number;
}

/**
 * Delay before the retry that follows the n-th consecutive failure (n >= 1):
 * base, 2*base, 4*base, ... capped at maxDelayMs. Undefined once n exceeds the ceiling.
 */
export function retryDelayMs(policy: BackoffPolicy, consecutiveFailures: number): number | undefined {
	if (consecutiveFailures < 1) return 0;
	if (consecutiveFailures > policy.maxConsecutiveFailures) return undefined;
	const delay = policy.baseDelayMs * 2 ** (consecutiveFailures - 1);
	return Math.min(delay, policy.maxDelayMs);
}
