/**
 * Exponential backoff with cap and jitter, shared by the REST retry loop and
 * the stream supervisor.
 */

export interface BackoffConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** 0 disables jitter; 0.2 spreads each delay ±20%. */
	readonly jitterFactor: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
	baseDelayMs: 250,
	maxDelayMs: 30_000,
	jitterFactor: 0.2,
};

/**
 * Delay before retry number `attempt` (0-based): base * 2^attempt, capped,
 * then jittered. Never negative.
 */
export function backoffDelay(
	attempt: number,
	config: BackoffConfig,
	random: () => number = Math.random,
): number {
	const capped = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
	if (config.jitterFactor === 0) return capped;
	const jitter = capped * config.jitterFactor * (random() * 2 - 1);
	return Math.max(0, Math.round(capped + jitter));
}

/** Stateful attempt counter over backoffDelay; reset after sustained success. */
export class BackoffPolicy {
	private readonly config: BackoffConfig;
	private readonly random: () => number;
	private attempts = 0;

	constructor(config: BackoffConfig = DEFAULT_BACKOFF, random: () => number = Math.random) {
		this.config = config;
		this.random = random;
	}

	nextDelay(): number {
		const delay = backoffDelay(this.attempts, this.config, this.random);
		this.attempts += 1;
		return delay;
	}

	reset(): void {
		this.attempts = 0;
	}

	get attemptCount(): number {
		return this.attempts;
	}
}
