import { ConfigError } from "../../shared/errors.js";
import { sleep } from "../../shared/time.js";
import type { Clock } from "../../shared/time.js";

export interface RateBudgetConfig {
	/** Calls allowed within any rolling window. */
	readonly maxCalls: number;
	readonly windowMs: number;
	readonly clock: Clock;
	/** Injected for tests driving a FakeClock. */
	readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Snapshot of budget usage statistics. */
export interface RateBudgetStats {
	readonly granted: number;
	readonly waits: number;
	readonly avgWaitMs: number;
}

/**
 * Sliding-window rate budget.
 *
 * Keeps the timestamps of recent grants; a call is admitted while fewer than
 * `maxCalls` fall inside the last `windowMs`. `waitForSlot()` blocks until a
 * slot frees and never drops a caller.
 */
export class RateBudget {
	private readonly maxCalls: number;
	private readonly windowMs: number;
	private readonly clock: Clock;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
	private readonly grants: number[] = [];

	private _granted = 0;
	private _waits = 0;
	private _totalWaitMs = 0;

	constructor(config: RateBudgetConfig) {
		if (!Number.isInteger(config.maxCalls) || config.maxCalls < 1) {
			throw new ConfigError("maxCalls must be a positive integer", { maxCalls: config.maxCalls });
		}
		if (config.windowMs <= 0) {
			throw new ConfigError("windowMs must be > 0", { windowMs: config.windowMs });
		}
		this.maxCalls = config.maxCalls;
		this.windowMs = config.windowMs;
		this.clock = config.clock;
		this.sleep = config.sleep ?? sleep;
	}

	/** `perSecond` calls per rolling second. */
	static perSecond(perSecond: number, clock: Clock): RateBudget {
		return new RateBudget({ maxCalls: perSecond, windowMs: 1000, clock });
	}

	/**
	 * Records a grant if the window has room.
	 * @example
	 * if (budget.tryAcquire()) {
	 *   // dispatch now
	 * }
	 */
	tryAcquire(): boolean {
		this.evict();
		if (this.grants.length >= this.maxCalls) return false;
		this.grants.push(this.clock.now());
		this._granted++;
		return true;
	}

	/** Grants still available in the current window. */
	available(): number {
		this.evict();
		return this.maxCalls - this.grants.length;
	}

	/** 0 when a slot is free now, otherwise ms until the oldest grant leaves the window. */
	timeUntilNextSlotMs(): number {
		this.evict();
		const oldest = this.grants[0];
		if (this.grants.length < this.maxCalls || oldest === undefined) return 0;
		return Math.max(1, oldest + this.windowMs - this.clock.now());
	}

	/**
	 * Blocks until a grant is recorded. Resolves false only when `signal` aborts
	 * first.
	 */
	async waitForSlot(signal?: AbortSignal): Promise<boolean> {
		if (this.tryAcquire()) return true;
		const startMs = this.clock.now();
		this._waits++;
		while (!signal?.aborted) {
			await this.sleep(this.timeUntilNextSlotMs(), signal);
			if (this.tryAcquire()) {
				this._totalWaitMs += this.clock.now() - startMs;
				return true;
			}
		}
		return false;
	}

	getStats(): RateBudgetStats {
		return {
			granted: this._granted,
			waits: this._waits,
			avgWaitMs: this._waits > 0 ? this._totalWaitMs / this._waits : 0,
		};
	}

	private evict(): void {
		const cutoff = this.clock.now() - this.windowMs;
		while (this.grants.length > 0 && (this.grants[0] ?? 0) <= cutoff) {
			this.grants.shift();
		}
	}
}
