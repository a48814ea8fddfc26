/**
 * TaskLock — at-most-one concurrent execution per task name.
 *
 * A lease is an ephemeral store entry written with set-if-absent; it is
 * released by compare-and-delete against the holder's own token, so a holder
 * whose lease already expired cannot delete a successor's lease.
 */

import { randomUUID } from "node:crypto";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { StoreKeys } from "./keys.js";
import type { StateStore } from "./types.js";

export interface TaskLease {
	readonly taskName: string;
	readonly holderId: string;
	readonly acquiredAt: number;
	readonly leaseTtlMs: number;
	/** Exact stored value; release matches on it. */
	readonly token: string;
}

export type LeaseOutcome<T> =
	| { readonly status: "ran"; readonly value: T }
	| { readonly status: "skipped"; readonly heldBy: string | null };

export interface TaskLockDeps {
	readonly store: StateStore;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** Defaults to a random UUID per lock instance. */
	readonly holderId?: string;
}

export class TaskLock {
	private readonly store: StateStore;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly holderId: string;

	constructor(deps: TaskLockDeps) {
		this.store = deps.store;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger).child({ component: "task-lock" });
		this.holderId = deps.holderId ?? randomUUID();
	}

	/**
	 * Claims `taskName` for `leaseTtlMs`. Null means another holder has it,
	 * which callers treat as a normal skip.
	 */
	async acquire(taskName: string, leaseTtlMs: number): Promise<TaskLease | null> {
		const acquiredAt = this.clock.now();
		const token = JSON.stringify({ holderId: this.holderId, acquiredAt, nonce: randomUUID() });
		const won = await this.store.setIfAbsent(StoreKeys.taskLock(taskName), token, leaseTtlMs);
		if (!won) {
			this.logger.info({ taskName }, "lease held elsewhere");
			return null;
		}
		this.logger.debug({ taskName, leaseTtlMs }, "lease acquired");
		return { taskName, holderId: this.holderId, acquiredAt, leaseTtlMs, token };
	}

	/** @returns false when the lease had already expired or been taken over */
	async release(lease: TaskLease): Promise<boolean> {
		const released = await this.store.deleteIfEquals(StoreKeys.taskLock(lease.taskName), lease.token);
		if (!released) {
			this.logger.warn(
				{ taskName: lease.taskName, heldForMs: this.clock.now() - lease.acquiredAt },
				"lease lost before release",
			);
		}
		return released;
	}

	/** Holder id of the current lease, if any. */
	async holder(taskName: string): Promise<string | null> {
		const raw = await this.store.get(StoreKeys.taskLock(taskName));
		if (raw === null) return null;
		try {
			const parsed: unknown = JSON.parse(raw);
			if (typeof parsed === "object" && parsed !== null && "holderId" in parsed) {
				return typeof parsed.holderId === "string" ? parsed.holderId : null;
			}
		} catch (cause) {
			this.logger.warn({ taskName, cause: String(cause) }, "unreadable lease value");
		}
		return null;
	}

	/**
	 * Runs `fn` under the lease and releases it afterwards, including when `fn`
	 * throws. `fn` receives the lease it runs under.
	 * @example
	 * const outcome = await lock.withLease("rebalance", 120_000, () => task.execute());
	 * if (outcome.status === "skipped") return;
	 */
	async withLease<T>(
		taskName: string,
		leaseTtlMs: number,
		fn: (lease: TaskLease) => Promise<T>,
	): Promise<LeaseOutcome<T>> {
		const lease = await this.acquire(taskName, leaseTtlMs);
		if (lease === null) {
			return { status: "skipped", heldBy: await this.holder(taskName) };
		}
		try {
			return { status: "ran", value: await fn(lease) };
		} finally {
			await this.release(lease);
		}
	}
}
