import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { FakeClock } from "../shared/time.js";
import { StoreKeys } from "./keys.js";
import { MemoryStateStore } from "./memory-store.js";
import { type TaskLease, TaskLock } from "./task-lock.js";

const HOLDERS = ["a", "b", "c"] as const;
const holderIndex = fc.integer({ min: 0, max: HOLDERS.length - 1 });

const step = fc.oneof(
	fc.record({ kind: fc.constant("acquire" as const), holder: holderIndex, ttl: fc.integer({ min: 1, max: 5_000 }) }),
	fc.record({ kind: fc.constant("release" as const), holder: holderIndex }),
	fc.record({ kind: fc.constant("advance" as const), ms: fc.integer({ min: 0, max: 6_000 }) }),
);

interface Live {
	readonly holder: string;
	readonly expiresAt: number;
}

describe("TaskLock (property-based)", () => {
	it("tracks a single-holder model under any interleaving of acquire, release and time", async () => {
		await fc.assert(
			fc.asyncProperty(fc.array(step, { minLength: 1, maxLength: 60 }), async (steps) => {
				const clock = new FakeClock(1_000);
				const store = new MemoryStateStore({ clock });
				const locks = HOLDERS.map((holderId) => new TaskLock({ store, clock, holderId }));
				const leases = new Map<string, TaskLease>();
				let live: Live | null = null;

				for (const s of steps) {
					if (live !== null && clock.now() >= live.expiresAt) live = null;

					if (s.kind === "advance") {
						clock.advance(s.ms);
						continue;
					}
					const holder = HOLDERS[s.holder] ?? "a";
					const lock = locks[s.holder];
					if (lock === undefined) continue;

					if (s.kind === "acquire") {
						const lease = await lock.acquire("rebalance", s.ttl);
						expect(lease !== null).toBe(live === null);
						if (lease !== null) {
							leases.set(holder, lease);
							live = { holder, expiresAt: clock.now() + s.ttl };
						}
					} else {
						const lease = leases.get(holder);
						if (lease === undefined) continue;
						const current = live !== null && live.holder === holder;
						expect(await lock.release(lease)).toBe(current);
						if (current) live = null;
						leases.delete(holder);
					}

					expect(await locks[0]?.holder("rebalance")).toBe(live?.holder ?? null);
					expect((await store.get(StoreKeys.taskLock("rebalance"))) !== null).toBe(live !== null);
				}
			}),
			{ numRuns: 200 },
		);
	});

	it("never lets a stale holder release a successor's lease", async () => {
		await fc.assert(
			fc.asyncProperty(fc.integer({ min: 1, max: 10_000 }), fc.integer({ min: 0, max: 10_000 }), async (ttl, extra) => {
				const clock = new FakeClock(0);
				const store = new MemoryStateStore({ clock });
				const first = new TaskLock({ store, clock, holderId: "first" });
				const second = new TaskLock({ store, clock, holderId: "second" });

				const stale = await first.acquire("rebalance", ttl);
				clock.advance(ttl + extra);
				const successor = await second.acquire("rebalance", 60_000);

				expect(stale).not.toBeNull();
				expect(successor).not.toBeNull();
				if (stale === null) return;
				expect(await first.release(stale)).toBe(false);
				expect(await second.holder("rebalance")).toBe("second");
			}),
			{ numRuns: 200 },
		);
	});
});
