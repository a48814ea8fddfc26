import { describe, expect, it, vi } from "vitest";
import { type ExchangeError, NetworkError, ProtocolDesyncError } from "../shared/errors.js";
import { Decimal } from "../shared/decimal.js";
import { tradingSymbol } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import type { DepthView } from "../store/market-state.js";
import type { Level } from "../stream/types.js";
import type { BookDiff } from "./book.js";
import { type DepthSource, OrderBookReconciler, type OrderBookReconcilerConfig } from "./reconciler.js";

const symbol = tradingSymbol("QRLUSDT");

type Snapshot = { lastUpdateId: number; bids: Level[]; asks: Level[] };

function lv(price: string, quantity: string): Level {
	return { price: Decimal.from(price), quantity: Decimal.from(quantity) };
}

function snapshot(lastUpdateId: number): Snapshot {
	return { lastUpdateId, bids: [lv("0.25", "10")], asks: [lv("0.26", "5")] };
}

function diff(fromVersion: number, toVersion: number, bids: Level[] = [], asks: Level[] = []): BookDiff {
	return { fromVersion, toVersion, bids, asks };
}

/** Answers depth calls from `script` in order; the last entry repeats. */
function scriptedSource(script: readonly (number | ExchangeError)[]) {
	let calls = 0;
	const depth = vi.fn(async (): Promise<Result<Snapshot, ExchangeError>> => {
		const step = script[Math.min(calls, script.length - 1)];
		calls += 1;
		if (step === undefined) throw new Error("empty script");
		return typeof step === "number" ? ok(snapshot(step)) : err(step);
	});
	return { depth } satisfies DepthSource;
}

function reconciler(source: DepthSource, overrides: Partial<OrderBookReconcilerConfig> = {}) {
	return new OrderBookReconciler({ symbol, source, clock: new FakeClock(5_000), ...overrides });
}

async function live(r: OrderBookReconciler, first: BookDiff) {
	const res = await r.ingest(first);
	if (!res.ok) throw res.error;
	return res.value;
}

describe("OrderBookReconciler", () => {
	it("snapshots on the first diff and replays diffs buffered meanwhile", async () => {
		let release: (value: Result<Snapshot, ExchangeError>) => void = () => {};
		const source: DepthSource = {
			depth: () =>
				new Promise((resolve) => {
					release = resolve;
				}),
		};
		const r = reconciler(source);

		const first = r.ingest(diff(99, 101, [lv("0.25", "12")]));
		expect(await r.ingest(diff(102, 103, [], [lv("0.27", "4")]))).toEqual({ ok: true, value: "buffered" });
		expect(r.bufferedDiffs).toBe(2);

		release(ok(snapshot(100)));
		expect(await first).toEqual({ ok: true, value: "resynced" });

		const book = r.current;
		expect(book?.version).toBe(103);
		expect(book?.bids[0]?.quantity.toString()).toBe("12");
		expect(book?.asks.map((l) => l.price.toString())).toEqual(["0.26", "0.27"]);
		expect(r.bufferedDiffs).toBe(0);
	});

	it("applies in-sequence diffs and ignores stale ones", async () => {
		const r = reconciler(scriptedSource([100]));
		await live(r, diff(101, 101));

		expect(await r.ingest(diff(102, 104, [lv("0.24", "1")]))).toEqual({ ok: true, value: "applied" });
		expect(r.current?.version).toBe(104);
		expect(await r.ingest(diff(90, 103))).toEqual({ ok: true, value: "stale" });
		expect(r.current?.version).toBe(104);
	});

	it("rebuilds from a fresh snapshot on a version gap", async () => {
		const source = scriptedSource([100, 104]);
		const r = reconciler(source);
		const resyncs = vi.fn();
		r.events.on("resync", resyncs);
		await live(r, diff(101, 102));

		const res = await r.ingest(diff(105, 106, [lv("0.25", "0")]));

		expect(res).toEqual({ ok: true, value: "resynced" });
		expect(source.depth).toHaveBeenCalledTimes(2);
		expect(resyncs.mock.calls.map((c) => c[0])).toEqual(["initial", "gap"]);
		expect(r.current?.version).toBe(106);
		expect(r.current?.bids).toEqual([]);
	});

	it("fetches again when the snapshot is older than the buffered diffs", async () => {
		const source = scriptedSource([150, 199]);
		const r = reconciler(source);

		expect(await live(r, diff(200, 201))).toBe("resynced");
		expect(source.depth).toHaveBeenCalledTimes(2);
		expect(r.current?.version).toBe(201);
	});

	it("gives up a resync when snapshots never catch up", async () => {
		const r = reconciler(scriptedSource([10]), { maxSnapshotAttempts: 2 });

		const res = await r.ingest(diff(500, 501));
		expect(res.ok).toBe(false);
		if (!res.ok) expect(res.error).toBeInstanceOf(ProtocolDesyncError);
		expect(r.current).toBeNull();
	});

	it("keeps buffered diffs when the snapshot call fails and retries on the next diff", async () => {
		const source = scriptedSource([new NetworkError("down"), 100]);
		const r = reconciler(source);

		const failed = await r.ingest(diff(101, 101));
		expect(failed.ok).toBe(false);
		expect(r.current).toBeNull();

		expect(await live(r, diff(102, 102))).toBe("resynced");
		expect(r.current?.version).toBe(102);
	});

	it("surfaces repeated gaps past the threshold", async () => {
		const r = reconciler(scriptedSource([100, 110, 120]), { desyncThreshold: 1 });
		const desync = vi.fn();
		r.events.on("desync", desync);
		await live(r, diff(101, 101));

		expect(await r.ingest(diff(111, 111))).toEqual({ ok: true, value: "resynced" });
		const second = await r.ingest(diff(121, 121));

		expect(second.ok).toBe(false);
		if (!second.ok) expect(second.error.code).toBe("PROTOCOL_DESYNC");
		expect(desync).toHaveBeenCalledTimes(1);
		expect(r.current?.version).toBe(121);
	});

	it("resets the gap count after a clean apply", async () => {
		const r = reconciler(scriptedSource([100, 110, 120]), { desyncThreshold: 1 });
		await live(r, diff(101, 101));

		await r.ingest(diff(111, 111));
		await r.ingest(diff(112, 112));
		const res = await r.ingest(diff(121, 121));

		expect(res).toEqual({ ok: true, value: "resynced" });
	});

	it("publishes each trusted ladder to the sink", async () => {
		const published: DepthView[] = [];
		const sink = {
			publishDepth: async (_symbol: string, view: DepthView) => {
				published.push(view);
			},
		};
		const r = reconciler(scriptedSource([100]), { sink, publishLevels: 1 });

		await live(r, diff(101, 101));
		await r.ingest(diff(102, 102, [lv("0.26", "0")], [lv("0.26", "0"), lv("0.3", "1")]));

		expect(published.map((v) => v.version)).toEqual([101, 102]);
		expect(published[1]).toEqual({ version: 102, bids: [["0.25", "10"]], asks: [["0.3", "1"]], at: 5_000 });
	});

	it("reset drops the ladder so the next diff snapshots again", async () => {
		const source = scriptedSource([100, 300]);
		const r = reconciler(source);
		await live(r, diff(101, 101));

		r.reset();
		expect(r.current).toBeNull();
		await live(r, diff(301, 301));
		expect(r.current?.version).toBe(301);
	});
});
