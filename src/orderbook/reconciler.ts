/**
 * OrderBookReconciler — REST snapshot plus sequenced diff stream.
 *
 * Diffs that arrive before a snapshot is in place are buffered and replayed
 * on top of it. A version gap discards the ladder and starts over from a new
 * snapshot. Gaps are recovered silently until they repeat more than
 * `desyncThreshold` times in a row, at which point each further one is
 * surfaced as a ProtocolDesyncError.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { DepthLimit } from "../rest/exchange-client.js";
import { type ExchangeError, ProtocolDesyncError } from "../shared/errors.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { DepthView } from "../store/market-state.js";
import type { Level } from "../stream/types.js";
import { type BookDiff, type OrderBook, bookFromSnapshot, stepDiff, toDepthView } from "./book.js";

/** REST depth endpoint; ExchangeClient satisfies it. */
export interface DepthSource {
	depth(
		symbol: TradingSymbol,
		limit: DepthLimit,
	): Promise<
		Result<{ readonly lastUpdateId: number; readonly bids: readonly Level[]; readonly asks: readonly Level[] }, ExchangeError>
	>;
}

/** Where reconciled ladders go; MarketState satisfies it. */
export interface DepthSink {
	publishDepth(symbol: TradingSymbol, depth: DepthView): Promise<void>;
}

export type IngestOutcome = "buffered" | "stale" | "applied" | "resynced";

export type ReconcilerEvents = {
	book: (book: OrderBook) => void;
	resync: (reason: "initial" | "gap") => void;
	desync: (error: ProtocolDesyncError) => void;
};

export interface OrderBookReconcilerConfig {
	readonly symbol: TradingSymbol;
	readonly source: DepthSource;
	readonly sink?: DepthSink;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** REST snapshot depth. Default 100. */
	readonly depthLimit?: DepthLimit;
	/** Levels per side written to the sink. Default 20. */
	readonly publishLevels?: number;
	/** Diffs held while a snapshot is in flight. Default 1000. */
	readonly maxBuffered?: number;
	/** Consecutive gaps tolerated before they are surfaced. Default 3. */
	readonly desyncThreshold?: number;
	/** Snapshot fetches per resync before giving up. Default 3. */
	readonly maxSnapshotAttempts?: number;
}

export class OrderBookReconciler {
	readonly events = new TypedEmitter<ReconcilerEvents>();

	private readonly symbol: TradingSymbol;
	private readonly source: DepthSource;
	private readonly sink: DepthSink | null;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly depthLimit: DepthLimit;
	private readonly publishLevels: number;
	private readonly maxBuffered: number;
	private readonly desyncThreshold: number;
	private readonly maxSnapshotAttempts: number;
	private book: OrderBook | null = null;
	private buffer: BookDiff[] = [];
	private syncing = false;
	private consecutiveGaps = 0;

	constructor(config: OrderBookReconcilerConfig) {
		this.symbol = config.symbol;
		this.source = config.source;
		this.sink = config.sink ?? null;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? silentLogger).child({ component: "orderbook", symbol: config.symbol });
		this.depthLimit = config.depthLimit ?? 100;
		this.publishLevels = config.publishLevels ?? 20;
		this.maxBuffered = config.maxBuffered ?? 1_000;
		this.desyncThreshold = config.desyncThreshold ?? 3;
		this.maxSnapshotAttempts = config.maxSnapshotAttempts ?? 3;
	}

	/** The trusted ladder, or null while none is in place. */
	get current(): OrderBook | null {
		return this.book;
	}

	get bufferedDiffs(): number {
		return this.buffer.length;
	}

	/**
	 * Feeds one diff. The first diff without a ladder triggers the initial
	 * snapshot; diffs arriving while that is in flight are buffered.
	 */
	async ingest(diff: BookDiff): Promise<Result<IngestOutcome, ExchangeError>> {
		if (this.book === null || this.syncing) {
			this.hold(diff);
			if (this.syncing) return ok("buffered");
			const res = await this.resync("initial");
			return res.ok ? ok("resynced") : res;
		}

		const step = stepDiff(this.book, diff, this.clock.now());
		switch (step.kind) {
			case "stale":
				return ok("stale");
			case "applied":
				this.consecutiveGaps = 0;
				await this.install(step.book);
				return ok("applied");
			case "gap": {
				this.logger.warn({ expected: step.expected, received: step.received }, "version gap");
				this.consecutiveGaps += 1;
				const surfaced = this.checkDesync(step.expected, step.received);
				this.book = null;
				this.hold(diff);
				const res = await this.resync("gap");
				if (!res.ok) return res;
				return surfaced === null ? ok("resynced") : err(surfaced);
			}
		}
	}

	/** Drops the ladder; the next diff starts from a fresh snapshot. */
	reset(): void {
		this.book = null;
		this.buffer = [];
	}

	private hold(diff: BookDiff): void {
		this.buffer.push(diff);
		if (this.buffer.length > this.maxBuffered) {
			this.buffer.splice(0, this.buffer.length - this.maxBuffered);
		}
	}

	private checkDesync(expected: number, received: number): ProtocolDesyncError | null {
		if (this.consecutiveGaps <= this.desyncThreshold) return null;
		const error = new ProtocolDesyncError("Depth stream keeps skipping versions", {
			symbol: this.symbol,
			expected,
			received,
			consecutiveGaps: this.consecutiveGaps,
		});
		this.logger.error({ consecutiveGaps: this.consecutiveGaps }, "depth stream desynchronised");
		this.events.emit("desync", error);
		return error;
	}

	/**
	 * Fetches a snapshot and replays the buffer over it. A buffered diff that
	 * is still ahead of the snapshot means the snapshot lagged; fetch again.
	 */
	private async resync(reason: "initial" | "gap"): Promise<Result<OrderBook, ExchangeError>> {
		this.syncing = true;
		this.events.emit("resync", reason);
		try {
			for (let attempt = 1; attempt <= this.maxSnapshotAttempts; attempt++) {
				const snap = await this.source.depth(this.symbol, this.depthLimit);
				if (!snap.ok) {
					this.logger.warn({ error: snap.error.message }, "depth snapshot failed");
					return snap;
				}
				let book = bookFromSnapshot(
					this.symbol,
					snap.value.lastUpdateId,
					snap.value.bids,
					snap.value.asks,
					this.clock.now(),
				);

				const pending = this.buffer;
				this.buffer = [];
				let lagged = -1;
				for (const [i, diff] of pending.entries()) {
					const step = stepDiff(book, diff, this.clock.now());
					if (step.kind === "gap") {
						lagged = i;
						break;
					}
					if (step.kind === "applied") book = step.book;
				}
				if (lagged === -1) {
					this.logger.info({ version: book.version, replayed: pending.length, reason }, "book synced");
					this.syncing = false;
					await this.install(book);
					return ok(book);
				}
				this.buffer = [...pending.slice(lagged), ...this.buffer];
				this.logger.debug({ attempt, snapshotVersion: snap.value.lastUpdateId }, "snapshot behind buffered diffs");
			}
			return err(
				new ProtocolDesyncError("Snapshot never caught up with the diff stream", {
					symbol: this.symbol,
					attempts: this.maxSnapshotAttempts,
				}),
			);
		} finally {
			this.syncing = false;
		}
	}

	/** The ladder is in place before the first await; later diffs see it. */
	private async install(book: OrderBook): Promise<void> {
		this.book = book;
		this.events.emit("book", book);
		if (this.sink === null) return;
		try {
			await this.sink.publishDepth(this.symbol, toDepthView(book, this.publishLevels));
		} catch (error) {
			this.logger.warn({ error: String(error) }, "depth not published");
		}
	}
}
