/**
 * Composition root: builds the collaborators each CLI command needs from one
 * AppConfig. Nothing here is a process-wide singleton.
 */

import { RateBudget } from "../lib/http/rate-budget.js";
import type { Logger } from "../lib/logger/index.js";
import { OrderBookReconciler } from "../orderbook/reconciler.js";
import { PositionLedger } from "../position/ledger.js";
import { ExchangeClient } from "../rest/exchange-client.js";
import { RestGateway } from "../rest/gateway.js";
import { SessionManager } from "../session/session-manager.js";
import type { AppConfig } from "../shared/config.js";
import { SystemClock } from "../shared/time.js";
import type { Clock } from "../shared/time.js";
import { MarketState } from "../store/market-state.js";
import { FileStateStore } from "../store/file-store.js";
import { MemoryStateStore } from "../store/memory-store.js";
import { TaskLock } from "../store/task-lock.js";
import type { StateStore } from "../store/types.js";
import { privateChannels, publicChannels } from "../stream/channels.js";
import { FrameDecoder } from "../stream/decoder.js";
import { ProtocolClient } from "../stream/protocol-client.js";
import { StreamSupervisor } from "../stream/supervisor.js";
import { MarketFeed } from "../tasks/market-feed.js";
import { RebalanceTask } from "../tasks/rebalance-task.js";
import type { TriggerAuth } from "../tasks/trigger.js";

export interface Runtime {
	readonly config: AppConfig;
	readonly logger: Logger;
	readonly clock: Clock;
	readonly store: StateStore;
	readonly gateway: RestGateway;
	readonly exchange: ExchangeClient;
	readonly market: MarketState;
	readonly lock: TaskLock;
	readonly ledger: PositionLedger;
}

export interface RuntimeOptions {
	readonly store?: StateStore;
	readonly clock?: Clock;
}

/**
 * The journal-backed store when `stateFile` is set, otherwise memory only.
 * Either way the caller closes it.
 */
export async function openStateStore(
	config: AppConfig,
	logger: Logger,
	clock: Clock = SystemClock,
): Promise<StateStore> {
	if (config.stateFile === null) {
		logger.warn("no state file configured; positions and sessions are lost on exit");
		return new MemoryStateStore({ clock });
	}
	return FileStateStore.open({ filePath: config.stateFile, clock, logger });
}

export function createRuntime(config: AppConfig, logger: Logger, options: RuntimeOptions = {}): Runtime {
	const clock = options.clock ?? SystemClock;
	const store = options.store ?? new MemoryStateStore({ clock });
	const gateway = new RestGateway({
		baseUrl: config.restBaseUrl,
		rateBudget: new RateBudget({ maxCalls: config.rateLimitPerSecond, windowMs: 1_000, clock }),
		credentials: config.credentials ?? undefined,
		clock,
		recvWindowMs: config.recvWindowMs,
		timeoutMs: config.httpTimeoutMs,
		audit: store,
		logger,
	});
	return {
		config,
		logger,
		clock,
		store,
		gateway,
		exchange: new ExchangeClient(gateway),
		market: new MarketState(store, {
			priceTtlMs: config.priceCacheTtlMs,
			depthTtlMs: config.depthCacheTtlMs,
		}),
		lock: new TaskLock({ store, clock, logger }),
		ledger: new PositionLedger({ store, logger }),
	};
}

export function createRebalanceTask(runtime: Runtime): RebalanceTask {
	const { config } = runtime;
	return new RebalanceTask(
		{
			symbol: config.symbol,
			baseAsset: config.baseAsset,
			quoteAsset: config.quoteAsset,
			targetRatio: config.targetRatio,
			thresholdPct: config.thresholdPct,
			minNotional: config.minNotional,
			mode: config.strategyMode,
			coreRatio: config.coreRatio,
			maShort: config.maShort,
			maLong: config.maLong,
			klineInterval: config.klineInterval,
			dryRun: config.dryRun,
			lockTtlMs: config.lockTtlMs,
			maxDailyTrades: config.maxDailyTrades,
			minTradeIntervalMs: config.minTradeIntervalMs,
			quantityDecimals: config.quantityDecimals,
		},
		runtime,
	);
}

export function triggerAuth(config: AppConfig): TriggerAuth {
	return { secret: config.triggerSecret, bearerToken: config.triggerBearerToken };
}

export interface StreamStack {
	readonly supervisor: StreamSupervisor;
	readonly session: SessionManager | null;
	readonly reconciler: OrderBookReconciler;
	readonly feed: MarketFeed;
	/** Starts the supervisor with the feed attached. */
	start(): void;
	/** Stops the supervisor, then closes the session server-side. */
	shutdown(): Promise<void>;
}

/**
 * Private channels and the session manager exist only when credentials are
 * configured.
 */
export function createStreamStack(runtime: Runtime, decoder: FrameDecoder = FrameDecoder.fromFile()): StreamStack {
	const { config, logger, clock, store } = runtime;
	const session =
		config.credentials === null ? null : new SessionManager({ api: runtime.exchange, store, clock, logger });
	const channels = [
		...publicChannels(config.symbol, config.klineInterval),
		...(session === null ? [] : privateChannels()),
	];
	const supervisor = new StreamSupervisor({
		channels,
		session,
		clock,
		logger,
		createClient: (listenKey) => new ProtocolClient({ decoder, url: config.wsUrl, listenKey, clock, logger }),
	});
	const reconciler = new OrderBookReconciler({
		symbol: config.symbol,
		source: runtime.exchange,
		sink: runtime.market,
		clock,
		logger,
	});
	const feed = new MarketFeed({ market: runtime.market, books: new Map([[config.symbol, reconciler]]), logger });

	let detach: (() => void) | null = null;
	return {
		supervisor,
		session,
		reconciler,
		feed,
		start() {
			detach ??= feed.attach(supervisor);
			supervisor.start();
		},
		async shutdown() {
			await supervisor.stop();
			detach?.();
			detach = null;
			await feed.drain();
			if (session === null) return;
			const closed = await session.close();
			if (!closed.ok) logger.warn({ error: closed.error.message }, "session not closed");
			session.dispose();
		},
	};
}
