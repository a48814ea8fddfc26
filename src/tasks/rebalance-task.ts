/**
 * RebalanceTask: one scheduled rebalance, executed at most once at a time.
 *
 * Everything with side effects happens under the `rebalance` lease. A run
 * that cannot take the lease is a normal skip. The order carries a client id
 * derived from the lease token, so a placement with an unknown outcome can be
 * looked up instead of sent again.
 */

import { createHash } from "node:crypto";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { PositionLedger } from "../position/ledger.js";
import { CooldownGuard, DailyLimitGuard, checkAll } from "../risk/guards.js";
import { TradeJournal } from "../risk/trade-journal.js";
import type { TradeGuard } from "../risk/types.js";
import type { KlineInterval, MarketOrderRequest } from "../rest/exchange-client.js";
import type { AccountInfo, Candle, OrderAck, OrderStatus, TickerPrice } from "../rest/schemas.js";
import { Decimal } from "../shared/decimal.js";
import { type ExchangeError, classifyError } from "../shared/errors.js";
import { type OrderId, type TradingSymbol, orderId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/order-side.js";
import { type Result, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep } from "../shared/time.js";
import { writePermanentJson } from "../store/json.js";
import { StoreKeys } from "../store/keys.js";
import type { MarketState } from "../store/market-state.js";
import type { TaskLease, TaskLock } from "../store/task-lock.js";
import type { StateStore } from "../store/types.js";
import { StrategyEvaluator, intelligentPlan } from "../strategy/evaluator.js";
import { computePlan } from "../strategy/rebalance.js";
import { RebalanceAction, type RebalancePlan } from "../strategy/types.js";

type Call<T> = Promise<Result<T, ExchangeError>>;

/** The exchange calls a rebalance needs; ExchangeClient satisfies it. */
export interface RebalanceExchange {
	account(): Call<AccountInfo>;
	tickerPrice(symbol: TradingSymbol): Call<TickerPrice>;
	klines(symbol: TradingSymbol, interval: KlineInterval, limit: number): Call<Candle[]>;
	placeMarketOrder(req: MarketOrderRequest): Call<OrderAck>;
	getOrder(symbol: TradingSymbol, id: OrderId): Call<OrderStatus>;
	getOrderByClientId(symbol: TradingSymbol, clientOrderId: string): Call<OrderStatus>;
}

export type StrategyMode = "symmetric" | "intelligent";

export interface RebalanceTaskConfig {
	readonly symbol: TradingSymbol;
	readonly baseAsset: string;
	readonly quoteAsset: string;
	readonly targetRatio: Decimal;
	readonly thresholdPct: Decimal;
	readonly minNotional: Decimal;
	readonly mode: StrategyMode;
	readonly coreRatio: Decimal;
	readonly maShort: number;
	readonly maLong: number;
	readonly klineInterval: KlineInterval;
	readonly dryRun: boolean;
	readonly lockTtlMs: number;
	/** Executed trades allowed per UTC day. */
	readonly maxDailyTrades: number;
	/** Minimum delay between two executed trades. */
	readonly minTradeIntervalMs: number;
	/** Order quantities are truncated to this many decimals. */
	readonly quantityDecimals: number;
	/** Order status polls before giving up on a fill. Default 5. */
	readonly confirmAttempts?: number;
	/** Default 500ms. */
	readonly confirmDelayMs?: number;
}

export interface RebalanceTaskDeps {
	readonly exchange: RebalanceExchange;
	readonly lock: TaskLock;
	readonly market: MarketState;
	readonly ledger: PositionLedger;
	readonly store: StateStore;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export type TaskStatus = "executed" | "hold" | "skipped" | "error";

export interface TaskOutcome {
	readonly status: TaskStatus;
	readonly action: RebalanceAction | null;
	/** Base quantity ordered, or planned when nothing was sent. */
	readonly quantity: string;
	readonly reason: string;
	readonly plan: RebalancePlan | null;
	readonly orderId: OrderId | null;
	readonly error: ExchangeError | null;
}

export const REBALANCE_TASK = "rebalance";

const FILLED = "FILLED";
const PENDING_STATUSES: ReadonlySet<string> = new Set(["NEW", "PARTIALLY_FILLED"]);

/** `rb-` and 32 hex chars of the lease token's digest; fits the 36-char limit. */
export function clientOrderIdFor(lease: TaskLease): string {
	return `rb-${createHash("sha256").update(lease.token).digest("hex").slice(0, 32)}`;
}

export class RebalanceTask {
	private readonly config: RebalanceTaskConfig;
	private readonly exchange: RebalanceExchange;
	private readonly lock: TaskLock;
	private readonly market: MarketState;
	private readonly ledger: PositionLedger;
	private readonly store: StateStore;
	private readonly journal: TradeJournal;
	private readonly guards: readonly TradeGuard[];
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(config: RebalanceTaskConfig, deps: RebalanceTaskDeps) {
		this.config = config;
		this.exchange = deps.exchange;
		this.lock = deps.lock;
		this.market = deps.market;
		this.ledger = deps.ledger;
		this.store = deps.store;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger).child({ component: "rebalance", symbol: config.symbol });
		this.journal = new TradeJournal({ store: deps.store, ...(deps.logger && { logger: deps.logger }) });
		this.guards = [DailyLimitGuard.create(config.maxDailyTrades), CooldownGuard.create(config.minTradeIntervalMs)];
	}

	/** Never throws; failures come back as `status: "error"`. */
	async run(): Promise<TaskOutcome> {
		try {
			const outcome = await this.lock.withLease(REBALANCE_TASK, this.config.lockTtlMs, (lease) => this.execute(lease));
			if (outcome.status === "skipped") {
				this.logger.info({ heldBy: outcome.heldBy }, "rebalance skipped; lease held");
				return makeOutcome({ status: "skipped", reason: "lease_held" });
			}
			return outcome.value;
		} catch (thrown) {
			const error = classifyError(thrown);
			this.logger.error({ error: error.message, code: error.code }, "rebalance failed");
			return makeOutcome({ status: "error", reason: error.code, error });
		}
	}

	private async execute(lease: TaskLease): Promise<TaskOutcome> {
		const snapshot = await this.refresh();
		if (!snapshot.ok) return this.failed(snapshot.error, null);
		const { base, quote, price } = snapshot.value;

		let plan = computePlan(
			{ base, quote },
			price,
			this.config.targetRatio,
			this.config.minNotional,
			this.config.thresholdPct,
		);
		if (this.config.mode === "intelligent") {
			const gated = await this.gate(plan, base, price);
			if (!gated.ok) return this.failed(gated.error, plan);
			plan = gated.value;
		}

		const at = this.clock.now();
		await writePermanentJson(this.store, StoreKeys.rebalancePlan(this.config.symbol), {
			...plan,
			mode: this.config.mode,
			dryRun: this.config.dryRun,
			at,
		});
		this.logger.info(
			{ action: plan.action, quantity: plan.quantity.toString(), reason: plan.reason, price: price.toString() },
			"plan computed",
		);

		if (plan.action === RebalanceAction.Hold) {
			return makeOutcome({ status: "hold", action: plan.action, reason: plan.reason, plan });
		}
		const quantity = plan.quantity.truncate(this.config.quantityDecimals);
		if (!quantity.isPositive()) {
			return makeOutcome({ status: "hold", action: plan.action, reason: "below_lot_size", plan });
		}

		const activity = await this.journal.activity(this.config.symbol, this.clock.now());
		if (!activity.ok) return this.failed(activity.error, plan);
		const verdict = checkAll(this.guards, {
			nowMs: () => this.clock.now(),
			dailyTrades: () => activity.value.dailyTrades,
			lastTradeAt: () => activity.value.lastTradeAt,
		});
		if (verdict.type === "block") {
			this.logger.info(
				{ guard: verdict.guard, currentValue: verdict.currentValue, threshold: verdict.threshold },
				"trade blocked",
			);
			return makeOutcome({
				status: "hold",
				action: plan.action,
				quantity: quantity.toString(),
				reason: verdict.reason,
				plan,
			});
		}

		if (this.config.dryRun) {
			return makeOutcome({
				status: "hold",
				action: plan.action,
				quantity: quantity.toString(),
				reason: "dry_run",
				plan,
			});
		}
		return this.trade(plan, quantity, clientOrderIdFor(lease));
	}

	/**
	 * Pulls balances and price from the exchange and publishes both. The
	 * ledger is trimmed to the base asset's total balance.
	 */
	private async refresh(): Call<{ base: Decimal; quote: Decimal; price: Decimal }> {
		const account = await this.exchange.account();
		if (!account.ok) return account;
		const ticker = await this.exchange.tickerPrice(this.config.symbol);
		if (!ticker.ok) return ticker;

		const at = this.clock.now();
		await this.market.publishBalances({
			balances: account.value.balances.map((b) => ({
				asset: b.asset,
				free: b.free.toString(),
				locked: b.locked.toString(),
			})),
			updatedAt: at,
		});
		await this.market.publishPrice(this.config.symbol, ticker.value.price, at);

		const balance = (asset: string) => account.value.balances.find((b) => b.asset === asset);
		const free = (asset: string) => balance(asset)?.free ?? Decimal.zero();
		const baseBalance = balance(this.config.baseAsset);
		const held = baseBalance ? baseBalance.free.add(baseBalance.locked) : Decimal.zero();
		const reconciled = await this.ledger.reconcile(this.config.symbol, held, at);
		if (!reconciled.ok) return reconciled;

		return ok({
			base: free(this.config.baseAsset),
			quote: free(this.config.quoteAsset),
			price: ticker.value.price,
		});
	}

	/** Crossover from recent candles, cost basis from the ledger. */
	private async gate(plan: RebalancePlan, held: Decimal, price: Decimal): Call<RebalancePlan> {
		const candles = await this.exchange.klines(this.config.symbol, this.config.klineInterval, this.config.maLong);
		if (!candles.ok) return candles;
		const basis = await this.ledger.get(this.config.symbol);
		if (!basis.ok) return basis;

		const evaluator = new StrategyEvaluator({ shortPeriod: this.config.maShort, longPeriod: this.config.maLong });
		evaluator.seed(candles.value.map((c) => c.close));
		const decision = evaluator.evaluate(price, basis.value.avgCost());
		this.logger.info(
			{
				cross: decision.signal?.cross ?? null,
				maShort: decision.signal?.maShort.toString() ?? null,
				maLong: decision.signal?.maLong.toString() ?? null,
				avgCost: decision.avgCost?.toString() ?? null,
				decision: decision.action,
			},
			"strategy evaluated",
		);
		return ok(intelligentPlan(plan, decision, held, this.config.coreRatio));
	}

	private async trade(plan: RebalancePlan, quantity: Decimal, clientOrderId: string): Promise<TaskOutcome> {
		const side = plan.action === RebalanceAction.Buy ? OrderSide.Buy : OrderSide.Sell;
		const placed = await this.place({ symbol: this.config.symbol, side, quantity, clientOrderId });
		if (!placed.ok) return this.failed(placed.error, plan);
		const id = placed.value;
		this.logger.info({ side, quantity: quantity.toString(), orderId: id, clientOrderId }, "order placed");

		const status = await this.confirm(id);
		if (!status.ok) return this.failed(status.error, plan, id);
		const executed = status.value.executedQty;
		if (executed.isZero()) {
			this.logger.error({ orderId: id, status: status.value.status }, "order not filled");
			return makeOutcome({
				status: "error",
				action: plan.action,
				quantity: quantity.toString(),
				reason: "order_not_filled",
				plan,
				orderId: id,
			});
		}

		const recorded = await this.ledger.recordFill(this.config.symbol, {
			side,
			quantity: executed,
			quoteQuantity: status.value.cummulativeQuoteQty,
			at: this.clock.now(),
		});
		if (!recorded.ok) {
			// the trade stands; only the ledger lags
			this.logger.error({ orderId: id, error: recorded.error.message }, "fill not recorded in ledger");
		}
		const journaled = await this.journal.record(this.config.symbol, {
			orderId: id,
			side,
			quantity: executed.toString(),
			quoteQuantity: status.value.cummulativeQuoteQty.toString(),
			reason: plan.reason,
			at: this.clock.now(),
		});
		if (!journaled.ok) {
			this.logger.error({ orderId: id, error: journaled.error.message }, "trade not recorded in journal");
		}
		const bookkeeping = !recorded.ok ? recorded.error : !journaled.ok ? journaled.error : null;
		return makeOutcome({
			status: "executed",
			action: plan.action,
			quantity: executed.toString(),
			reason: status.value.status === FILLED ? plan.reason : "partially_filled",
			plan,
			orderId: id,
			error: bookkeeping,
		});
	}

	/**
	 * Sends the order once. When the outcome is unknown (a 5xx, timeout or
	 * dropped connection) the order is looked up by its client id; the
	 * original error stands if the exchange does not know it.
	 */
	private async place(req: MarketOrderRequest & { readonly clientOrderId: string }): Call<OrderId> {
		const ack = await this.exchange.placeMarketOrder(req);
		if (ack.ok) return ok(orderId(ack.value.orderId));
		if (!ack.error.isRetryable) return ack;

		this.logger.warn({ clientOrderId: req.clientOrderId, code: ack.error.code }, "placement outcome unknown");
		const found = await this.exchange.getOrderByClientId(req.symbol, req.clientOrderId);
		if (!found.ok) {
			this.logger.warn(
				{ clientOrderId: req.clientOrderId, error: found.error.message },
				"order not found by client id",
			);
			return ack;
		}
		this.logger.info({ clientOrderId: req.clientOrderId, orderId: found.value.orderId }, "order recovered");
		return ok(orderId(found.value.orderId));
	}

	/** Polls until the order leaves NEW/PARTIALLY_FILLED or attempts run out. */
	private async confirm(id: OrderId): Call<OrderStatus> {
		const attempts = this.config.confirmAttempts ?? 5;
		const delayMs = this.config.confirmDelayMs ?? 500;
		let last = await this.exchange.getOrder(this.config.symbol, id);
		for (let attempt = 1; attempt < attempts; attempt++) {
			if (!last.ok || !PENDING_STATUSES.has(last.value.status)) return last;
			await sleep(delayMs);
			last = await this.exchange.getOrder(this.config.symbol, id);
		}
		return last;
	}

	private failed(error: ExchangeError, plan: RebalancePlan | null, id: OrderId | null = null): TaskOutcome {
		this.logger.error({ error: error.message, code: error.code, ...error.context }, "rebalance step failed");
		return makeOutcome({
			status: "error",
			action: plan?.action ?? null,
			quantity: plan?.quantity.toString() ?? "0",
			reason: error.code,
			plan,
			orderId: id,
			error,
		});
	}
}

function makeOutcome(
	fields: Partial<TaskOutcome> & { readonly status: TaskStatus; readonly reason: string },
): TaskOutcome {
	const plan = fields.plan ?? null;
	return {
		action: null,
		quantity: plan?.quantity.toString() ?? "0",
		plan,
		orderId: null,
		error: null,
		...fields,
	};
}
