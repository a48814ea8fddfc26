/**
 * SessionManager — owns the listen key that authorizes private channels.
 *
 * One live session per credential. Renewal runs at a fixed fraction of the
 * validity window; a failed renewal is retried once straight away, and a
 * second failure ends the session with an `expired` notification so the
 * stream owner can obtain a new key and re-subscribe. The session is kept in
 * the permanent store partition so a restarted process reuses it.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { type ExchangeError, SessionExpiredError } from "../shared/errors.js";
import { type ListenKey, listenKey, maskListenKey } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { Duration, SystemClock } from "../shared/time.js";
import { readJson, writePermanentJson } from "../store/json.js";
import { StoreKeys } from "../store/keys.js";
import type { StateStore } from "../store/types.js";

export interface Session {
	readonly listenKey: ListenKey;
	readonly createdAt: number;
	/** End of the validity window counted from the last issue or renewal. */
	readonly expiresAt: number;
	readonly renewals: number;
}

/** The listen-key endpoints; ExchangeClient satisfies it. */
export interface ListenKeyApi {
	createListenKey(): Promise<Result<ListenKey, ExchangeError>>;
	renewListenKey(key: ListenKey): Promise<Result<void, ExchangeError>>;
	closeListenKey(key: ListenKey): Promise<Result<void, ExchangeError>>;
}

export type SessionEvents = {
	created: (session: Session) => void;
	renewed: (session: Session) => void;
	expired: (error: SessionExpiredError) => void;
	closed: () => void;
};

export interface SessionManagerDeps {
	readonly api: ListenKeyApi;
	/** Where the live session is persisted; omit to keep it in memory only. */
	readonly store?: StateStore;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** Default 60 minutes. */
	readonly validityMs?: number;
	/** Fraction of the window after which renewal runs. Default 0.5. */
	readonly renewFraction?: number;
}

const storedSessionSchema = z.object({
	listenKey: z.string().min(1).transform(listenKey),
	createdAt: z.number(),
	expiresAt: z.number(),
	renewals: z.number().int().nonnegative(),
});

export class SessionManager {
	readonly events = new TypedEmitter<SessionEvents>();

	private readonly api: ListenKeyApi;
	private readonly store: StateStore | null;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly validityMs: number;
	private readonly renewFraction: number;
	private session: Session | null = null;
	private pending: Promise<Result<Session, ExchangeError>> | null = null;
	private renewTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(deps: SessionManagerDeps) {
		this.api = deps.api;
		this.store = deps.store ?? null;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger).child({ component: "session" });
		this.validityMs = deps.validityMs ?? Duration.minutes(60);
		this.renewFraction = deps.renewFraction ?? 0.5;
		if (!(this.renewFraction > 0 && this.renewFraction < 1)) {
			throw new RangeError(`renewFraction must be in (0, 1), got ${this.renewFraction}`);
		}
	}

	get current(): Session | null {
		return this.session;
	}

	/**
	 * Returns the live session, restoring a persisted one or creating a new
	 * one on first use. Concurrent callers share one in-flight request.
	 */
	ensureSession(): Promise<Result<Session, ExchangeError>> {
		const live = this.session;
		if (live !== null && live.expiresAt > this.clock.now()) {
			return Promise.resolve(ok(live));
		}
		if (this.pending === null) {
			this.pending = this.establish().finally(() => {
				this.pending = null;
			});
		}
		return this.pending;
	}

	/**
	 * Invalidates the key server-side. For graceful shutdown only: a restart
	 * should call dispose() and keep the key.
	 */
	async close(): Promise<Result<void, ExchangeError>> {
		this.cancelRenewal();
		const live = this.session;
		if (live === null) return ok(undefined);
		this.session = null;
		await this.forget();
		const res = await this.api.closeListenKey(live.listenKey);
		if (!res.ok) {
			this.logger.warn({ key: maskListenKey(live.listenKey), error: res.error.message }, "close failed");
			return res;
		}
		this.logger.info({ key: maskListenKey(live.listenKey) }, "session closed");
		this.events.emit("closed");
		return ok(undefined);
	}

	/** Stops the renewal timer without touching the server-side session. */
	dispose(): void {
		this.cancelRenewal();
	}

	private async establish(): Promise<Result<Session, ExchangeError>> {
		const restored = await this.restore();
		if (restored !== null) {
			this.session = restored;
			this.scheduleRenewal(restored);
			this.logger.info(
				{ key: maskListenKey(restored.listenKey), expiresAt: restored.expiresAt },
				"session restored",
			);
			return ok(restored);
		}

		const created = await this.api.createListenKey();
		if (!created.ok) {
			this.logger.error({ error: created.error.message }, "listen key creation failed");
			return created;
		}
		const now = this.clock.now();
		const session: Session = {
			listenKey: created.value,
			createdAt: now,
			expiresAt: now + this.validityMs,
			renewals: 0,
		};
		this.session = session;
		await this.persist(session);
		this.scheduleRenewal(session);
		this.logger.info({ key: maskListenKey(session.listenKey) }, "session created");
		this.events.emit("created", session);
		return ok(session);
	}

	/** A persisted session is reused only while it has time left to renew. */
	private async restore(): Promise<Session | null> {
		if (this.store === null) return null;
		const res = await readJson(this.store, StoreKeys.session(), storedSessionSchema);
		if (!res.ok) {
			this.logger.warn({ error: res.error.message }, "discarding unreadable stored session");
			return null;
		}
		const stored = res.value;
		if (stored === null) return null;
		return stored.expiresAt > this.clock.now() ? stored : null;
	}

	private scheduleRenewal(session: Session): void {
		this.cancelRenewal();
		const renewAt = session.expiresAt - this.validityMs * (1 - this.renewFraction);
		const delay = Math.max(0, renewAt - this.clock.now());
		this.renewTimer = setTimeout(() => {
			this.renewTimer = null;
			this.renew(session).catch((error: unknown) => {
				this.logger.error({ error: String(error) }, "renewal crashed");
			});
		}, delay);
	}

	private async renew(session: Session): Promise<void> {
		const key = maskListenKey(session.listenKey);
		let res = await this.api.renewListenKey(session.listenKey);
		if (!res.ok) {
			this.logger.warn({ key, error: res.error.message }, "renewal failed, retrying");
			res = await this.api.renewListenKey(session.listenKey);
		}
		if (this.session?.listenKey !== session.listenKey) return;

		if (!res.ok) {
			this.session = null;
			await this.forget();
			const error = new SessionExpiredError("Listen key renewal failed", {
				renewals: session.renewals,
				cause: res.error,
			});
			this.logger.error({ key, error: res.error.message }, "session lost");
			this.events.emit("expired", error);
			return;
		}

		const renewed: Session = {
			...session,
			expiresAt: this.clock.now() + this.validityMs,
			renewals: session.renewals + 1,
		};
		this.session = renewed;
		await this.persist(renewed);
		this.scheduleRenewal(renewed);
		this.logger.info({ key, renewals: renewed.renewals }, "session renewed");
		this.events.emit("renewed", renewed);
	}

	private cancelRenewal(): void {
		if (this.renewTimer !== null) {
			clearTimeout(this.renewTimer);
			this.renewTimer = null;
		}
	}

	private async persist(session: Session): Promise<void> {
		if (this.store === null) return;
		try {
			await writePermanentJson(this.store, StoreKeys.session(), session);
		} catch (error) {
			this.logger.warn({ error: String(error) }, "session not persisted");
		}
	}

	private async forget(): Promise<void> {
		if (this.store === null) return;
		try {
			await this.store.delete(StoreKeys.session());
		} catch (error) {
			this.logger.warn({ error: String(error) }, "stored session not removed");
		}
	}
}

