/**
 * StreamSupervisor — keeps one protocol client alive for as long as the
 * process runs.
 *
 * Each connection goes Connecting → Subscribed, and ends in Degraded when the
 * client reports silence or a socket failure, when it reaches its maximum age,
 * or when the session rotates. The supervisor then backs off and reconnects
 * with the same desired channel set. Only stop() ends the loop. Consumers
 * register handlers; no business state lives here.
 */

import { TypedEmitter, type Unsubscribe } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { BackoffPolicy, type BackoffConfig } from "../shared/backoff.js";
import type { ExchangeError } from "../shared/errors.js";
import type { ListenKey } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { Duration, SystemClock, sleep } from "../shared/time.js";
import { isPrivateChannel } from "./channels.js";
import {
	type ConnectionSnapshot,
	ConnectionState,
	ConnectionStateMachine,
	type ConnectionTransition,
	DegradedReason,
} from "./connection-state.js";
import type { ProtocolClient } from "./protocol-client.js";
import type { StreamEvent } from "./types.js";

/** Source of listen keys for private channels; SessionManager satisfies it. */
export interface SessionSource {
	ensureSession(): Promise<Result<{ readonly listenKey: ListenKey }, ExchangeError>>;
	readonly events: {
		subscribe(event: "expired", handler: (error: ExchangeError) => void): Unsubscribe;
	};
}

export type ClientFactory = (listenKey: ListenKey | null) => ProtocolClient;

export interface StreamSupervisorConfig {
	/** Desired channel set, public and private, restored on every connection. */
	readonly channels: readonly string[];
	readonly createClient: ClientFactory;
	readonly session?: SessionSource | null;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly backoff?: BackoffConfig;
	readonly random?: () => number;
	/** A connection that lasts this long resets the backoff. Default 60s. */
	readonly stableAfterMs?: number;
	/** Recycle before the exchange's 24h cut-off. Default 23h. */
	readonly maxConnectionAgeMs?: number;
	/** How long a public-only connection runs before private channels are retried. Default 60s. */
	readonly privateRetryMs?: number;
}

export type EventHandler = (event: StreamEvent) => void;

export type SupervisorEvents = {
	state: (snapshot: ConnectionSnapshot) => void;
	event: EventHandler;
	handler_error: (error: unknown, event: StreamEvent) => void;
};

const DEFAULT_SUPERVISOR_BACKOFF: BackoffConfig = {
	baseDelayMs: 500,
	maxDelayMs: Duration.seconds(30),
	jitterFactor: 0.2,
};

/** Reasons that are not failures and reconnect without delay. */
const PLANNED_RECYCLES: ReadonlySet<DegradedReason> = new Set([
	DegradedReason.MaxAge,
	DegradedReason.SessionRotated,
	DegradedReason.PrivateRetry,
]);

export class StreamSupervisor {
	readonly events = new TypedEmitter<SupervisorEvents>();

	private readonly channels: readonly string[];
	private readonly createClient: ClientFactory;
	private readonly session: SessionSource | null;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly backoff: BackoffPolicy;
	private readonly stableAfterMs: number;
	private readonly maxConnectionAgeMs: number;
	private readonly privateRetryMs: number;
	private readonly machine: ConnectionStateMachine;
	private abort: AbortController | null = null;
	private loop: Promise<void> | null = null;
	private client: ProtocolClient | null = null;
	private lastMessageAtMs: number | null = null;
	private interrupt: ((reason: DegradedReason) => void) | null = null;
	private connections = 0;

	constructor(config: StreamSupervisorConfig) {
		this.channels = [...new Set(config.channels)];
		this.createClient = config.createClient;
		this.session = config.session ?? null;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? silentLogger).child({ component: "supervisor" });
		this.backoff = new BackoffPolicy(config.backoff ?? DEFAULT_SUPERVISOR_BACKOFF, config.random);
		this.stableAfterMs = config.stableAfterMs ?? Duration.seconds(60);
		this.maxConnectionAgeMs = config.maxConnectionAgeMs ?? Duration.hours(23);
		this.privateRetryMs = config.privateRetryMs ?? Duration.seconds(60);
		this.machine = new ConnectionStateMachine(this.clock);
	}

	state(): ConnectionState {
		return this.machine.state();
	}

	/** State plus the local time of the last frame seen on any connection. */
	status(): ConnectionSnapshot & { readonly lastMessageAt: number | null; readonly connections: number } {
		const lastMessageAt = this.client?.lastMessageAt ?? this.lastMessageAtMs;
		return { ...this.machine.snapshot(), lastMessageAt, connections: this.connections };
	}

	onEvent(handler: EventHandler): Unsubscribe {
		return this.events.subscribe("event", handler);
	}

	/** Starts the connection loop. Calling it while running does nothing. */
	start(): void {
		if (this.loop !== null || this.machine.state() === ConnectionState.Closed) return;
		const abort = new AbortController();
		this.abort = abort;
		const stopSessionWatch =
			this.session?.events.subscribe("expired", () => this.recycle(DegradedReason.SessionRotated)) ?? null;
		this.loop = this.run(abort.signal).finally(() => {
			stopSessionWatch?.();
		});
		this.logger.info({ channels: this.channels.length }, "supervisor started");
	}

	/** Ends the loop, closes the socket and waits for the loop to finish. */
	async stop(): Promise<void> {
		this.abort?.abort();
		this.interrupt?.(DegradedReason.SocketClosed);
		const loop = this.loop;
		if (loop !== null) await loop;
		if (this.machine.state() !== ConnectionState.Closed) {
			this.transition({ type: "close" });
		}
		this.loop = null;
	}

	/** Tears down the current connection and reconnects through the normal path. */
	recycle(reason: DegradedReason): void {
		this.interrupt?.(reason);
	}

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			const connectedAt = this.clock.now();
			const reason = await this.runConnection(signal);
			if (signal.aborted) break;

			this.transition({ type: "degrade", reason });
			if (this.clock.now() - connectedAt >= this.stableAfterMs) {
				this.backoff.reset();
			}
			const delay = PLANNED_RECYCLES.has(reason) ? 0 : this.backoff.nextDelay();
			this.logger.warn({ reason, delayMs: delay, attempt: this.backoff.attemptCount }, "reconnecting");
			await sleep(delay, signal);
			if (signal.aborted) break;
			this.transition({ type: "reconnect" });
		}
		this.transition({ type: "close" });
		this.logger.info("supervisor stopped");
	}

	/** Runs one connection to its end and returns why it ended. */
	private async runConnection(signal: AbortSignal): Promise<DegradedReason> {
		const { key, channels } = await this.resolveChannels();
		if (signal.aborted) return DegradedReason.SocketClosed;

		const client = this.createClient(key);
		this.client = client;
		let finish: (reason: DegradedReason) => void = () => {};
		const ended = new Promise<DegradedReason>((resolve) => {
			finish = resolve;
		});
		const stopDegraded = client.events.subscribe("degraded", (reason) => finish(reason));
		this.interrupt = (reason) => finish(reason);

		const res = await client.connect(channels);
		if (!res.ok) {
			this.logger.warn({ error: res.error.message, code: res.error.code }, "connect failed");
			this.detach(client, stopDegraded);
			return DegradedReason.ConnectFailed;
		}

		this.connections += 1;
		this.transition({ type: "subscribed" });
		const timers: ReturnType<typeof setTimeout>[] = [
			setTimeout(() => finish(DegradedReason.MaxAge), this.maxConnectionAgeMs),
		];
		if (key === null && this.channels.some(isPrivateChannel)) {
			timers.push(setTimeout(() => finish(DegradedReason.PrivateRetry), this.privateRetryMs));
		}

		const pump = this.pump(res.value);
		const reason = await ended;
		for (const t of timers) clearTimeout(t);
		this.detach(client, stopDegraded);
		await pump;
		return reason;
	}

	/** Private channels join only when a listen key is available. */
	private async resolveChannels(): Promise<{ key: ListenKey | null; channels: readonly string[] }> {
		const publicOnly = this.channels.filter((c) => !isPrivateChannel(c));
		if (publicOnly.length === this.channels.length) return { key: null, channels: this.channels };
		if (this.session === null) {
			this.logger.warn("no session source; private channels skipped");
			return { key: null, channels: publicOnly };
		}
		const res = await this.session.ensureSession();
		if (!res.ok) {
			this.logger.error({ error: res.error.message }, "session unavailable; connecting public channels only");
			return { key: null, channels: publicOnly };
		}
		return { key: res.value.listenKey, channels: this.channels };
	}

	private async pump(stream: AsyncIterable<StreamEvent>): Promise<void> {
		for await (const event of stream) {
			try {
				this.events.emit("event", event);
			} catch (error) {
				this.logger.error({ error: String(error), kind: event.kind }, "event handler failed");
				this.events.emit("handler_error", error, event);
			}
		}
	}

	private detach(client: ProtocolClient, stopDegraded: Unsubscribe): void {
		stopDegraded();
		this.interrupt = null;
		this.lastMessageAtMs = client.lastMessageAt;
		client.close();
		if (this.client === client) this.client = null;
	}

	private transition(t: ConnectionTransition): void {
		const res = this.machine.transition(t);
		if (!res.ok) {
			this.logger.debug({ from: res.error.from, transition: res.error.transition }, "transition ignored");
			return;
		}
		this.logger.info({ state: res.value }, "connection state");
		this.events.emit("state", this.machine.snapshot());
	}
}
