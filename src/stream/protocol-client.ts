/**
 * ProtocolClient — one socket, one channel set, one event queue.
 *
 * Server probes are answered from inside the frame callback, before the
 * frame reaches the queue. Push frames are decoded on arrival and queued for
 * the consumer. Silence longer than the quiet window is reported as
 * `degraded`; the owner decides what to do about it. A client is used for a
 * single connection; reconnecting means building a new one.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { wsConnector } from "../lib/websocket/client.js";
import type { WsConnector, WsFrame, WsTransport } from "../lib/websocket/types.js";
import {
	type DecodeError,
	type ExchangeError,
	NetworkError,
	SessionExpiredError,
	SubscriptionLimitError,
	classifyError,
} from "../shared/errors.js";
import type { ListenKey } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { Duration, SystemClock } from "../shared/time.js";
import { isPrivateChannel } from "./channels.js";
import { DegradedReason } from "./connection-state.js";
import { PING_FRAME, PONG_FRAME, parseControlFrame, subscriptionFrame } from "./control.js";
import type { FrameDecoder } from "./decoder.js";
import { EventQueue } from "./event-queue.js";
import { LivenessWatchdog } from "./liveness.js";
import type { StreamEvent } from "./types.js";

export const DEFAULT_WS_URL = "wss://wbs-api.mexc.com/ws";
export const MAX_SUBSCRIPTIONS = 30;

export interface ProtocolClientConfig {
	readonly decoder: FrameDecoder;
	readonly url?: string;
	/** Required before any private channel can be subscribed. */
	readonly listenKey?: ListenKey | null;
	readonly connector?: WsConnector;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** Per-connection channel ceiling. Default 30. */
	readonly maxSubscriptions?: number;
	/** Client PING cadence. Default 20s. */
	readonly pingIntervalMs?: number;
	/** Silence that counts as degraded. Default 60s. */
	readonly quietWindowMs?: number;
	/** Default 1s. */
	readonly livenessCheckMs?: number;
	readonly queueCapacity?: number;
}

export type EventStream = AsyncIterable<StreamEvent>;

export type ProtocolClientEvents = {
	degraded: (reason: DegradedReason, cause: ExchangeError | null) => void;
	subscription_rejected: (channels: readonly string[], message: string) => void;
	decode_error: (error: DecodeError) => void;
	closed: () => void;
};

type Phase = "idle" | "connecting" | "open" | "closed";

export class ProtocolClient {
	readonly events = new TypedEmitter<ProtocolClientEvents>();

	private readonly decoder: FrameDecoder;
	private readonly url: string;
	private readonly listenKey: ListenKey | null;
	private readonly connector: WsConnector;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly maxSubscriptions: number;
	private readonly pingIntervalMs: number;
	private readonly livenessCheckMs: number;
	private readonly watchdog: LivenessWatchdog;
	private readonly queue: EventQueue<StreamEvent>;
	private readonly active = new Set<string>();
	private readonly detach: (() => void)[] = [];
	private transport: WsTransport | null = null;
	private phase: Phase = "idle";
	private degradedReported = false;
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private livenessTimer: ReturnType<typeof setInterval> | null = null;

	constructor(config: ProtocolClientConfig) {
		this.decoder = config.decoder;
		this.url = config.url ?? DEFAULT_WS_URL;
		this.listenKey = config.listenKey ?? null;
		this.connector = config.connector ?? wsConnector;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? silentLogger).child({ component: "protocol-client" });
		this.maxSubscriptions = config.maxSubscriptions ?? MAX_SUBSCRIPTIONS;
		this.pingIntervalMs = config.pingIntervalMs ?? Duration.seconds(20);
		this.livenessCheckMs = config.livenessCheckMs ?? Duration.seconds(1);
		this.watchdog = new LivenessWatchdog(config.quietWindowMs ?? Duration.seconds(60), this.clock);
		this.queue = new EventQueue<StreamEvent>(config.queueCapacity, this.logger);
	}

	/** Local time of the last inbound frame (or of connect, before any). */
	get lastMessageAt(): number {
		return this.watchdog.lastTouchAt;
	}

	get activeChannels(): ReadonlySet<string> {
		return this.active;
	}

	get isOpen(): boolean {
		return this.phase === "open";
	}

	/** Events dropped because the consumer fell behind. */
	get droppedEvents(): number {
		return this.queue.dropped;
	}

	/**
	 * Opens the socket and subscribes `channels`. The returned stream ends
	 * when the client closes.
	 */
	async connect(channels: readonly string[]): Promise<Result<EventStream, ExchangeError>> {
		if (this.phase !== "idle") {
			return err(new NetworkError("Protocol client already used", { phase: this.phase }));
		}
		const wanted = unique(channels);
		const check = this.checkChannels(wanted, 0);
		if (!check.ok) return check;

		this.phase = "connecting";
		const transport = this.connector(this.connectionUrl());
		this.transport = transport;
		this.detach.push(
			transport.onFrame((frame) => this.handleFrame(frame)),
			transport.onClose((code, reason) => this.handleClose(code, reason)),
			transport.onError((error) => this.handleError(error)),
		);

		try {
			await transport.connect();
		} catch (error) {
			const cause = classifyError(error);
			this.logger.warn({ error: cause.message }, "connect failed");
			this.shutdown();
			return err(cause);
		}
		if (this.phase !== "connecting") {
			return err(new NetworkError("Protocol client closed while connecting"));
		}

		this.phase = "open";
		this.watchdog.touch();
		this.startTimers();
		this.logger.info({ channels: wanted.length, private: this.listenKey !== null }, "connected");

		if (wanted.length > 0) {
			const sub = this.subscribe(wanted);
			if (!sub.ok) {
				this.shutdown();
				return sub;
			}
		}
		return ok(this.queue);
	}

	/**
	 * Adds channels to this connection. Rejected as a whole when the result
	 * would exceed the ceiling; already-active channels are not re-sent.
	 */
	subscribe(channels: readonly string[]): Result<void, ExchangeError> {
		const fresh = unique(channels).filter((c) => !this.active.has(c));
		if (fresh.length === 0) return ok(undefined);
		const check = this.checkChannels(fresh, this.active.size);
		if (!check.ok) return check;

		const sent = this.send(subscriptionFrame("SUBSCRIPTION", fresh));
		if (!sent.ok) return sent;
		for (const c of fresh) this.active.add(c);
		return ok(undefined);
	}

	unsubscribe(channels: readonly string[]): Result<void, ExchangeError> {
		const present = unique(channels).filter((c) => this.active.has(c));
		if (present.length === 0) return ok(undefined);

		const sent = this.send(subscriptionFrame("UNSUBSCRIPTION", present));
		if (!sent.ok) return sent;
		for (const c of present) this.active.delete(c);
		return ok(undefined);
	}

	/** Closes the socket and ends the event stream. Idempotent. */
	close(): void {
		if (this.phase === "closed") return;
		const wasOpen = this.phase === "open" || this.phase === "connecting";
		this.shutdown();
		if (wasOpen) this.logger.info("closed");
	}

	private connectionUrl(): string {
		if (this.listenKey === null) return this.url;
		const sep = this.url.includes("?") ? "&" : "?";
		return `${this.url}${sep}listenKey=${encodeURIComponent(this.listenKey)}`;
	}

	private checkChannels(channels: readonly string[], activeCount: number): Result<void, ExchangeError> {
		if (activeCount + channels.length > this.maxSubscriptions) {
			return err(
				new SubscriptionLimitError("Subscription ceiling exceeded", {
					requested: channels.length,
					active: activeCount,
					limit: this.maxSubscriptions,
				}),
			);
		}
		if (this.listenKey === null && channels.some(isPrivateChannel)) {
			return err(new SessionExpiredError("Private channels need a listen key"));
		}
		return ok(undefined);
	}

	private send(data: string): Result<void, ExchangeError> {
		if (this.transport === null || this.phase !== "open") {
			return err(new NetworkError("Protocol client is not open", { phase: this.phase }));
		}
		return this.transport.send(data);
	}

	private handleFrame(frame: WsFrame): void {
		if (this.phase === "closed") return;
		this.watchdog.touch();
		if (frame.kind === "binary") {
			this.handlePush(frame.data);
			return;
		}

		const msg = parseControlFrame(frame.data);
		switch (msg.type) {
			case "ping": {
				const sent = this.send(PONG_FRAME);
				if (!sent.ok) this.logger.warn({ error: sent.error.message }, "pong failed");
				break;
			}
			case "pong":
				break;
			case "ack":
				this.logger.debug({ channel: msg.channel }, "subscription acknowledged");
				break;
			case "rejected":
				for (const c of msg.channels) this.active.delete(c);
				this.logger.warn({ channels: msg.channels, message: msg.message }, "subscription rejected");
				this.events.emit("subscription_rejected", msg.channels, msg.message);
				break;
			case "unknown":
				this.logger.debug({ size: msg.raw.length }, "unrecognised control frame");
				break;
		}
	}

	private handlePush(bytes: Uint8Array): void {
		const decoded = this.decoder.decode(bytes, this.clock.now());
		if (!decoded.ok) {
			this.logger.warn({ error: decoded.error.message, ...decoded.error.context }, "push frame dropped");
			this.events.emit("decode_error", decoded.error);
			return;
		}
		if (decoded.value !== null) this.queue.push(decoded.value);
	}

	private handleClose(code: number, reason: string): void {
		if (this.phase === "closed") return;
		this.logger.warn({ code, reason }, "socket closed by peer");
		this.reportDegraded(DegradedReason.SocketClosed, new NetworkError("Socket closed", { code, reason }));
		this.shutdown();
	}

	private handleError(error: Error): void {
		if (this.phase !== "open") return;
		const cause = classifyError(error);
		this.logger.warn({ error: cause.message }, "socket error");
		this.reportDegraded(DegradedReason.SocketError, cause);
	}

	private startTimers(): void {
		this.pingTimer = setInterval(() => {
			const sent = this.send(PING_FRAME);
			if (!sent.ok) this.logger.warn({ error: sent.error.message }, "ping failed");
		}, this.pingIntervalMs);
		this.livenessTimer = setInterval(() => {
			if (this.watchdog.isQuiet()) {
				this.reportDegraded(DegradedReason.Quiet, null);
			}
		}, this.livenessCheckMs);
	}

	private reportDegraded(reason: DegradedReason, cause: ExchangeError | null): void {
		if (this.degradedReported) return;
		this.degradedReported = true;
		if (reason === DegradedReason.Quiet) {
			this.logger.warn({ silenceMs: this.watchdog.silenceMs() }, "stream quiet");
		}
		this.events.emit("degraded", reason, cause);
	}

	private shutdown(): void {
		this.phase = "closed";
		if (this.pingTimer !== null) clearInterval(this.pingTimer);
		if (this.livenessTimer !== null) clearInterval(this.livenessTimer);
		this.pingTimer = null;
		this.livenessTimer = null;
		for (const remove of this.detach.splice(0)) remove();
		this.transport?.close(1000, "client closing");
		this.transport = null;
		this.active.clear();
		this.queue.close();
		this.events.emit("closed");
	}
}

function unique(channels: readonly string[]): string[] {
	return [...new Set(channels)];
}
