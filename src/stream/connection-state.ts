/**
 * ConnectionStateMachine — validated lifecycle of one supervised stream.
 *
 * Connecting → Subscribed → Degraded → Connecting … → Closed.
 * History is bounded (last N transitions) for debugging.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export const ConnectionState = {
	Connecting: "connecting",
	/** Socket open and the channel set requested; liveness judged by data flow */
	Subscribed: "subscribed",
	/** Quiet, errored or recycled; torn down and awaiting reconnect */
	Degraded: "degraded",
	/** Terminal; only reached through explicit shutdown */
	Closed: "closed",
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

export const DegradedReason = {
	Quiet: "quiet",
	SocketClosed: "socket_closed",
	SocketError: "socket_error",
	ConnectFailed: "connect_failed",
	MaxAge: "max_age",
	SessionRotated: "session_rotated",
	PrivateRetry: "private_retry",
} as const;

export type DegradedReason = (typeof DegradedReason)[keyof typeof DegradedReason];

export type ConnectionTransition =
	| { readonly type: "subscribed" }
	| { readonly type: "degrade"; readonly reason: DegradedReason }
	| { readonly type: "reconnect" }
	| { readonly type: "close" };

export interface ConnectionSnapshot {
	readonly state: ConnectionState;
	readonly enteredAt: number;
	readonly reason: DegradedReason | null;
}

export interface TransitionError {
	readonly message: string;
	readonly from: ConnectionState;
	readonly transition: ConnectionTransition["type"];
}

export interface TransitionRecord {
	readonly from: ConnectionState;
	readonly to: ConnectionState;
	readonly transition: ConnectionTransition["type"];
	readonly timestamp: number;
}

const MAX_HISTORY = 100;

export class ConnectionStateMachine {
	private current: ConnectionState = ConnectionState.Connecting;
	private currentEnteredAt: number;
	private currentReason: DegradedReason | null = null;
	private readonly transitions: TransitionRecord[] = [];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.currentEnteredAt = clock.now();
	}

	state(): ConnectionState {
		return this.current;
	}

	snapshot(): ConnectionSnapshot {
		return { state: this.current, enteredAt: this.currentEnteredAt, reason: this.currentReason };
	}

	timeInState(): number {
		return this.clock.now() - this.currentEnteredAt;
	}

	history(): readonly TransitionRecord[] {
		return this.transitions;
	}

	transition(t: ConnectionTransition): Result<ConnectionState, TransitionError> {
		const from = this.current;
		const to = nextState(from, t);
		if (to === null) {
			return err({
				message: `Cannot transition from ${from} via ${t.type}`,
				from,
				transition: t.type,
			});
		}

		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		const now = this.clock.now();
		this.transitions.push({ from, to, transition: t.type, timestamp: now });
		this.current = to;
		this.currentEnteredAt = now;
		this.currentReason = t.type === "degrade" ? t.reason : null;
		return ok(to);
	}
}

function nextState(from: ConnectionState, t: ConnectionTransition): ConnectionState | null {
	if (from === ConnectionState.Closed) return null;
	switch (t.type) {
		case "subscribed":
			return from === ConnectionState.Connecting ? ConnectionState.Subscribed : null;
		case "degrade":
			return from === ConnectionState.Connecting || from === ConnectionState.Subscribed
				? ConnectionState.Degraded
				: null;
		case "reconnect":
			return from === ConnectionState.Degraded ? ConnectionState.Connecting : null;
		case "close":
			return ConnectionState.Closed;
	}
}
