import EventEmitter from "eventemitter3";

/** Event name to handler signature, e.g. `{ state: (s: ConnectionState) => void }`. */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/** Returned by subscribe(); calling it twice is harmless. */
export type Unsubscribe = () => void;

/**
 * eventemitter3 with compile-time checked event names and payloads.
 * Used for component notifications (connection state, session renewal);
 * market data flows through queues instead.
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as (...args: unknown[]) => void);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as (...args: unknown[]) => void);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/**
	 * Registers a handler and returns the function that removes it.
	 * @example
	 * const stop = supervisor.events.subscribe("state", (s) => log.info({ s }, "state"));
	 * stop();
	 */
	subscribe<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): Unsubscribe {
		this.on(event, handler);
		let active = true;
		return () => {
			if (!active) return;
			active = false;
			this.off(event, handler);
		};
	}

	/** @returns false when nobody listens */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
