import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";

/**
 * EventQueue: bounded async queue between the socket callback and its
 * consumer. Decoding happens on push; business logic runs at the consumer's
 * pace. When full, the oldest entries are dropped, counted and logged.
 */
export class EventQueue<T> implements AsyncIterable<T> {
	private readonly items: { readonly value: T }[] = [];
	private readonly waiters: ((result: IteratorResult<T, undefined>) => void)[] = [];
	private readonly capacity: number;
	private closed = false;
	private droppedCount = 0;
	private readonly logger: Logger;

	/** @param capacity - 0 or less means unbounded */
	constructor(capacity = 10_000, logger: Logger = silentLogger) {
		this.capacity = capacity;
		this.logger = logger;
	}

	/** @returns false once the queue is closed */
	push(value: T): boolean {
		if (this.closed) return false;
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter({ value, done: false });
			return true;
		}
		this.items.push({ value });
		if (this.capacity > 0 && this.items.length > this.capacity) {
			const dropCount = this.items.length - this.capacity;
			this.items.splice(0, dropCount);
			this.droppedCount += dropCount;
			this.logger.warn({ dropped: this.droppedCount, capacity: this.capacity }, "event queue full; oldest dropped");
		}
		return true;
	}

	/** Ends iteration once buffered items are consumed. */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		for (const waiter of this.waiters.splice(0)) {
			waiter({ value: undefined, done: true });
		}
	}

	get size(): number {
		return this.items.length;
	}

	get dropped(): number {
		return this.droppedCount;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	next(): Promise<IteratorResult<T, undefined>> {
		const head = this.items.shift();
		if (head) return Promise.resolve({ value: head.value, done: false });
		if (this.closed) return Promise.resolve({ value: undefined, done: true });
		return new Promise((resolve) => {
			this.waiters.push(resolve);
		});
	}

	[Symbol.asyncIterator](): AsyncIterator<T, undefined> {
		return {
			next: () => this.next(),
			return: () => {
				this.close();
				return Promise.resolve({ value: undefined, done: true });
			},
		};
	}
}
