/**
 * LivenessWatchdog — a stream is alive while frames flow, not while the
 * socket merely stays open. Every inbound frame, pongs included, touches it.
 */

import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export class LivenessWatchdog {
	private lastTouchMs: number;
	private readonly quietWindowMs: number;
	private readonly clock: Clock;

	constructor(quietWindowMs: number, clock: Clock = SystemClock) {
		this.quietWindowMs = quietWindowMs;
		this.clock = clock;
		this.lastTouchMs = clock.now();
	}

	touch(): void {
		this.lastTouchMs = this.clock.now();
	}

	get lastTouchAt(): number {
		return this.lastTouchMs;
	}

	silenceMs(): number {
		return this.clock.now() - this.lastTouchMs;
	}

	isQuiet(): boolean {
		return this.silenceMs() >= this.quietWindowMs;
	}
}
