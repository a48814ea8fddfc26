import { describe, expect, it } from "vitest";
import { FakeClock } from "../shared/time.js";
import { LivenessWatchdog } from "./liveness.js";

describe("LivenessWatchdog", () => {
	it("turns quiet once the window passes without a touch", () => {
		const clock = new FakeClock(0);
		const dog = new LivenessWatchdog(1_000, clock);

		clock.advance(999);
		expect(dog.isQuiet()).toBe(false);
		clock.advance(1);
		expect(dog.isQuiet()).toBe(true);
	});

	it("touch restarts the window", () => {
		const clock = new FakeClock(0);
		const dog = new LivenessWatchdog(1_000, clock);

		clock.advance(900);
		dog.touch();
		clock.advance(900);

		expect(dog.isQuiet()).toBe(false);
		expect(dog.silenceMs()).toBe(900);
		expect(dog.lastTouchAt).toBe(900);
	});
});
