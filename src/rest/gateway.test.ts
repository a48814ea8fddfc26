import { describe, expect, it } from "vitest";
import { createCredentials } from "../auth/credentials.js";
import { RateBudget } from "../lib/http/index.js";
import { z } from "../lib/validation/index.js";
import {
	AuthError,
	NetworkError,
	RateLimitError,
	RequestRejectedError,
	ServerError,
	ValidationError,
} from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { MemoryStateStore } from "../store/memory-store.js";
import { API_KEY_HEADER, RestGateway, parseRetryAfter } from "./gateway.js";
import { scriptedTransport, transportFailure } from "./gateway-test-helpers.js";
import type { HttpTransport } from "./types.js";

const priceSchema = z.object({ symbol: z.string(), price: z.string() });
const PRICE = { symbol: "QRLUSDT", price: "0.25" };
const opts = { signed: false, schema: priceSchema, endpoint: "ticker_price" } as const;

function setup(transport: HttpTransport, withCredentials = false) {
	const clock = new FakeClock(1_000_000);
	const sleeps: number[] = [];
	const audit = new MemoryStateStore({ clock });
	const gateway = new RestGateway({
		baseUrl: "https://api.example.test/",
		rateBudget: new RateBudget({ maxCalls: 1_000, windowMs: 1_000, clock }),
		credentials: withCredentials
			? createCredentials({ apiKey: "test-key", secret: "test-secret" })
			: undefined,
		clock,
		transport,
		retry: { maxAttempts: 4, baseDelayMs: 250, maxDelayMs: 8_000, jitterFactor: 0 },
		audit,
		sleep: async (ms) => {
			sleeps.push(ms);
		},
	});
	return { gateway, sleeps, audit, clock };
}

describe("RestGateway", () => {
	describe("public calls", () => {
		it("sends sorted query parameters without an api key", async () => {
			const { transport, requests } = scriptedTransport([{ body: PRICE }]);
			const { gateway } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/depth", { symbol: "QRLUSDT", limit: 5 }, opts);

			expect(res).toEqual({ ok: true, value: PRICE });
			expect(requests[0]?.url.toString()).toBe(
				"https://api.example.test/api/v3/depth?limit=5&symbol=QRLUSDT",
			);
			expect(requests[0]?.init.headers[API_KEY_HEADER]).toBeUndefined();
		});

		it("writes the raw body to the audit key", async () => {
			const { transport } = scriptedTransport([{ body: '{"symbol":"QRLUSDT","price":"0.25"}' }]);
			const { gateway, audit } = setup(transport);

			await gateway.dispatch("GET", "/api/v3/ticker/price", { symbol: "QRLUSDT" }, opts);

			expect(await audit.get("exchange:raw:ticker_price")).toBe('{"symbol":"QRLUSDT","price":"0.25"}');
		});
	});

	describe("signed calls", () => {
		it("syncs server time first, then signs with the offset timestamp", async () => {
			const { transport, requests } = scriptedTransport([
				{ body: { serverTime: 1_000_500 } },
				{ body: PRICE },
			]);
			const { gateway } = setup(transport, true);

			const res = await gateway.dispatch("GET", "/api/v3/account", {}, { ...opts, signed: true });

			expect(res.ok).toBe(true);
			expect(gateway.clockOffsetMs).toBe(500);
			expect(requests.map((r) => r.url.pathname)).toEqual(["/api/v3/time", "/api/v3/account"]);
			const signed = requests[1];
			expect(signed?.url.searchParams.get("timestamp")).toBe("1000500");
			expect(signed?.url.searchParams.get("recvWindow")).toBe("5000");
			expect(signed?.url.searchParams.get("signature")).toMatch(/^[0-9a-f]{64}$/);
			expect(signed?.url.search.endsWith(`signature=${signed?.url.searchParams.get("signature")}`)).toBe(
				true,
			);
			expect(signed?.init.headers[API_KEY_HEADER]).toBe("test-key");
		});

		it("fails with AuthError when no credentials are configured", async () => {
			const { transport, requests } = scriptedTransport([{ body: { serverTime: 1_000_000 } }]);
			const { gateway } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/account", {}, { ...opts, signed: true });

			expect(res.ok).toBe(false);
			if (!res.ok) expect(res.error).toBeInstanceOf(AuthError);
			expect(requests).toHaveLength(1);
		});

		it("resyncs the clock once when the timestamp is rejected", async () => {
			const { transport, requests } = scriptedTransport([
				{ body: { serverTime: 1_000_000 } },
				{ status: 400, body: { code: 700003, msg: "Timestamp for this request is outside of the recvWindow." } },
				{ body: { serverTime: 1_003_000 } },
				{ body: PRICE },
			]);
			const { gateway } = setup(transport, true);

			const res = await gateway.dispatch("GET", "/api/v3/account", {}, { ...opts, signed: true });

			expect(res.ok).toBe(true);
			expect(gateway.clockOffsetMs).toBe(3_000);
			expect(requests[3]?.url.searchParams.get("timestamp")).toBe("1003000");
		});
	});

	describe("retries", () => {
		it("retries 5xx with doubling backoff", async () => {
			const { transport, requests } = scriptedTransport([
				{ status: 500, body: "" },
				{ status: 503, body: "" },
				{ body: PRICE },
			]);
			const { gateway, sleeps } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			expect(res.ok).toBe(true);
			expect(requests).toHaveLength(3);
			expect(sleeps).toEqual([250, 500]);
		});

		it("waits at least Retry-After on 429", async () => {
			const { transport } = scriptedTransport([
				{ status: 429, body: { msg: "Too many requests" }, headers: { "Retry-After": "2" } },
				{ body: PRICE },
			]);
			const { gateway, sleeps } = setup(transport);

			await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			expect(sleeps).toEqual([2_000]);
		});

		it("surfaces the last error once attempts run out", async () => {
			const { transport, requests } = scriptedTransport([{ status: 503, body: "" }]);
			const { gateway, sleeps } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			expect(res.ok).toBe(false);
			if (!res.ok) expect(res.error).toBeInstanceOf(ServerError);
			expect(requests).toHaveLength(4);
			expect(sleeps).toEqual([250, 500, 1_000]);
		});

		it("retries transport failures as network errors", async () => {
			const { transport, requests } = scriptedTransport([transportFailure("ECONNRESET"), { body: PRICE }]);
			const { gateway } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			expect(res.ok).toBe(true);
			expect(requests).toHaveLength(2);
		});

		it("classifies a persistent transport failure", async () => {
			const { transport } = scriptedTransport([transportFailure("ECONNREFUSED")]);
			const { gateway } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			if (res.ok) throw new Error("expected failure");
			expect(res.error).toBeInstanceOf(NetworkError);
		});

		it("does not retry other 4xx", async () => {
			const { transport, requests } = scriptedTransport([
				{ status: 400, body: { code: 30004, msg: "Insufficient position" } },
			]);
			const { gateway, sleeps } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			if (res.ok) throw new Error("expected failure");
			expect(res.error).toBeInstanceOf(RequestRejectedError);
			expect(res.error.message).toBe("Insufficient position");
			expect(res.error.context).toMatchObject({ status: 400, exchangeCode: "30004" });
			expect(requests).toHaveLength(1);
			expect(sleeps).toEqual([]);
		});

		it("does not retry 401", async () => {
			const { transport, requests } = scriptedTransport([{ status: 401, body: { msg: "bad key" } }]);
			const { gateway } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			if (res.ok) throw new Error("expected failure");
			expect(res.error).toBeInstanceOf(AuthError);
			expect(requests).toHaveLength(1);
		});
	});

	describe("non-idempotent calls", () => {
		const order = { ...opts, signed: true, idempotent: false } as const;

		it("does not resend after a 5xx, whose outcome is unknown", async () => {
			const { transport, requests } = scriptedTransport([
				{ body: { serverTime: 1_000_000 } },
				{ status: 503, body: "" },
				{ body: PRICE },
			]);
			const { gateway, sleeps } = setup(transport, true);

			const res = await gateway.dispatch("POST", "/api/v3/order", { symbol: "QRLUSDT" }, order);

			if (res.ok) throw new Error("expected failure");
			expect(res.error).toBeInstanceOf(ServerError);
			expect(requests.filter((r) => r.init.method === "POST")).toHaveLength(1);
			expect(sleeps).toEqual([]);
		});

		it("does not resend after a transport failure", async () => {
			const { transport, requests } = scriptedTransport([
				{ body: { serverTime: 1_000_000 } },
				transportFailure("ECONNRESET"),
				{ body: PRICE },
			]);
			const { gateway } = setup(transport, true);

			const res = await gateway.dispatch("POST", "/api/v3/order", {}, order);

			if (res.ok) throw new Error("expected failure");
			expect(res.error).toBeInstanceOf(NetworkError);
			expect(requests).toHaveLength(2);
		});

		it("still retries after a 429, which the exchange refused", async () => {
			const { transport, requests } = scriptedTransport([
				{ body: { serverTime: 1_000_000 } },
				{ status: 429, body: { msg: "Too many requests" }, headers: { "Retry-After": "1" } },
				{ body: PRICE },
			]);
			const { gateway, sleeps } = setup(transport, true);

			const res = await gateway.dispatch("POST", "/api/v3/order", {}, order);

			expect(res.ok).toBe(true);
			expect(requests).toHaveLength(3);
			expect(sleeps).toEqual([1_000]);
		});

		it("does not re-request a malformed body", async () => {
			const { transport, requests } = scriptedTransport([
				{ body: { serverTime: 1_000_000 } },
				{ body: { symbol: "QRLUSDT" } },
				{ body: PRICE },
			]);
			const { gateway } = setup(transport, true);

			const res = await gateway.dispatch("POST", "/api/v3/order", {}, order);

			if (res.ok) throw new Error("expected failure");
			expect(res.error).toBeInstanceOf(ValidationError);
			expect(requests).toHaveLength(2);
		});
	});

	describe("rate budget", () => {
		it("signs with the time the slot was granted", async () => {
			const clock = new FakeClock(1_000_000);
			const { transport, requests } = scriptedTransport([{ body: { serverTime: 1_000_000 } }, { body: PRICE }]);
			const gateway = new RestGateway({
				baseUrl: "https://api.example.test",
				rateBudget: new RateBudget({
					maxCalls: 1,
					windowMs: 1_000,
					clock,
					sleep: async (ms) => {
						clock.advance(ms);
					},
				}),
				credentials: createCredentials({ apiKey: "test-key", secret: "test-secret" }),
				clock,
				transport,
			});

			const res = await gateway.dispatch("GET", "/api/v3/account", {}, { ...opts, signed: true });

			expect(res.ok).toBe(true);
			expect(gateway.clockOffsetMs).toBe(0);
			expect(requests[1]?.url.searchParams.get("timestamp")).toBe("1001000");
		});
	});

	describe("validation", () => {
		it("re-requests a malformed body once", async () => {
			const { transport, requests } = scriptedTransport([{ body: { symbol: "QRLUSDT" } }, { body: PRICE }]);
			const { gateway } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			expect(res.ok).toBe(true);
			expect(requests).toHaveLength(2);
		});

		it("surfaces the second failure with endpoint and payload size", async () => {
			const { transport, requests } = scriptedTransport([{ body: "not json" }]);
			const { gateway } = setup(transport);

			const res = await gateway.dispatch("GET", "/api/v3/ticker/price", {}, opts);

			if (res.ok) throw new Error("expected failure");
			expect(res.error).toBeInstanceOf(ValidationError);
			expect(res.error.context).toMatchObject({ endpoint: "ticker_price", payloadBytes: 8 });
			expect(JSON.stringify(res.error.toJSON())).not.toContain("not json");
			expect(requests).toHaveLength(2);
		});
	});
});

describe("parseRetryAfter", () => {
	it("reads seconds", () => {
		expect(parseRetryAfter("3", 0)).toBe(3_000);
	});

	it("reads an HTTP date relative to now", () => {
		const now = Date.parse("2024-01-01T00:00:00Z");
		expect(parseRetryAfter("Mon, 01 Jan 2024 00:00:05 GMT", now)).toBe(5_000);
	});

	it("returns null for missing or unreadable values", () => {
		expect(parseRetryAfter(null, 0)).toBeNull();
		expect(parseRetryAfter("soon", 0)).toBeNull();
	});
});

describe("RateLimitError", () => {
	it("carries retryAfterMs in its JSON form", () => {
		expect(new RateLimitError("slow down", 1_500).toJSON()).toMatchObject({ retryAfterMs: 1_500 });
	});
});
