/**
 * Text control frames: subscription acks, liveness probes and their replies.
 */

export type ControlMessage =
	| { readonly type: "ping" }
	| { readonly type: "pong" }
	| { readonly type: "ack"; readonly channel: string }
	| { readonly type: "rejected"; readonly channels: readonly string[]; readonly message: string }
	| { readonly type: "unknown"; readonly raw: string };

export const PING_FRAME = JSON.stringify({ method: "PING" });
export const PONG_FRAME = JSON.stringify({ method: "PONG" });

export function subscriptionFrame(method: "SUBSCRIPTION" | "UNSUBSCRIPTION", channels: readonly string[]): string {
	return JSON.stringify({ method, params: channels });
}

const REJECTED_PREFIX = "Not Subscribed successfully!";

function field(obj: object, key: string): unknown {
	return key in obj ? Reflect.get(obj, key) : undefined;
}

/** Channels listed between brackets in a refusal message. */
function bracketed(message: string): string[] {
	const match = /\[([^\]]*)\]/.exec(message);
	if (match === null || match[1] === undefined) return [];
	return match[1]
		.split(",")
		.map((c) => c.trim())
		.filter((c) => c.length > 0);
}

export function parseControlFrame(raw: string): ControlMessage {
	const text = raw.trim();
	if (text.toUpperCase() === "PING") return { type: "ping" };
	if (text.toUpperCase() === "PONG") return { type: "pong" };

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch {
		return { type: "unknown", raw };
	}
	if (typeof parsed !== "object" || parsed === null) return { type: "unknown", raw };

	const method = field(parsed, "method");
	if (method === "PING") return { type: "ping" };
	if (method === "PONG") return { type: "pong" };

	const msg = field(parsed, "msg");
	const code = field(parsed, "code");
	if (typeof msg !== "string") return { type: "unknown", raw };
	if (msg === "PONG") return { type: "pong" };
	if (msg.startsWith(REJECTED_PREFIX) || (typeof code === "number" && code !== 0)) {
		return { type: "rejected", channels: bracketed(msg), message: msg };
	}
	return { type: "ack", channel: msg };
}
