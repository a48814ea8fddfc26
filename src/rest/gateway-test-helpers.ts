import type { HttpRequestInit, HttpResponse, HttpTransport } from "./types.js";

export interface ScriptedResponse {
	readonly status?: number;
	readonly body: string | object;
	readonly headers?: Record<string, string>;
}

export interface RecordedRequest {
	readonly url: URL;
	readonly init: HttpRequestInit;
}

/** Error instance carrying an errno-style code, as undici raises them. */
export function transportFailure(code: string): Error {
	return Object.assign(new Error(`connect ${code}`), { code });
}

/**
 * In-process transport replaying `script` in order. Entries that are Errors
 * are thrown instead of answered; a function entry computes the answer.
 * Once the script runs out the last entry repeats.
 */
export function scriptedTransport(
	script: ReadonlyArray<ScriptedResponse | Error | ((req: RecordedRequest) => ScriptedResponse)>,
): { transport: HttpTransport; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = [];
	const transport: HttpTransport = async (url, init) => {
		const req = { url: new URL(url), init };
		const step = script[Math.min(requests.length, script.length - 1)];
		requests.push(req);
		if (step === undefined) throw new Error("empty script");
		if (step instanceof Error) throw step;
		const res = typeof step === "function" ? step(req) : step;
		const headers = Object.fromEntries(
			Object.entries(res.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]),
		);
		const text = typeof res.body === "string" ? res.body : JSON.stringify(res.body);
		const response: HttpResponse = {
			status: res.status ?? 200,
			headers: { get: (name) => headers[name.toLowerCase()] ?? null },
			text: async () => text,
		};
		return response;
	};
	return { transport, requests };
}

/** Routes by pathname; used where the order of calls is not the point. */
export function routedTransport(
	routes: Record<string, ScriptedResponse | ((req: RecordedRequest) => ScriptedResponse)>,
): { transport: HttpTransport; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = [];
	const transport: HttpTransport = async (url, init) => {
		const req = { url: new URL(url), init };
		requests.push(req);
		const route = routes[`${init.method} ${req.url.pathname}`] ?? routes[req.url.pathname];
		if (route === undefined) {
			return { status: 404, headers: { get: () => null }, text: async () => '{"msg":"no route"}' };
		}
		const res = typeof route === "function" ? route(req) : route;
		const text = typeof res.body === "string" ? res.body : JSON.stringify(res.body);
		return { status: res.status ?? 200, headers: { get: () => null }, text: async () => text };
	};
	return { transport, requests };
}
