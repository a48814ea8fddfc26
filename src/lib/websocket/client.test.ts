import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocketServer } from "ws";
import { isOk } from "../../shared/result.js";
import { WsClient } from "./client.js";
import type { WsFrame } from "./types.js";

function waitFor(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("WsClient", () => {
	let wss: WebSocketServer;
	let url: string;

	beforeEach(async () => {
		wss = new WebSocketServer({ host: "127.0.0.1", port: 0 });
		await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
		const addr = wss.address();
		url = `ws://127.0.0.1:${addr !== null && typeof addr === "object" ? addr.port : 0}`;
	});

	afterEach(async () => {
		for (const socket of wss.clients) socket.terminate();
		await new Promise<void>((resolve) => wss.close(() => resolve()));
	});

	it("starts closed and opens on connect", async () => {
		const client = new WsClient({ url });
		expect(client.getState()).toBe("closed");
		await client.connect();
		expect(client.getState()).toBe("open");
		client.close();
	});

	it("delivers text and binary frames with their kind", async () => {
		wss.on("connection", (ws) => {
			ws.send('{"msg":"PONG"}');
			ws.send(Buffer.from([1, 2, 3]), { binary: true });
		});

		const client = new WsClient({ url });
		const frames: WsFrame[] = [];
		client.onFrame((frame) => frames.push(frame));
		await client.connect();
		await waitFor(100);

		expect(frames).toHaveLength(2);
		expect(frames[0]).toEqual({ kind: "text", data: '{"msg":"PONG"}' });
		const binary = frames[1];
		expect(binary?.kind).toBe("binary");
		if (binary?.kind === "binary") expect(Array.from(binary.data)).toEqual([1, 2, 3]);
		client.close();
	});

	it("sends text to the server", async () => {
		const received: string[] = [];
		wss.on("connection", (ws) => {
			ws.on("message", (data) => received.push(data.toString()));
		});

		const client = new WsClient({ url });
		await client.connect();
		expect(isOk(client.send('{"method":"PING"}'))).toBe(true);
		await waitFor(100);

		expect(received).toEqual(['{"method":"PING"}']);
		client.close();
	});

	it("send before connect returns a NetworkError", () => {
		const result = new WsClient({ url }).send("x");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("NETWORK_ERROR");
	});

	it("connect rejects when already open", async () => {
		const client = new WsClient({ url });
		await client.connect();
		await expect(client.connect()).rejects.toThrow("already connecting or open");
		client.close();
	});

	it("reports server-initiated close with code and reason", async () => {
		wss.on("connection", (ws) => ws.close(4000, "max age"));
		const client = new WsClient({ url });
		const onClose = vi.fn();
		client.onClose(onClose);

		await client.connect();
		await waitFor(100);

		expect(onClose).toHaveBeenCalledWith(4000, "max age");
		expect(client.getState()).toBe("closed");
	});

	it("rejects with NetworkError when nothing listens", async () => {
		const port = (() => {
			const addr = wss.address();
			return addr !== null && typeof addr === "object" ? addr.port : 0;
		})();
		await new Promise<void>((resolve) => wss.close(() => resolve()));
		wss = new WebSocketServer({ noServer: true });

		const client = new WsClient({ url: `ws://127.0.0.1:${port}` });
		const onError = vi.fn();
		client.onError(onError);

		await expect(client.connect()).rejects.toMatchObject({ code: "NETWORK_ERROR" });
		expect(onError).toHaveBeenCalled();
		expect(client.getState()).toBe("closed");
	});

	it("removal functions detach handlers", async () => {
		wss.on("connection", (ws) => ws.send("hello"));
		const client = new WsClient({ url });
		const kept = vi.fn();
		const removed = vi.fn();
		client.onFrame(kept);
		const off = client.onFrame(removed);
		off();

		await client.connect();
		await waitFor(100);

		expect(removed).not.toHaveBeenCalled();
		expect(kept).toHaveBeenCalledWith({ kind: "text", data: "hello" });
		client.close();
	});
});
