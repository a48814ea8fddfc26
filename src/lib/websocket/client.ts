import WebSocket from "ws";
import type { RawData } from "ws";
import { NetworkError } from "../../shared/errors.js";
import type { ExchangeError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsCloseHandler,
	WsConfig,
	WsConnector,
	WsErrorHandler,
	WsFrame,
	WsFrameHandler,
	WsState,
	WsTransport,
} from "./types.js";

function toBytes(data: RawData): Uint8Array {
	if (Array.isArray(data)) return Buffer.concat(data);
	if (data instanceof ArrayBuffer) return new Uint8Array(data);
	return data;
}

function toFrame(data: RawData, isBinary: boolean): WsFrame {
	const bytes = toBytes(data);
	return isBinary
		? { kind: "binary", data: bytes }
		: { kind: "text", data: Buffer.from(bytes).toString("utf8") };
}

function register<H>(list: H[], handler: H): () => void {
	list.push(handler);
	return () => {
		const index = list.indexOf(handler);
		if (index !== -1) list.splice(index, 1);
	};
}

/**
 * ws-backed transport. Network failures come back as Result or as
 * NetworkError rejections from connect(); nothing else throws.
 */
export class WsClient implements WsTransport {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly frameHandlers: WsFrameHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];

	constructor(config: WsConfig) {
		this.config = config;
	}

	connect(): Promise<void> {
		if (this.state !== "closed") {
			return Promise.reject(new NetworkError("WebSocket is already connecting or open"));
		}
		return new Promise<void>((resolve, reject) => {
			this.state = "connecting";
			const ws = new WebSocket(this.config.url, {
				handshakeTimeout: this.config.handshakeTimeoutMs ?? 10_000,
			});
			this.ws = ws;

			ws.on("open", () => {
				this.state = "open";
				resolve();
			});

			ws.on("message", (data, isBinary) => {
				const frame = toFrame(data, isBinary);
				for (const handler of [...this.frameHandlers]) handler(frame);
			});

			ws.on("close", (code, reason) => {
				const wasConnecting = this.state === "connecting";
				this.state = "closed";
				this.ws = null;
				if (wasConnecting) {
					reject(new NetworkError("WebSocket closed during handshake", { code }));
				}
				for (const handler of [...this.closeHandlers]) handler(code, reason.toString());
			});

			ws.on("error", (error) => {
				for (const handler of [...this.errorHandlers]) handler(error);
				if (this.state === "connecting") {
					this.state = "closed";
					this.ws = null;
					reject(new NetworkError("WebSocket connection failed", { cause: error }));
				}
			});
		});
	}

	send(data: string): Result<void, ExchangeError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new NetworkError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new NetworkError("WebSocket send failed", { cause: error }));
		}
	}

	close(code = 1000, reason = "client close"): void {
		if (this.ws === null) return;
		if (this.state === "connecting") {
			this.ws.terminate();
			return;
		}
		this.state = "closing";
		this.ws.close(code, reason);
	}

	getState(): WsState {
		return this.state;
	}

	onFrame(handler: WsFrameHandler): () => void {
		return register(this.frameHandlers, handler);
	}

	onClose(handler: WsCloseHandler): () => void {
		return register(this.closeHandlers, handler);
	}

	onError(handler: WsErrorHandler): () => void {
		return register(this.errorHandlers, handler);
	}
}

/** Default connector for production use. */
export const wsConnector: WsConnector = (url) => new WsClient({ url });
