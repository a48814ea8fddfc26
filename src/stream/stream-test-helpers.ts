import type {
	WsCloseHandler,
	WsConnector,
	WsErrorHandler,
	WsFrameHandler,
	WsState,
	WsTransport,
} from "../lib/websocket/types.js";
import { type ExchangeError, NetworkError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { FrameDecoder } from "./decoder.js";

/** In-memory socket: records what the client sends, replays what a test feeds it. */
export class StubTransport implements WsTransport {
	readonly url: string;
	readonly sent: string[] = [];
	closedWith: { readonly code: number; readonly reason: string } | null = null;
	private state: WsState = "closed";
	private readonly connectError: Error | null;
	private readonly frameHandlers: WsFrameHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];

	constructor(url: string, connectError: Error | null = null) {
		this.url = url;
		this.connectError = connectError;
	}

	connect(): Promise<void> {
		if (this.connectError !== null) return Promise.reject(this.connectError);
		this.state = "open";
		return Promise.resolve();
	}

	send(data: string): Result<void, ExchangeError> {
		if (this.state !== "open") return err(new NetworkError("stub not open"));
		this.sent.push(data);
		return ok(undefined);
	}

	close(code = 1000, reason = ""): void {
		this.state = "closed";
		this.closedWith = { code, reason };
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

	receiveText(data: string): void {
		for (const h of [...this.frameHandlers]) h({ kind: "text", data });
	}

	receiveBinary(data: Uint8Array): void {
		for (const h of [...this.frameHandlers]) h({ kind: "binary", data });
	}

	/** Peer-initiated close. */
	drop(code = 1006, reason = "gone"): void {
		this.state = "closed";
		for (const h of [...this.closeHandlers]) h(code, reason);
	}

	fail(error: Error): void {
		for (const h of [...this.errorHandlers]) h(error);
	}

	/** Parsed JSON of every sent frame. */
	sentJson(): unknown[] {
		return this.sent.map((s) => JSON.parse(s));
	}
}

function register<H>(list: H[], handler: H): () => void {
	list.push(handler);
	return () => {
		const index = list.indexOf(handler);
		if (index !== -1) list.splice(index, 1);
	};
}

/**
 * Connector handing out a fresh StubTransport per connection. Entries of
 * `connectErrors` make the matching attempt (by index) fail its handshake.
 */
export function stubConnector(connectErrors: readonly (Error | null)[] = []): {
	connector: WsConnector;
	transports: StubTransport[];
	latest: () => StubTransport;
} {
	const transports: StubTransport[] = [];
	const connector: WsConnector = (url) => {
		const t = new StubTransport(url, connectErrors[transports.length] ?? null);
		transports.push(t);
		return t;
	};
	const latest = (): StubTransport => {
		const t = transports[transports.length - 1];
		if (t === undefined) throw new Error("no transport opened yet");
		return t;
	};
	return { connector, transports, latest };
}

/** Encodes a push envelope with the decoder's own schema. */
export function pushFrame(decoder: FrameDecoder, envelope: Record<string, unknown>): Uint8Array {
	const type = decoder.envelopeType;
	return type.encode(type.fromObject(envelope)).finish();
}

export function bookTickerFrame(decoder: FrameDecoder, symbol: string, bid: string, ask: string): Uint8Array {
	return pushFrame(decoder, {
		channel: `spot@public.aggre.bookTicker.v3.api.pb@100ms@${symbol}`,
		symbol,
		publicAggreBookTicker: { bidPrice: bid, bidQuantity: "1", askPrice: ask, askQuantity: "1" },
	});
}
