import type { ExchangeError } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";

/**
 * WebSocket connection lifecycle state.
 * - `connecting`: handshake in progress
 * - `open`: frames may be sent
 * - `closing`: close initiated locally
 * - `closed`: terminated (initial state too)
 */
export type WsState = "connecting" | "open" | "closing" | "closed";

/** Inbound frame. Control messages arrive as text, push data as binary. */
export type WsFrame =
	| { readonly kind: "text"; readonly data: string }
	| { readonly kind: "binary"; readonly data: Uint8Array };

export type WsFrameHandler = (frame: WsFrame) => void;
export type WsCloseHandler = (code: number, reason: string) => void;
export type WsErrorHandler = (error: Error) => void;

/**
 * Socket seam between the protocol client and the ws library; tests supply
 * an in-memory implementation.
 */
export interface WsTransport {
	connect(): Promise<void>;
	send(data: string): Result<void, ExchangeError>;
	close(code?: number, reason?: string): void;
	getState(): WsState;
	/** Each registration returns its own removal function. */
	onFrame(handler: WsFrameHandler): () => void;
	onClose(handler: WsCloseHandler): () => void;
	onError(handler: WsErrorHandler): () => void;
}

/** Builds a fresh transport per connection attempt. */
export type WsConnector = (url: string) => WsTransport;

export interface WsConfig {
	/** ws:// or wss://, including any query string. */
	readonly url: string;
	/** Handshake must finish within this window. */
	readonly handshakeTimeoutMs?: number;
}
