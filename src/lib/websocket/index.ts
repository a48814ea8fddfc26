export type {
	WsCloseHandler,
	WsConfig,
	WsConnector,
	WsErrorHandler,
	WsFrame,
	WsFrameHandler,
	WsState,
	WsTransport,
} from "./types.js";
export { WsClient, wsConnector } from "./client.js";
