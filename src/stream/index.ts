export {
	STREAM_KLINE_INTERVALS,
	accountChannel,
	bookTickerChannel,
	dealsChannel,
	depthDiffChannel,
	isPrivateChannel,
	klineChannel,
	ordersChannel,
	privateChannels,
	publicChannels,
	tradeChannel,
	type PushInterval,
	type StreamKlineInterval,
} from "./channels.js";
export {
	type ConnectionSnapshot,
	ConnectionState,
	ConnectionStateMachine,
	type ConnectionTransition,
	DegradedReason,
} from "./connection-state.js";
export { type ControlMessage, PING_FRAME, PONG_FRAME, parseControlFrame, subscriptionFrame } from "./control.js";
export { DEFAULT_PROTO_PATH, FrameDecoder } from "./decoder.js";
export { EventQueue } from "./event-queue.js";
export { LivenessWatchdog } from "./liveness.js";
export {
	DEFAULT_WS_URL,
	type EventStream,
	MAX_SUBSCRIPTIONS,
	ProtocolClient,
	type ProtocolClientConfig,
	type ProtocolClientEvents,
} from "./protocol-client.js";
export {
	type ClientFactory,
	type EventHandler,
	type SessionSource,
	StreamSupervisor,
	type StreamSupervisorConfig,
	type SupervisorEvents,
} from "./supervisor.js";
export type * from "./types.js";
