export { RestGateway, API_KEY_HEADER, parseRetryAfter } from "./gateway.js";
export type { RestGatewayConfig } from "./gateway.js";
export {
	ExchangeClient,
	DEPTH_LIMITS,
	KLINE_INTERVALS,
	toOrderId,
	type DepthLimit,
	type KlineInterval,
	type MarketOrderRequest,
} from "./exchange-client.js";
export * from "./schemas.js";
export {
	DEFAULT_RETRY_CONFIG,
	type DispatchOptions,
	type HttpRequestInit,
	type HttpResponse,
	type HttpTransport,
	type RetryConfig,
} from "./types.js";
