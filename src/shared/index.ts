export {
	type ListenKey,
	type OrderId,
	type TradingSymbol,
	listenKey,
	maskListenKey,
	orderId,
	tradingSymbol,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	ExchangeError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	ServerError,
	AuthError,
	RequestRejectedError,
	ValidationError,
	type ValidationIssue,
	DecodeError,
	SubscriptionLimitError,
	ProtocolDesyncError,
	SessionExpiredError,
	InsufficientPositionError,
	StoreError,
	ConfigError,
	SystemError,
	classifyError,
	errorForStatus,
	isAuthError,
	isRateLimitError,
	isValidationError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { OrderSide, oppositeSide, sideFromTradeType } from "./order-side.js";
export { type Clock, SystemClock, FakeClock, Duration, sleep } from "./time.js";
export { type BackoffConfig, BackoffPolicy, DEFAULT_BACKOFF, backoffDelay } from "./backoff.js";
export { type AppConfig, ENV_PREFIX, loadConfig, splitSymbol } from "./config.js";
