export {
	type BookDiff,
	type DiffStep,
	type OrderBook,
	bestAsk,
	bestBid,
	bookFromSnapshot,
	midPrice,
	spread,
	stepDiff,
	toDepthView,
} from "./book.js";
export {
	type DepthSink,
	type DepthSource,
	type IngestOutcome,
	OrderBookReconciler,
	type OrderBookReconcilerConfig,
	type ReconcilerEvents,
} from "./reconciler.js";
