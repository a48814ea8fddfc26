export {
	REBALANCE_TASK,
	type RebalanceExchange,
	RebalanceTask,
	type RebalanceTaskConfig,
	type RebalanceTaskDeps,
	type StrategyMode,
	type TaskOutcome,
	type TaskStatus,
	clientOrderIdFor,
} from "./rebalance-task.js";
export {
	type RunnableTask,
	SECRET_HEADER,
	type TriggerAuth,
	type TriggerBody,
	type TriggerHeaders,
	type TriggerResponse,
	authorize,
	handleTrigger,
} from "./trigger.js";
export { type EventSource, MarketFeed, type MarketFeedDeps } from "./market-feed.js";
