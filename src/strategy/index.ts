export {
	MaCross,
	type MaSignal,
	PlanReason,
	type PortfolioBalances,
	RebalanceAction,
	type RebalancePlan,
	type StrategyDecision,
} from "./types.js";
export { computePlan } from "./rebalance.js";
export { calcSMA, maCrossover } from "./ma-signal.js";
export { CostFilter, type CostFilterConfig } from "./cost-filter.js";
export { StrategyEvaluator, type StrategyEvaluatorConfig, intelligentPlan } from "./evaluator.js";
