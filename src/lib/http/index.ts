export { RateBudget } from "./rate-budget.js";
export type { RateBudgetConfig, RateBudgetStats } from "./rate-budget.js";
