export { type BuyFill, type CostBasisSnapshot, type SellFill, CostBasis } from "./cost-basis.js";
export { type PositionLedgerDeps, PositionLedger } from "./ledger.js";
export type { ConfirmedFill, PositionView } from "./types.js";
