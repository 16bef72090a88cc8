export {
  DEFAULT_CATEGORY_ALIASES,
  STOCK_POLICY_FALLBACKS,
} from './constants';
export type { StockPolicyCategory } from './constants';
export {
  buildStockPolicyTable,
  defaultMinimumStock,
  isFixedReference,
  resolveMinimumStock,
  resolveStockPolicyCategory,
} from './resolver';
export type { StockPolicyTable } from './resolver';
