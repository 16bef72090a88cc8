export {
  UNKNOWN_BRAND,
  UNKNOWN_COLOR,
  carriedKey,
  consolidateStock,
  consolidateWarehouse,
} from './consolidate';
export type { StockLine, StockPosition, WarehousePosition } from './consolidate';
