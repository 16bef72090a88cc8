export type {
  InventoryReferenceData,
  InventorySnapshot,
  RawFlag,
  RawQuantity,
  SalesMovementRecord,
  StockPolicyRecord,
  StockSnapshotRecord,
  StoreRegistryRecord,
  WarehouseStockRecord,
} from './types';
