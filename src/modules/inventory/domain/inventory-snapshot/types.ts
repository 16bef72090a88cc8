/**
 * Rows as they come out of the relational store. Every field may be missing
 * or malformed; the domain parses and validates them at the aggregation boundary.
 */

export type RawQuantity = number | string | null;
export type RawFlag = boolean | number | string | null;

export interface SalesMovementRecord {
  storeRaw: string | null;
  itemCode: string | null;
  brand: string | null;
  soldOn: Date | string | null;
  quantity: RawQuantity;
}

export interface StockSnapshotRecord {
  storeRaw: string | null;
  itemCode: string | null;
  brand: string | null;
  color: string | null;
  available: RawQuantity;
}

export interface WarehouseStockRecord {
  itemCode: string | null;
  available: RawQuantity;
}

export interface StockPolicyRecord {
  category: string | null;
  quantity: RawQuantity;
}

export interface StoreRegistryRecord {
  rawName: string | null;
  cleanName: string | null;
  region: string | null;
  fixed: RawFlag;
  storeType: string | null;
  active: RawFlag;
}

export interface InventoryReferenceData {
  policies: StockPolicyRecord[];
  fixedReferenceCodes: string[];
  multiBrandNames: string[];
  excludedCodes: string[];
  stores: StoreRegistryRecord[];
}

export interface InventorySnapshot extends InventoryReferenceData {
  sales: SalesMovementRecord[];
  stock: StockSnapshotRecord[];
  warehouse: WarehouseStockRecord[];
}
