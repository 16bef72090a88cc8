import { normalizeItemCode } from '../../../../common/utils/text-normalize.utils';
import type { StockSnapshotRecord, WarehouseStockRecord } from '../inventory-snapshot';
import { parseQuantity, toUnits } from '../quantities';
import type { StoreRegistry } from '../store-registry';

export const UNKNOWN_BRAND = 'SIN MARCA';
export const UNKNOWN_COLOR = 'SIN COLOR';

export interface StockLine {
  storeKey: string;
  storeName: string;
  region: string;
  fixed: boolean;
  itemCode: string;
  brand: string;
  color: string;
  available: number;
}

export interface StockPosition {
  /** One line per canonical store and item, duplicates summed. */
  lines: StockLine[];
  /** `storeKey|itemCode` pairs that have a snapshot row, whatever the quantity. */
  carried: ReadonlySet<string>;
  /** Brand and color from the first snapshot row of each item. */
  infoByItem: ReadonlyMap<string, { brand: string; color: string }>;
  skippedRows: number;
}

export interface WarehousePosition {
  availableByItem: ReadonlyMap<string, number>;
  skippedRows: number;
}

export function carriedKey(storeKey: string, itemCode: string): string {
  return `${storeKey}|${itemCode}`;
}

/**
 * Canonicalizes store snapshots. Missing quantities count as zero and negative
 * ones are clamped; non-numeric quantities reject the row. The central
 * warehouse never appears as a store line.
 */
export function consolidateStock(
  records: readonly StockSnapshotRecord[],
  registry: StoreRegistry,
): StockPosition {
  const lines = new Map<string, StockLine>();
  const infoByItem = new Map<string, { brand: string; color: string }>();
  let skippedRows = 0;

  for (const record of records) {
    const itemCode = normalizeItemCode(record.itemCode);
    const store = registry.resolve(record.storeRaw);
    const quantity = parseQuantity(record.available);

    if (itemCode.length === 0 || store.key.length === 0 || Number.isNaN(quantity)) {
      skippedRows += 1;
      continue;
    }

    if (registry.isCentralWarehouse(store)) {
      continue;
    }

    const brand = (record.brand ?? '').trim() || UNKNOWN_BRAND;
    const color = (record.color ?? '').trim() || UNKNOWN_COLOR;
    if (!infoByItem.has(itemCode)) {
      infoByItem.set(itemCode, { brand, color });
    }

    const key = carriedKey(store.key, itemCode);
    const existing = lines.get(key);
    if (existing) {
      existing.available += quantity ?? 0;
      continue;
    }

    lines.set(key, {
      storeKey: store.key,
      storeName: store.name,
      region: store.region,
      fixed: store.fixed,
      itemCode,
      brand,
      color,
      available: quantity ?? 0,
    });
  }

  const consolidated = [...lines.values()].map((line) => ({
    ...line,
    available: toUnits(line.available),
  }));

  return {
    lines: consolidated,
    carried: new Set(lines.keys()),
    infoByItem,
    skippedRows,
  };
}

export function consolidateWarehouse(records: readonly WarehouseStockRecord[]): WarehousePosition {
  const totals = new Map<string, number>();
  let skippedRows = 0;

  for (const record of records) {
    const itemCode = normalizeItemCode(record.itemCode);
    const quantity = parseQuantity(record.available);
    if (itemCode.length === 0 || Number.isNaN(quantity)) {
      skippedRows += 1;
      continue;
    }

    totals.set(itemCode, (totals.get(itemCode) ?? 0) + (quantity ?? 0));
  }

  const availableByItem = new Map<string, number>();
  for (const [itemCode, total] of totals) {
    availableByItem.set(itemCode, toUnits(total));
  }

  return { availableByItem, skippedRows };
}
