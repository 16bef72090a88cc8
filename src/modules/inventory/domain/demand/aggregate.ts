import { normalizeItemCode } from '../../../../common/utils/text-normalize.utils';
import type { SalesMovementRecord } from '../inventory-snapshot';
import { parseMovementDay, parseQuantity, toDayNumber, toUnits } from '../quantities';
import type { StoreRegistry } from '../store-registry';

export interface DemandAggregate {
  windowDays: number;
  /** Units sold per `storeKey|itemCode`. */
  byStoreItem: ReadonlyMap<string, number>;
  /** Units sold per item across every store. */
  byItem: ReadonlyMap<string, number>;
  /** First brand seen in the history for each item. */
  brandByItem: ReadonlyMap<string, string>;
  /** Rows rejected as malformed (store, item, date or quantity). */
  skippedRows: number;
}

export function demandKey(storeKey: string, itemCode: string): string {
  return `${storeKey}|${itemCode}`;
}

export function salesAt(aggregate: DemandAggregate, storeKey: string, itemCode: string): number {
  return aggregate.byStoreItem.get(demandKey(storeKey, itemCode)) ?? 0;
}

/**
 * Sums sales per canonical store and item for movements dated inside
 * `[asOf - windowDays, asOf]` (calendar days, both ends included).
 * Central warehouse movements are not store demand and are left out.
 * Sums are truncated to whole units and clamped at zero once per key.
 */
export function aggregateDemand(
  records: readonly SalesMovementRecord[],
  options: { windowDays: number; asOf: Date; registry: StoreRegistry },
): DemandAggregate {
  const lastDay = toDayNumber(options.asOf);
  const firstDay = lastDay - options.windowDays;

  const byStoreItem = new Map<string, number>();
  const byItem = new Map<string, number>();
  const brandByItem = new Map<string, string>();
  const itemByKey = new Map<string, string>();
  let skippedRows = 0;

  for (const record of records) {
    const itemCode = normalizeItemCode(record.itemCode);
    const day = parseMovementDay(record.soldOn);
    const quantity = parseQuantity(record.quantity);
    const store = options.registry.resolve(record.storeRaw);

    if (
      itemCode.length === 0 ||
      store.key.length === 0 ||
      day === null ||
      quantity === null ||
      Number.isNaN(quantity)
    ) {
      skippedRows += 1;
      continue;
    }

    if (options.registry.isCentralWarehouse(store)) {
      continue;
    }

    const brand = (record.brand ?? '').trim();
    if (brand.length > 0 && !brandByItem.has(itemCode)) {
      brandByItem.set(itemCode, brand);
    }

    if (day < firstDay || day > lastDay) {
      continue;
    }

    const key = demandKey(store.key, itemCode);
    itemByKey.set(key, itemCode);
    addTo(byStoreItem, key, quantity);
  }

  const storeItemUnits = toUnitMap(byStoreItem);
  for (const [key, units] of storeItemUnits) {
    addTo(byItem, itemByKey.get(key) ?? key, units);
  }

  return {
    windowDays: options.windowDays,
    byStoreItem: storeItemUnits,
    byItem,
    brandByItem,
    skippedRows,
  };
}

function addTo(target: Map<string, number>, key: string, quantity: number): void {
  target.set(key, (target.get(key) ?? 0) + quantity);
}

function toUnitMap(source: ReadonlyMap<string, number>): Map<string, number> {
  const output = new Map<string, number>();
  for (const [key, quantity] of source) {
    output.set(key, toUnits(quantity));
  }
  return output;
}
