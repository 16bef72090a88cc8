import { normalizeItemCode } from '../../../../common/utils/text-normalize.utils';
import { salesAt, type DemandAggregate } from '../demand';
import {
  defaultMinimumStock,
  resolveMinimumStock,
  type StockPolicyTable,
} from '../stock-policy';
import {
  UNKNOWN_BRAND,
  UNKNOWN_COLOR,
  carriedKey,
  type StockPosition,
} from '../stock-position';
import type { StoreRegistry } from '../store-registry';
import type { DemandDraft } from '../warehouse-allocation';

export interface NewItemIntroduction {
  itemCode: string;
  brand: string;
  color?: string | null;
}

export interface PlannerContext {
  registry: StoreRegistry;
  policies: StockPolicyTable;
  position: StockPosition;
  /** Replenishment-window demand; ranks stores inside a pass. */
  demand: DemandAggregate;
}

/**
 * Items whose expansion-window total reaches `minSales`, excluded codes left out,
 * in item code order.
 */
export function selectExpansionItems(
  expansionDemand: DemandAggregate,
  minSales: number,
  excludedCodes: ReadonlySet<string>,
): string[] {
  const selected: string[] = [];
  for (const [itemCode, total] of expansionDemand.byItem) {
    if (total >= minSales && !excludedCodes.has(itemCode)) {
      selected.push(itemCode);
    }
  }

  return selected.sort();
}

/**
 * One zero-stock row per active store that has no snapshot row for the item.
 * Every row asks for the default policy minimum.
 */
export function planExpansionDrafts(
  itemCode: string,
  expansionDemand: DemandAggregate,
  context: PlannerContext,
): DemandDraft[] {
  const info = context.position.infoByItem.get(itemCode);
  const brand = info?.brand ?? expansionDemand.brandByItem.get(itemCode) ?? UNKNOWN_BRAND;
  const color = info?.color ?? UNKNOWN_COLOR;
  const minimum = defaultMinimumStock(context.policies);

  return context.registry
    .activeStores()
    .filter((store) => !context.position.carried.has(carriedKey(store.key, itemCode)))
    .map((store) => ({
      storeKey: store.key,
      storeName: store.name,
      region: store.region,
      fixed: store.fixed,
      sales: salesAt(context.demand, store.key, itemCode),
      requested: minimum,
      itemCode,
      brand,
      color,
      currentStock: 0,
      minimumStock: minimum,
    }));
}

/** One row per active store, asking for the store-aware resolved minimum. */
export function planNewItemDrafts(
  item: NewItemIntroduction,
  context: PlannerContext,
): DemandDraft[] {
  const itemCode = normalizeItemCode(item.itemCode);
  const brand = item.brand.trim() || UNKNOWN_BRAND;
  const color = (item.color ?? '').trim() || UNKNOWN_COLOR;

  return context.registry.activeStores().map((store) => {
    const minimum = resolveMinimumStock(context.policies, itemCode, brand, store.fixed);
    return {
      storeKey: store.key,
      storeName: store.name,
      region: store.region,
      fixed: store.fixed,
      sales: salesAt(context.demand, store.key, itemCode),
      requested: minimum,
      itemCode,
      brand,
      color,
      currentStock: 0,
      minimumStock: minimum,
    };
  });
}

/** Drops blank codes and repeated codes, keeping the first introduction of each. */
export function dedupeNewItems(items: readonly NewItemIntroduction[]): NewItemIntroduction[] {
  const seen = new Set<string>();
  const unique: NewItemIntroduction[] = [];

  for (const item of items) {
    const itemCode = normalizeItemCode(item.itemCode);
    if (itemCode.length === 0 || seen.has(itemCode)) {
      continue;
    }
    seen.add(itemCode);
    unique.push({ ...item, itemCode });
  }

  return unique;
}
