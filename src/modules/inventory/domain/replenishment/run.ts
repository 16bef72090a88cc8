import { normalizeItemCode } from '../../../../common/utils/text-normalize.utils';
import { aggregateDemand, salesAt, type DemandAggregate } from '../demand';
import { InvalidWindowError } from '../errors';
import {
  dedupeNewItems,
  planExpansionDrafts,
  planNewItemDrafts,
  selectExpansionItems,
  type PlannerContext,
} from '../expansion';
import type { InventorySnapshot } from '../inventory-snapshot';
import {
  buildStockPolicyTable,
  isFixedReference,
  resolveMinimumStock,
  type StockPolicyTable,
} from '../stock-policy';
import {
  consolidateStock,
  consolidateWarehouse,
  type StockPosition,
} from '../stock-position';
import { buildStoreRegistry, compareText } from '../store-registry';
import {
  allocateDrafts,
  type AllocatedDraft,
  type AllocationRow,
  type AllocationStatus,
  type DemandDraft,
  type DemandKind,
} from '../warehouse-allocation';
import type {
  EngineSettings,
  FailedItem,
  ReplenishmentParams,
  ReplenishmentResult,
  ReplenishmentSummary,
} from './types';

export function assertValidWindows(params: {
  replenishmentWindowDays: number;
  expansionWindowDays: number;
}): void {
  if (params.expansionWindowDays < params.replenishmentWindowDays) {
    throw new InvalidWindowError(params.replenishmentWindowDays, params.expansionWindowDays);
  }
}

/**
 * Replenishment, expansion and new-item passes over one inventory snapshot.
 *
 * Each pass starts from the item's full warehouse quantity; no pass sees what
 * an earlier pass allocated. Output filters run after every pass so they never
 * change an allocation.
 */
export function runReplenishment(
  snapshot: InventorySnapshot,
  params: ReplenishmentParams,
  settings: EngineSettings,
): ReplenishmentResult {
  assertValidWindows(params);

  const registry = buildStoreRegistry(snapshot.stores, settings);
  const policies = buildStockPolicyTable(snapshot);
  const excludedCodes = new Set(
    snapshot.excludedCodes.map((code) => normalizeItemCode(code)).filter(Boolean),
  );

  const demand = aggregateDemand(snapshot.sales, {
    windowDays: params.replenishmentWindowDays,
    asOf: params.asOf,
    registry,
  });
  const expansionDemand = aggregateDemand(snapshot.sales, {
    windowDays: params.expansionWindowDays,
    asOf: params.asOf,
    registry,
  });
  const position = consolidateStock(snapshot.stock, registry);
  const warehouse = consolidateWarehouse(snapshot.warehouse);
  const context: PlannerContext = { registry, policies, position, demand };
  const availableFor = (itemCode: string): number =>
    warehouse.availableByItem.get(itemCode) ?? 0;

  const failedItems: FailedItem[] = [];
  const allocated: AllocatedDraft[] = [];
  const runPass = (kind: DemandKind, itemCode: string, plan: () => DemandDraft[]): void => {
    try {
      allocated.push(...allocateDrafts(kind, availableFor(itemCode), plan()));
    } catch (error: unknown) {
      failedItems.push({
        itemCode,
        stage: kind,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  };

  const baseDrafts = groupByItem(buildBaseDrafts(position, policies, demand, excludedCodes));
  for (const [itemCode, drafts] of baseDrafts) {
    runPass('replenishment', itemCode, () => drafts);
  }

  for (const itemCode of selectExpansionItems(
    expansionDemand,
    params.expansionMinSales,
    excludedCodes,
  )) {
    runPass('expansion', itemCode, () => planExpansionDrafts(itemCode, expansionDemand, context));
  }

  for (const item of dedupeNewItems(params.newItems)) {
    runPass('new_item', item.itemCode, () => planNewItemDrafts(item, context));
  }

  const rows = allocated
    .filter((entry) => entry.row.status !== 'OK')
    .filter((entry) => keepRow(entry, params, expansionDemand))
    .map((entry) => entry.row)
    .sort(compareAllocationRows);

  return {
    rows,
    summary: summarize(rows, {
      skippedSalesRows: demand.skippedRows,
      skippedStockRows: position.skippedRows + warehouse.skippedRows,
      failedItems,
    }),
  };
}

/**
 * One draft per store snapshot line. A store asks for the gap to its minimum
 * only when it sold the item in the window or the item is a fixed reference.
 */
function buildBaseDrafts(
  position: StockPosition,
  policies: StockPolicyTable,
  demand: DemandAggregate,
  excludedCodes: ReadonlySet<string>,
): DemandDraft[] {
  return position.lines
    .filter((line) => !excludedCodes.has(line.itemCode))
    .map((line) => {
      const sales = salesAt(demand, line.storeKey, line.itemCode);
      const minimum = resolveMinimumStock(policies, line.itemCode, line.brand, line.fixed);
      const eligible = sales > 0 || isFixedReference(policies, line.itemCode);

      return {
        storeKey: line.storeKey,
        storeName: line.storeName,
        region: line.region,
        fixed: line.fixed,
        sales,
        requested: eligible ? Math.max(minimum - line.available, 0) : 0,
        itemCode: line.itemCode,
        brand: line.brand,
        color: line.color,
        currentStock: line.available,
        minimumStock: minimum,
      };
    });
}

function groupByItem(drafts: readonly DemandDraft[]): Map<string, DemandDraft[]> {
  const groups = new Map<string, DemandDraft[]>();
  for (const draft of drafts) {
    const group = groups.get(draft.itemCode);
    if (group) {
      group.push(draft);
    } else {
      groups.set(draft.itemCode, [draft]);
    }
  }

  return groups;
}

function keepRow(
  entry: AllocatedDraft,
  params: ReplenishmentParams,
  expansionDemand: DemandAggregate,
): boolean {
  const { draft, row } = entry;

  if (!params.includeFixedStores && row.fixedStore) {
    return false;
  }
  if (params.onlySelling && row.salesInWindow <= 0) {
    return false;
  }
  if (
    params.excludeWithoutMovement &&
    (row.status === 'REABASTECER' || row.status === 'COMPRA') &&
    salesAt(expansionDemand, draft.storeKey, draft.itemCode) === 0
  ) {
    return false;
  }

  return true;
}

export function compareAllocationRows(left: AllocationRow, right: AllocationRow): number {
  return (
    compareText(left.region, right.region) ||
    compareText(left.store, right.store) ||
    compareText(left.brand, right.brand) ||
    compareText(left.itemCode, right.itemCode) ||
    compareText(left.status, right.status)
  );
}

function summarize(
  rows: readonly AllocationRow[],
  extra: Pick<ReplenishmentSummary, 'skippedSalesRows' | 'skippedStockRows' | 'failedItems'>,
): ReplenishmentSummary {
  const byStatus: Record<AllocationStatus, number> = {
    REABASTECER: 0,
    COMPRA: 0,
    EXPANSION: 0,
    NUEVO: 0,
    OK: 0,
  };
  let allocatedUnits = 0;
  let requestedUnits = 0;

  for (const row of rows) {
    byStatus[row.status] += 1;
    allocatedUnits += row.allocatedQuantity;
    requestedUnits += row.requestedQuantity;
  }

  return {
    totalRows: rows.length,
    byStatus,
    allocatedUnits,
    requestedUnits,
    ...extra,
  };
}
