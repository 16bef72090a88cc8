import { aggregateDemand, salesAt } from '../demand';
import type { InventorySnapshot } from '../inventory-snapshot';
import { buildStockPolicyTable, resolveMinimumStock } from '../stock-policy';
import { consolidateStock } from '../stock-position';
import { buildStoreRegistry } from '../store-registry';
import type { EngineSettings } from '../replenishment';
import { matchRedistribution } from './matcher';
import type { RedistributionParams, RedistributionResult, StorePosition } from './types';

export function runRedistribution(
  snapshot: InventorySnapshot,
  params: RedistributionParams,
  settings: EngineSettings,
): RedistributionResult {
  const registry = buildStoreRegistry(snapshot.stores, settings);
  const policies = buildStockPolicyTable(snapshot);
  const demand = aggregateDemand(snapshot.sales, {
    windowDays: params.windowDays,
    asOf: params.asOf,
    registry,
  });
  const stock = consolidateStock(snapshot.stock, registry);

  const positions: StorePosition[] = stock.lines.map((line) => ({
    storeKey: line.storeKey,
    storeName: line.storeName,
    region: line.region,
    fixed: line.fixed,
    itemCode: line.itemCode,
    brand: line.brand,
    stock: line.available,
    minimumStock: resolveMinimumStock(policies, line.itemCode, line.brand, line.fixed),
    sales: salesAt(demand, line.storeKey, line.itemCode),
  }));

  const originStore = (params.originStore ?? '').trim();
  const suggestions = matchRedistribution(positions, {
    minDestinationSales: params.minDestinationSales,
    originStoreKey: originStore ? registry.resolve(originStore).key : null,
  });

  return {
    suggestions,
    summary: {
      totalSuggestions: suggestions.length,
      suggestedUnits: suggestions.reduce((total, row) => total + row.suggestedQuantity, 0),
      skippedSalesRows: demand.skippedRows,
      skippedStockRows: stock.skippedRows,
    },
  };
}
