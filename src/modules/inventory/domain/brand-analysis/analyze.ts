import { normalizeLabel } from '../../../../common/utils/text-normalize.utils';
import { aggregateDemand } from '../demand';
import type { InventorySnapshot } from '../inventory-snapshot';
import type { EngineSettings } from '../replenishment';
import { consolidateStock, type StockLine } from '../stock-position';
import { buildStoreRegistry, compareText } from '../store-registry';
import type { BrandAnalysis, BrandItemCoverage, StoreCoverage } from './types';

export const BRAND_ANALYSIS_WINDOW_DAYS = 30;
export const BRAND_ANALYSIS_TOP_ITEMS = 10;

/**
 * Coverage of a brand's best sellers across configured stores.
 * Brands match by case-insensitive substring. When nothing of the brand sold in
 * the window, the first items found in stock stand in with zero sales.
 */
export function analyzeBrand(
  snapshot: InventorySnapshot,
  brand: string,
  options: { asOf: Date } & EngineSettings,
): BrandAnalysis {
  const registry = buildStoreRegistry(snapshot.stores, options);
  const demand = aggregateDemand(snapshot.sales, {
    windowDays: BRAND_ANALYSIS_WINDOW_DAYS,
    asOf: options.asOf,
    registry,
  });
  const position = consolidateStock(snapshot.stock, registry);
  const needle = normalizeLabel(brand);

  const brandItems = [...position.infoByItem.entries()]
    .filter(([, info]) => normalizeLabel(info.brand).includes(needle))
    .map(([itemCode, info]) => ({
      itemCode,
      ...info,
      sales: demand.byItem.get(itemCode) ?? 0,
    }))
    .sort((left, right) => compareText(left.itemCode, right.itemCode));

  const selling = brandItems
    .filter((item) => item.sales > 0)
    .sort((left, right) => right.sales - left.sales || compareText(left.itemCode, right.itemCode));
  const top = (selling.length > 0 ? selling : brandItems).slice(0, BRAND_ANALYSIS_TOP_ITEMS);

  const stores = registry.configuredStores();
  const linesByItem = new Map<string, StockLine[]>();
  for (const line of position.lines) {
    const lines = linesByItem.get(line.itemCode) ?? [];
    lines.push(line);
    linesByItem.set(line.itemCode, lines);
  }

  const topItems: BrandItemCoverage[] = top.map((item) => {
    const lines = linesByItem.get(item.itemCode) ?? [];
    const stocked = new Set(lines.filter((line) => line.available > 0).map((line) => line.storeKey));
    const storesWith = stores.filter((store) => stocked.has(store.key)).map((store) => store.name);
    const storesWithout = stores
      .filter((store) => !stocked.has(store.key))
      .map((store) => store.name);

    return {
      itemCode: item.itemCode,
      brand: item.brand,
      color: item.color,
      salesInWindow: item.sales,
      storesWith,
      storesWithout,
      stockTotal: lines.reduce((total, line) => total + line.available, 0),
      potentialGap: storesWithout.length,
    };
  });

  const storeCoverage: StoreCoverage[] = stores.map((store) => {
    const carried = topItems.filter((item) => item.storesWith.includes(store.name));
    const stockOfTop = carried.reduce((total, item) => {
      const line = (linesByItem.get(item.itemCode) ?? []).find(
        (candidate) => candidate.storeKey === store.key,
      );
      return total + (line?.available ?? 0);
    }, 0);

    return {
      store: store.name,
      region: store.region,
      topItemsCarried: carried.length,
      topItemsMissing: topItems.length - carried.length,
      topItemsSales: carried.reduce((total, item) => total + item.salesInWindow, 0),
      topItemsStock: stockOfTop,
    };
  });

  const storesWithTopItems = new Set(topItems.flatMap((item) => item.storesWith)).size;

  return {
    brand: brand.trim(),
    windowDays: BRAND_ANALYSIS_WINDOW_DAYS,
    summary: {
      totalItems: topItems.length,
      totalStores: stores.length,
      storesWithTopItems,
      redistributionOpportunities: topItems.reduce((total, item) => total + item.potentialGap, 0),
    },
    topItems,
    stores: storeCoverage,
    recommendations: [`Se detectaron ${storesWithTopItems} tiendas con el top 10.`],
  };
}
