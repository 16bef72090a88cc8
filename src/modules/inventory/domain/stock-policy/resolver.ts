import { normalizeItemCode, normalizeLabel } from '../../../../common/utils/text-normalize.utils';
import type { StockPolicyRecord } from '../inventory-snapshot';
import { parseQuantity, toUnits } from '../quantities';
import {
  DEFAULT_CATEGORY_ALIASES,
  JGL_MARKER,
  JGM_MARKER,
  STOCK_POLICY_FALLBACKS,
  type StockPolicyCategory,
} from './constants';

export interface StockPolicyTable {
  quantities: ReadonlyMap<string, number>;
  fixedReferenceCodes: ReadonlySet<string>;
  multiBrandNames: ReadonlySet<string>;
}

export function buildStockPolicyTable(input: {
  policies: readonly StockPolicyRecord[];
  fixedReferenceCodes: readonly string[];
  multiBrandNames: readonly string[];
}): StockPolicyTable {
  const quantities = new Map<string, number>();
  for (const row of input.policies) {
    const category = (row.category ?? '').trim().toLowerCase();
    const quantity = parseQuantity(row.quantity);
    if (category.length === 0 || quantity === null || Number.isNaN(quantity)) {
      continue;
    }
    quantities.set(category, toUnits(quantity));
  }

  return {
    quantities,
    fixedReferenceCodes: new Set(
      input.fixedReferenceCodes.map((code) => normalizeItemCode(code)).filter(Boolean),
    ),
    multiBrandNames: new Set(
      input.multiBrandNames.map((brand) => normalizeLabel(brand)).filter(Boolean),
    ),
  };
}

/**
 * First matching rule wins:
 * fixed reference, multi-brand, JGL marker, JGM marker, default.
 */
export function resolveStockPolicyCategory(
  table: StockPolicyTable,
  itemCode: string,
  brand: string,
  storeIsFixed: boolean,
): StockPolicyCategory {
  const code = normalizeItemCode(itemCode);
  const label = normalizeLabel(brand);

  if (table.fixedReferenceCodes.has(code)) {
    return storeIsFixed ? 'fijo_especial' : 'fijo_normal';
  }
  if (table.multiBrandNames.has(label)) {
    return 'multimarca';
  }
  if (code.includes(JGL_MARKER) || label.includes(JGL_MARKER)) {
    return 'jgl';
  }
  if (code.includes(JGM_MARKER) || label.includes(JGM_MARKER)) {
    return 'jgm';
  }

  return 'default';
}

export function resolveMinimumStock(
  table: StockPolicyTable,
  itemCode: string,
  brand: string,
  storeIsFixed: boolean,
): number {
  return quantityFor(table, resolveStockPolicyCategory(table, itemCode, brand, storeIsFixed));
}

export function defaultMinimumStock(table: StockPolicyTable): number {
  return quantityFor(table, 'default');
}

export function isFixedReference(table: StockPolicyTable, itemCode: string): boolean {
  return table.fixedReferenceCodes.has(normalizeItemCode(itemCode));
}

function quantityFor(table: StockPolicyTable, category: StockPolicyCategory): number {
  if (category === 'default') {
    for (const alias of DEFAULT_CATEGORY_ALIASES) {
      const configured = table.quantities.get(alias);
      if (configured !== undefined) {
        return configured;
      }
    }
    return STOCK_POLICY_FALLBACKS.default;
  }

  return table.quantities.get(category) ?? STOCK_POLICY_FALLBACKS[category];
}
