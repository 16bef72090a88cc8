import { normalizeStoreKey } from '../../../../../common/utils/text-normalize.utils';
import type { RedistributionSuggestion } from '../../../domain/redistribution';
import type { AllocationRow, AllocationStatus } from '../../../domain/warehouse-allocation';
import type { ExportFormat } from '../../../dto/export-request.dto';
import type { SpreadsheetCell, SpreadsheetSheet } from '../../ports/spreadsheet-exporter.port';

const SHEET_NAME_MAX_LENGTH = 25;
const INVALID_SHEET_CHARS = /[[\]:*?\/\\]/g;
const FALLBACK_SHEET_NAME = 'Hoja';

export const GENERAL_HEADER = [
  'Region',
  'Tienda',
  'Cod.Barras',
  'Marca',
  'Color',
  'Ventas periodo',
  'Stock actual',
  'Stock bodega',
  'Stock bodega restante',
  'Stock minimo',
  'Cantidad solicitada',
  'Cantidad asignada',
  'Observacion',
];

export const PICKING_HEADER = ['Cod.Barras', 'Marca', 'Color', 'Cantidad', 'Observacion'];

export const REDISTRIBUTION_HEADER = [
  'Region',
  'Cod.Barras',
  'Marca',
  'Tienda origen',
  'Tienda destino',
  'Stock origen',
  'Stock destino',
  'Cantidad sugerida',
];

export interface AllocationExportFilters {
  stores?: string[];
  statuses?: AllocationStatus[];
  excludeZeroQuantity?: boolean;
  onlyPurchase?: boolean;
}

/**
 * Excel-safe sheet name: forbidden characters removed, truncated, and suffixed
 * with a counter when the (case-insensitive) name is already taken.
 */
export function toSheetName(name: string, taken: Set<string>): string {
  const base =
    name.replace(INVALID_SHEET_CHARS, '').trim().slice(0, SHEET_NAME_MAX_LENGTH).trim() ||
    FALLBACK_SHEET_NAME;

  let candidate = base;
  let counter = 2;
  while (taken.has(candidate.toLowerCase())) {
    candidate = `${base} (${counter})`;
    counter += 1;
  }

  taken.add(candidate.toLowerCase());
  return candidate;
}

/** Presentation filters; row values are never recomputed. */
export function applyExportFilters(
  rows: readonly AllocationRow[],
  filters: AllocationExportFilters,
): AllocationRow[] {
  const stores = filters.stores?.length
    ? new Set(filters.stores.map((store) => normalizeStoreKey(store)))
    : null;
  const statuses = filters.statuses?.length ? new Set(filters.statuses) : null;

  return rows.filter((row) => {
    if (stores && !stores.has(normalizeStoreKey(row.store))) {
      return false;
    }
    if (statuses && !statuses.has(row.status)) {
      return false;
    }
    if (filters.excludeZeroQuantity && row.allocatedQuantity === 0) {
      return false;
    }
    if (filters.onlyPurchase && row.status !== 'COMPRA') {
      return false;
    }
    return true;
  });
}

export function buildAllocationSheets(
  rows: readonly AllocationRow[],
  format: ExportFormat,
): SpreadsheetSheet[] {
  const header = format === 'picking' ? PICKING_HEADER : GENERAL_HEADER;
  const toCells = format === 'picking' ? pickingCells : generalCells;

  const named = withSheetNames();
  return groupInOrder(rows, (row) => row.store).map(([store, storeRows]) =>
    named({ name: store, header, rows: storeRows.map(toCells) }),
  );
}

export function filterSuggestionsByOrigin(
  suggestions: readonly RedistributionSuggestion[],
  stores: readonly string[] | undefined,
): RedistributionSuggestion[] {
  if (!stores?.length) {
    return [...suggestions];
  }

  const wanted = new Set(stores.map((store) => normalizeStoreKey(store)));
  return suggestions.filter((row) => wanted.has(normalizeStoreKey(row.originStore)));
}

export function buildRedistributionSheets(
  suggestions: readonly RedistributionSuggestion[],
): SpreadsheetSheet[] {
  const named = withSheetNames();
  return groupInOrder(suggestions, (row) => row.originStore).map(([origin, originRows]) =>
    named({
      name: origin,
      header: REDISTRIBUTION_HEADER,
      rows: originRows.map((row) => [
        row.region,
        row.itemCode,
        row.brand,
        row.originStore,
        row.destinationStore,
        row.originStock,
        row.destinationStock,
        row.suggestedQuantity,
      ]),
    }),
  );
}

function generalCells(row: AllocationRow): SpreadsheetCell[] {
  return [
    row.region,
    row.store,
    row.itemCode,
    row.brand,
    row.color,
    row.salesInWindow,
    row.currentStock,
    row.warehouseStockBefore,
    row.warehouseStockAfter,
    row.minimumStock,
    row.requestedQuantity,
    row.allocatedQuantity,
    row.status,
  ];
}

/** Picks what the warehouse ships, so a purchase-only row picks 0. */
function pickingCells(row: AllocationRow): SpreadsheetCell[] {
  return [row.itemCode, row.brand, row.color, row.allocatedQuantity, row.status];
}

function withSheetNames(): (sheet: SpreadsheetSheet) => SpreadsheetSheet {
  const taken = new Set<string>();
  return (sheet) => ({ ...sheet, name: toSheetName(sheet.name, taken) });
}

function groupInOrder<T>(items: readonly T[], keyOf: (item: T) => string): Array<[string, T[]]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  return [...groups.entries()];
}
