import { toUnits } from '../quantities';
import { allocateItem } from './allocate';
import type { AllocationCandidate, ExhaustionPolicy } from './types';

export const ALLOCATION_STATUSES = ['REABASTECER', 'COMPRA', 'EXPANSION', 'NUEVO', 'OK'] as const;
export type AllocationStatus = (typeof ALLOCATION_STATUSES)[number];

/** Which generator produced a demand row; also the stage reported for failed items. */
export type DemandKind = 'replenishment' | 'expansion' | 'new_item';

/** A demand row before the allocator has written its allocation. */
export interface DemandDraft extends AllocationCandidate {
  storeKey: string;
  region: string;
  itemCode: string;
  brand: string;
  color: string;
  currentStock: number;
  minimumStock: number;
}

export interface AllocationRow {
  region: string;
  store: string;
  fixedStore: boolean;
  itemCode: string;
  brand: string;
  color: string;
  salesInWindow: number;
  currentStock: number;
  warehouseStockBefore: number;
  warehouseStockAfter: number;
  minimumStock: number;
  requestedQuantity: number;
  allocatedQuantity: number;
  status: AllocationStatus;
}

export interface AllocatedDraft {
  draft: DemandDraft;
  row: AllocationRow;
}

const POLICY_BY_KIND: Record<DemandKind, ExhaustionPolicy> = {
  replenishment: 'stop',
  expansion: 'stop',
  new_item: 'force',
};

export function replenishmentStatus(requested: number, allocated: number): AllocationStatus {
  if (requested === 0) {
    return 'OK';
  }

  return allocated > 0 ? 'REABASTECER' : 'COMPRA';
}

/**
 * Runs one item's pass and finalizes its rows. Every draft must belong to the
 * same item; `available` is that item's warehouse quantity at pass start.
 */
export function allocateDrafts(
  kind: DemandKind,
  available: number,
  drafts: readonly DemandDraft[],
): AllocatedDraft[] {
  const before = toUnits(available);
  const { grants, remaining } = allocateItem(before, drafts, POLICY_BY_KIND[kind]);

  return grants.map(({ candidate, allocated }) => ({
    draft: candidate,
    row: {
      region: candidate.region,
      store: candidate.storeName,
      fixedStore: candidate.fixed,
      itemCode: candidate.itemCode,
      brand: candidate.brand,
      color: candidate.color,
      salesInWindow: candidate.sales,
      currentStock: candidate.currentStock,
      warehouseStockBefore: before,
      warehouseStockAfter: remaining,
      minimumStock: candidate.minimumStock,
      requestedQuantity: toUnits(candidate.requested),
      allocatedQuantity: allocated,
      status: statusFor(kind, toUnits(candidate.requested), allocated),
    },
  }));
}

function statusFor(kind: DemandKind, requested: number, allocated: number): AllocationStatus {
  switch (kind) {
    case 'expansion':
      return 'EXPANSION';
    case 'new_item':
      return 'NUEVO';
    default:
      return replenishmentStatus(requested, allocated);
  }
}
