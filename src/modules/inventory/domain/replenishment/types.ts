import type { NewItemIntroduction } from '../expansion';
import type { AllocationRow, AllocationStatus, DemandKind } from '../warehouse-allocation';

export interface ReplenishmentParams {
  replenishmentWindowDays: number;
  expansionWindowDays: number;
  /** Expansion-window total an item needs before it is pushed to new stores. */
  expansionMinSales: number;
  excludeWithoutMovement: boolean;
  includeFixedStores: boolean;
  onlySelling: boolean;
  newItems: NewItemIntroduction[];
  asOf: Date;
}

export interface EngineSettings {
  centralWarehouseMarker: string;
}

export interface FailedItem {
  itemCode: string;
  stage: DemandKind;
  message: string;
}

export interface ReplenishmentSummary {
  totalRows: number;
  byStatus: Record<AllocationStatus, number>;
  allocatedUnits: number;
  requestedUnits: number;
  skippedSalesRows: number;
  skippedStockRows: number;
  failedItems: FailedItem[];
}

export interface ReplenishmentResult {
  rows: AllocationRow[];
  summary: ReplenishmentSummary;
}
