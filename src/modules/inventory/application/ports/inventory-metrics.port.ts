export type InventoryPipeline = 'replenishment' | 'redistribution' | 'brand_analysis';
export type InventoryRunOutcome = 'success' | 'invalid' | 'source_error' | 'error';
export type SkippedRowSource = 'sales' | 'stock';

export interface InventoryMetricsPort {
  incrementRun(input: { pipeline: InventoryPipeline; outcome: InventoryRunOutcome }): void;

  incrementRowsEmitted(input: { pipeline: InventoryPipeline; status: string; count: number }): void;

  incrementRowsSkipped(input: { source: SkippedRowSource; count: number }): void;

  observeRunLatency(input: { pipeline: InventoryPipeline; seconds: number }): void;
}
