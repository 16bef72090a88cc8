export const INVENTORY_METRIC_RUNS_TOTAL = 'inventory_runs_total';
export const INVENTORY_METRIC_ROWS_EMITTED_TOTAL = 'inventory_rows_emitted_total';
export const INVENTORY_METRIC_ROWS_SKIPPED_TOTAL = 'inventory_rows_skipped_total';
export const INVENTORY_METRIC_RUN_LATENCY_SECONDS = 'inventory_run_latency_seconds';

export const INVENTORY_RUN_LATENCY_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30] as const;
