import { Injectable } from '@nestjs/common';
import type {
  InventoryMetricsPort,
  InventoryPipeline,
  InventoryRunOutcome,
  SkippedRowSource,
} from '../../../application/ports/inventory-metrics.port';
import {
  INVENTORY_METRIC_ROWS_EMITTED_TOTAL,
  INVENTORY_METRIC_ROWS_SKIPPED_TOTAL,
  INVENTORY_METRIC_RUN_LATENCY_SECONDS,
  INVENTORY_METRIC_RUNS_TOTAL,
  INVENTORY_RUN_LATENCY_BUCKETS,
} from '../../../../../common/metrics';

@Injectable()
export class PrometheusMetricsAdapter implements InventoryMetricsPort {
  private readonly runs = new Map<string, number>();
  private readonly rowsEmitted = new Map<string, number>();
  private readonly rowsSkipped = new Map<string, number>();

  private readonly latencyBuckets = new Map<string, number>();
  private readonly latencySum = new Map<string, number>();
  private readonly latencyCount = new Map<string, number>();

  incrementRun(input: { pipeline: InventoryPipeline; outcome: InventoryRunOutcome }): void {
    const key = `${input.pipeline}|${input.outcome}`;
    this.runs.set(key, (this.runs.get(key) ?? 0) + 1);
  }

  incrementRowsEmitted(input: { pipeline: InventoryPipeline; status: string; count: number }): void {
    const key = `${input.pipeline}|${sanitizeLabelValue(input.status)}`;
    this.rowsEmitted.set(key, (this.rowsEmitted.get(key) ?? 0) + safeCount(input.count));
  }

  incrementRowsSkipped(input: { source: SkippedRowSource; count: number }): void {
    this.rowsSkipped.set(
      input.source,
      (this.rowsSkipped.get(input.source) ?? 0) + safeCount(input.count),
    );
  }

  observeRunLatency(input: { pipeline: InventoryPipeline; seconds: number }): void {
    const pipeline = input.pipeline;
    const latency = Number.isFinite(input.seconds) && input.seconds >= 0 ? input.seconds : 0;

    this.latencySum.set(pipeline, (this.latencySum.get(pipeline) ?? 0) + latency);
    this.latencyCount.set(pipeline, (this.latencyCount.get(pipeline) ?? 0) + 1);

    for (const bucket of INVENTORY_RUN_LATENCY_BUCKETS) {
      if (latency <= bucket) {
        const key = `${pipeline}|${bucket}`;
        this.latencyBuckets.set(key, (this.latencyBuckets.get(key) ?? 0) + 1);
      }
    }

    const infKey = `${pipeline}|+Inf`;
    this.latencyBuckets.set(infKey, (this.latencyBuckets.get(infKey) ?? 0) + 1);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${INVENTORY_METRIC_RUNS_TOTAL} Total engine runs by pipeline and outcome.`);
    lines.push(`# TYPE ${INVENTORY_METRIC_RUNS_TOTAL} counter`);
    for (const [key, value] of this.runs.entries()) {
      const [pipeline, outcome] = key.split('|');
      lines.push(`${INVENTORY_METRIC_RUNS_TOTAL}{pipeline="${pipeline}",outcome="${outcome}"} ${value}`);
    }

    lines.push(`# HELP ${INVENTORY_METRIC_ROWS_EMITTED_TOTAL} Total result rows emitted by status.`);
    lines.push(`# TYPE ${INVENTORY_METRIC_ROWS_EMITTED_TOTAL} counter`);
    for (const [key, value] of this.rowsEmitted.entries()) {
      const [pipeline, status] = key.split('|');
      lines.push(
        `${INVENTORY_METRIC_ROWS_EMITTED_TOTAL}{pipeline="${pipeline}",status="${status}"} ${value}`,
      );
    }

    lines.push(`# HELP ${INVENTORY_METRIC_ROWS_SKIPPED_TOTAL} Malformed source rows skipped.`);
    lines.push(`# TYPE ${INVENTORY_METRIC_ROWS_SKIPPED_TOTAL} counter`);
    for (const [source, value] of this.rowsSkipped.entries()) {
      lines.push(`${INVENTORY_METRIC_ROWS_SKIPPED_TOTAL}{source="${source}"} ${value}`);
    }

    lines.push(`# HELP ${INVENTORY_METRIC_RUN_LATENCY_SECONDS} Engine run latency in seconds.`);
    lines.push(`# TYPE ${INVENTORY_METRIC_RUN_LATENCY_SECONDS} histogram`);
    for (const [key, value] of this.latencyBuckets.entries()) {
      const [pipeline, bucket] = key.split('|');
      lines.push(
        `${INVENTORY_METRIC_RUN_LATENCY_SECONDS}_bucket{pipeline="${pipeline}",le="${bucket}"} ${value}`,
      );
    }
    for (const [pipeline, value] of this.latencySum.entries()) {
      lines.push(`${INVENTORY_METRIC_RUN_LATENCY_SECONDS}_sum{pipeline="${pipeline}"} ${value}`);
    }
    for (const [pipeline, value] of this.latencyCount.entries()) {
      lines.push(`${INVENTORY_METRIC_RUN_LATENCY_SECONDS}_count{pipeline="${pipeline}"} ${value}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function safeCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\|/g, '_');
}
