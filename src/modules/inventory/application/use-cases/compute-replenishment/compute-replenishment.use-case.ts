import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import {
  assertValidWindows,
  runReplenishment,
  type ReplenishmentParams,
  type ReplenishmentSummary,
} from '../../../domain/replenishment';
import type { AllocationRow } from '../../../domain/warehouse-allocation';
import type { ReplenishmentRequestDto } from '../../../dto/replenishment-request.dto';
import type { InventoryMetricsPort } from '../../ports/inventory-metrics.port';
import type { InventorySourcePort } from '../../ports/inventory-source.port';
import { INVENTORY_METRICS_PORT, INVENTORY_SOURCE_PORT } from '../../ports/tokens';
import { classifyRunError, mapEngineError, resolveAsOf, resolveEngineSettings } from '../shared';

export interface ReplenishmentResponse {
  ok: true;
  asOf: Date;
  rows: AllocationRow[];
  summary: ReplenishmentSummary;
}

@Injectable()
export class ComputeReplenishmentUseCase {
  private readonly logger = createLogger(ComputeReplenishmentUseCase.name);

  constructor(
    @Inject(INVENTORY_SOURCE_PORT)
    private readonly inventorySource: InventorySourcePort,
    @Inject(INVENTORY_METRICS_PORT)
    private readonly metrics: InventoryMetricsPort,
    private readonly configService: ConfigService,
  ) {}

  async execute(input: {
    requestId: string;
    payload: ReplenishmentRequestDto;
  }): Promise<ReplenishmentResponse> {
    const startedAt = Date.now();
    const params: ReplenishmentParams = {
      replenishmentWindowDays: input.payload.replenishmentWindowDays,
      expansionWindowDays: input.payload.expansionWindowDays,
      expansionMinSales: input.payload.expansionMinSales,
      excludeWithoutMovement: input.payload.excludeWithoutMovement,
      includeFixedStores: input.payload.includeFixedStores,
      onlySelling: input.payload.onlySelling,
      newItems: input.payload.newItems,
      asOf: resolveAsOf(input.payload.asOf),
    };

    try {
      assertValidWindows(params);

      const snapshot = await this.inventorySource.loadSnapshot();
      const result = runReplenishment(snapshot, params, resolveEngineSettings(this.configService));

      this.recordSuccess(result.summary, startedAt);
      if (result.summary.failedItems.length > 0) {
        this.logger.warn('replenishment_items_failed', {
          event: 'replenishment_items_failed',
          request_id: input.requestId,
          failed_items: result.summary.failedItems,
        });
      }
      this.logger.engine('replenishment_run_completed', {
        event: 'replenishment_run_completed',
        request_id: input.requestId,
        total_rows: result.summary.totalRows,
        allocated_units: result.summary.allocatedUnits,
        requested_units: result.summary.requestedUnits,
        new_items: params.newItems.length,
      });
      this.logger.performance('replenishment_run', startedAt, { request_id: input.requestId });

      return { ok: true, asOf: params.asOf, ...result };
    } catch (error: unknown) {
      const outcome = classifyRunError(error);
      this.metrics.incrementRun({ pipeline: 'replenishment', outcome });
      this.logger.warn('replenishment_run_failed', {
        event: 'replenishment_run_failed',
        request_id: input.requestId,
        outcome,
        error_name: error instanceof Error ? error.name : 'unknown',
      });
      throw mapEngineError(error);
    }
  }

  private recordSuccess(summary: ReplenishmentSummary, startedAt: number): void {
    this.metrics.incrementRun({ pipeline: 'replenishment', outcome: 'success' });
    for (const [status, count] of Object.entries(summary.byStatus)) {
      if (count > 0) {
        this.metrics.incrementRowsEmitted({ pipeline: 'replenishment', status, count });
      }
    }
    this.metrics.incrementRowsSkipped({ source: 'sales', count: summary.skippedSalesRows });
    this.metrics.incrementRowsSkipped({ source: 'stock', count: summary.skippedStockRows });
    this.metrics.observeRunLatency({
      pipeline: 'replenishment',
      seconds: (Date.now() - startedAt) / 1000,
    });
  }
}
