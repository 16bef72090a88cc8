import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import {
  runRedistribution,
  type RedistributionSuggestion,
  type RedistributionSummary,
} from '../../../domain/redistribution';
import type { RedistributionRequestDto } from '../../../dto/redistribution-request.dto';
import type { InventoryMetricsPort } from '../../ports/inventory-metrics.port';
import type { InventorySourcePort } from '../../ports/inventory-source.port';
import { INVENTORY_METRICS_PORT, INVENTORY_SOURCE_PORT } from '../../ports/tokens';
import { classifyRunError, mapEngineError, resolveAsOf, resolveEngineSettings } from '../shared';

export interface RedistributionResponse {
  ok: true;
  asOf: Date;
  suggestions: RedistributionSuggestion[];
  summary: RedistributionSummary;
}

@Injectable()
export class ComputeRedistributionUseCase {
  private readonly logger = createLogger(ComputeRedistributionUseCase.name);

  constructor(
    @Inject(INVENTORY_SOURCE_PORT)
    private readonly inventorySource: InventorySourcePort,
    @Inject(INVENTORY_METRICS_PORT)
    private readonly metrics: InventoryMetricsPort,
    private readonly configService: ConfigService,
  ) {}

  async execute(input: {
    requestId: string;
    payload: RedistributionRequestDto;
  }): Promise<RedistributionResponse> {
    const startedAt = Date.now();
    const asOf = resolveAsOf(input.payload.asOf);

    try {
      const snapshot = await this.inventorySource.loadSnapshot();
      const result = runRedistribution(
        snapshot,
        {
          windowDays: input.payload.windowDays,
          minDestinationSales: input.payload.minDestinationSales,
          originStore: input.payload.originStore ?? null,
          asOf,
        },
        resolveEngineSettings(this.configService),
      );

      this.metrics.incrementRun({ pipeline: 'redistribution', outcome: 'success' });
      this.metrics.incrementRowsEmitted({
        pipeline: 'redistribution',
        status: 'TRASLADO',
        count: result.summary.totalSuggestions,
      });
      this.metrics.incrementRowsSkipped({ source: 'sales', count: result.summary.skippedSalesRows });
      this.metrics.incrementRowsSkipped({ source: 'stock', count: result.summary.skippedStockRows });
      this.metrics.observeRunLatency({
        pipeline: 'redistribution',
        seconds: (Date.now() - startedAt) / 1000,
      });

      this.logger.engine('redistribution_run_completed', {
        event: 'redistribution_run_completed',
        request_id: input.requestId,
        origin_store: input.payload.originStore ?? null,
        total_suggestions: result.summary.totalSuggestions,
        suggested_units: result.summary.suggestedUnits,
      });

      return { ok: true, asOf, ...result };
    } catch (error: unknown) {
      const outcome = classifyRunError(error);
      this.metrics.incrementRun({ pipeline: 'redistribution', outcome });
      this.logger.warn('redistribution_run_failed', {
        event: 'redistribution_run_failed',
        request_id: input.requestId,
        outcome,
        error_name: error instanceof Error ? error.name : 'unknown',
      });
      throw mapEngineError(error);
    }
  }
}
