import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { INVALID_BRAND_MESSAGE } from '../../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../../common/utils/logger';
import { analyzeBrand, type BrandAnalysis } from '../../../domain/brand-analysis';
import type { InventoryMetricsPort } from '../../ports/inventory-metrics.port';
import type { InventorySourcePort } from '../../ports/inventory-source.port';
import { INVENTORY_METRICS_PORT, INVENTORY_SOURCE_PORT } from '../../ports/tokens';
import { classifyRunError, mapEngineError, resolveAsOf, resolveEngineSettings } from '../shared';

const MAX_BRAND_LENGTH = 120;

@Injectable()
export class AnalyzeBrandUseCase {
  private readonly logger = createLogger(AnalyzeBrandUseCase.name);

  constructor(
    @Inject(INVENTORY_SOURCE_PORT)
    private readonly inventorySource: InventorySourcePort,
    @Inject(INVENTORY_METRICS_PORT)
    private readonly metrics: InventoryMetricsPort,
    private readonly configService: ConfigService,
  ) {}

  async execute(input: { requestId: string; brand: string; asOf?: string }): Promise<BrandAnalysis> {
    const brand = input.brand.trim();
    if (brand.length === 0 || brand.length > MAX_BRAND_LENGTH) {
      throw new BadRequestException(INVALID_BRAND_MESSAGE);
    }

    const startedAt = Date.now();
    try {
      const snapshot = await this.inventorySource.loadSnapshot();
      const analysis = analyzeBrand(snapshot, brand, {
        asOf: resolveAsOf(input.asOf),
        ...resolveEngineSettings(this.configService),
      });

      this.metrics.incrementRun({ pipeline: 'brand_analysis', outcome: 'success' });
      this.metrics.observeRunLatency({
        pipeline: 'brand_analysis',
        seconds: (Date.now() - startedAt) / 1000,
      });
      this.logger.engine('brand_analysis_completed', {
        event: 'brand_analysis_completed',
        request_id: input.requestId,
        brand,
        total_items: analysis.summary.totalItems,
        redistribution_opportunities: analysis.summary.redistributionOpportunities,
      });

      return analysis;
    } catch (error: unknown) {
      this.metrics.incrementRun({ pipeline: 'brand_analysis', outcome: classifyRunError(error) });
      throw mapEngineError(error);
    }
  }
}
