import { Module } from '@nestjs/common';
import {
  INVENTORY_METRICS_PORT,
  INVENTORY_SOURCE_PORT,
  SPREADSHEET_EXPORTER_PORT,
} from './application/ports/tokens';
import { AnalyzeBrandUseCase } from './application/use-cases/analyze-brand';
import { ComputeRedistributionUseCase } from './application/use-cases/compute-redistribution';
import { ComputeReplenishmentUseCase } from './application/use-cases/compute-replenishment';
import { ExportWorkbookUseCase } from './application/use-cases/export-workbook';
import { BrandAnalysisController } from './controllers/brand-analysis.controller';
import { MetricsController } from './controllers/metrics.controller';
import { RedistributionController } from './controllers/redistribution.controller';
import { ReplenishmentController } from './controllers/replenishment.controller';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import { XlsxSpreadsheetExporter } from './infrastructure/adapters/spreadsheet/xlsx-spreadsheet.exporter';
import { PgInventoryRepository } from './infrastructure/repositories/pg-inventory.repository';
import { pgPoolFactory, PgPoolProvider } from './infrastructure/repositories/pg-pool.provider';

@Module({
  controllers: [
    ReplenishmentController,
    RedistributionController,
    BrandAnalysisController,
    MetricsController,
  ],
  providers: [
    ComputeReplenishmentUseCase,
    ComputeRedistributionUseCase,
    AnalyzeBrandUseCase,
    ExportWorkbookUseCase,
    PrometheusMetricsAdapter,
    XlsxSpreadsheetExporter,
    PgPoolProvider,
    pgPoolFactory,
    PgInventoryRepository,
    {
      provide: INVENTORY_SOURCE_PORT,
      useExisting: PgInventoryRepository,
    },
    {
      provide: INVENTORY_METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
    {
      provide: SPREADSHEET_EXPORTER_PORT,
      useExisting: XlsxSpreadsheetExporter,
    },
  ],
})
export class InventoryModule {}
