import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { NOTHING_TO_EXPORT_MESSAGE } from '../../../../../common/constants/error-messages.constants';
import { createLogger } from '../../../../../common/utils/logger';
import type {
  RedistributionExportRequestDto,
  ReplenishmentExportRequestDto,
} from '../../../dto/export-request.dto';
import type { SpreadsheetExporterPort, SpreadsheetSheet } from '../../ports/spreadsheet-exporter.port';
import { SPREADSHEET_EXPORTER_PORT } from '../../ports/tokens';
import { ComputeRedistributionUseCase } from '../compute-redistribution';
import { ComputeReplenishmentUseCase } from '../compute-replenishment';
import { formatDay } from '../shared';
import {
  applyExportFilters,
  buildAllocationSheets,
  buildRedistributionSheets,
  filterSuggestionsByOrigin,
} from './workbook-layout';

export interface ExportedWorkbook {
  filename: string;
  content: Buffer;
  sheets: number;
}

@Injectable()
export class ExportWorkbookUseCase {
  private readonly logger = createLogger(ExportWorkbookUseCase.name);

  constructor(
    private readonly computeReplenishment: ComputeReplenishmentUseCase,
    private readonly computeRedistribution: ComputeRedistributionUseCase,
    @Inject(SPREADSHEET_EXPORTER_PORT)
    private readonly exporter: SpreadsheetExporterPort,
  ) {}

  async exportReplenishment(input: {
    requestId: string;
    payload: ReplenishmentExportRequestDto;
  }): Promise<ExportedWorkbook> {
    const result = await this.computeReplenishment.execute(input);
    const rows = applyExportFilters(result.rows, input.payload);

    return this.render(
      input.requestId,
      `reabastecimiento_${input.payload.format}_${formatDay(result.asOf)}.xlsx`,
      buildAllocationSheets(rows, input.payload.format),
    );
  }

  async exportRedistribution(input: {
    requestId: string;
    payload: RedistributionExportRequestDto;
  }): Promise<ExportedWorkbook> {
    const result = await this.computeRedistribution.execute(input);
    const suggestions = filterSuggestionsByOrigin(result.suggestions, input.payload.stores);

    return this.render(
      input.requestId,
      `redistribucion_${formatDay(result.asOf)}.xlsx`,
      buildRedistributionSheets(suggestions),
    );
  }

  private render(requestId: string, filename: string, sheets: SpreadsheetSheet[]): ExportedWorkbook {
    if (sheets.length === 0) {
      throw new NotFoundException(NOTHING_TO_EXPORT_MESSAGE);
    }

    const content = this.exporter.renderWorkbook(sheets);
    this.logger.info('workbook_exported', {
      event: 'workbook_exported',
      request_id: requestId,
      filename,
      sheets: sheets.length,
      bytes: content.length,
    });

    return { filename, content, sheets: sheets.length };
  }
}
