import { Body, Controller, HttpCode, Post, Req, StreamableFile, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { createLogger } from '../../../common/utils/logger';
import {
  ComputeReplenishmentUseCase,
  type ReplenishmentResponse,
} from '../application/use-cases/compute-replenishment';
import { ExportWorkbookUseCase } from '../application/use-cases/export-workbook';
import { ReplenishmentExportRequestDto } from '../dto/export-request.dto';
import { ReplenishmentRequestDto } from '../dto/replenishment-request.dto';
import { toWorkbookFile } from './workbook-response';

@Controller('inventory/replenishment')
@UseGuards(ThrottlerGuard)
export class ReplenishmentController {
  private readonly logger = createLogger(ReplenishmentController.name);

  constructor(
    private readonly computeReplenishment: ComputeReplenishmentUseCase,
    private readonly exportWorkbook: ExportWorkbookUseCase,
  ) {}

  @Post()
  @HttpCode(200)
  async compute(
    @Req() request: Request,
    @Body() payload: ReplenishmentRequestDto,
  ): Promise<ReplenishmentResponse> {
    const requestId = request.requestId ?? randomUUID();
    this.logger.http('replenishment_requested', {
      event: 'replenishment_requested',
      request_id: requestId,
      replenishment_window_days: payload.replenishmentWindowDays,
      expansion_window_days: payload.expansionWindowDays,
      new_items: payload.newItems.length,
    });

    return this.computeReplenishment.execute({ requestId, payload });
  }

  @Post('export')
  @HttpCode(200)
  async export(
    @Req() request: Request,
    @Body() payload: ReplenishmentExportRequestDto,
  ): Promise<StreamableFile> {
    const requestId = request.requestId ?? randomUUID();
    this.logger.http('replenishment_export_requested', {
      event: 'replenishment_export_requested',
      request_id: requestId,
      format: payload.format,
    });

    return toWorkbookFile(await this.exportWorkbook.exportReplenishment({ requestId, payload }));
  }
}
