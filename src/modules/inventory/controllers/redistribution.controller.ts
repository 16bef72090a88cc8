import { Body, Controller, HttpCode, Post, Req, StreamableFile, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { createLogger } from '../../../common/utils/logger';
import {
  ComputeRedistributionUseCase,
  type RedistributionResponse,
} from '../application/use-cases/compute-redistribution';
import { ExportWorkbookUseCase } from '../application/use-cases/export-workbook';
import { RedistributionExportRequestDto } from '../dto/export-request.dto';
import { RedistributionRequestDto } from '../dto/redistribution-request.dto';
import { toWorkbookFile } from './workbook-response';

@Controller('inventory/redistribution')
@UseGuards(ThrottlerGuard)
export class RedistributionController {
  private readonly logger = createLogger(RedistributionController.name);

  constructor(
    private readonly computeRedistribution: ComputeRedistributionUseCase,
    private readonly exportWorkbook: ExportWorkbookUseCase,
  ) {}

  @Post()
  @HttpCode(200)
  async compute(
    @Req() request: Request,
    @Body() payload: RedistributionRequestDto,
  ): Promise<RedistributionResponse> {
    const requestId = request.requestId ?? randomUUID();
    this.logger.http('redistribution_requested', {
      event: 'redistribution_requested',
      request_id: requestId,
      window_days: payload.windowDays,
      has_origin_store: Boolean(payload.originStore),
    });

    return this.computeRedistribution.execute({ requestId, payload });
  }

  @Post('export')
  @HttpCode(200)
  async export(
    @Req() request: Request,
    @Body() payload: RedistributionExportRequestDto,
  ): Promise<StreamableFile> {
    const requestId = request.requestId ?? randomUUID();
    this.logger.http('redistribution_export_requested', {
      event: 'redistribution_export_requested',
      request_id: requestId,
    });

    return toWorkbookFile(await this.exportWorkbook.exportRedistribution({ requestId, payload }));
  }
}
