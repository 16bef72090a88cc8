import { Controller, Get, Param, Query, Req, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { AnalyzeBrandUseCase } from '../application/use-cases/analyze-brand';
import type { BrandAnalysis } from '../domain/brand-analysis';
import { BrandAnalysisQueryDto } from '../dto/brand-analysis-query.dto';

@Controller('inventory/brands')
@UseGuards(ThrottlerGuard)
export class BrandAnalysisController {
  constructor(private readonly analyzeBrand: AnalyzeBrandUseCase) {}

  @Get(':brand/analysis')
  async analyze(
    @Req() request: Request,
    @Param('brand') brand: string,
    @Query() query: BrandAnalysisQueryDto,
  ): Promise<BrandAnalysis> {
    return this.analyzeBrand.execute({
      requestId: request.requestId ?? randomUUID(),
      brand,
      asOf: query.asOf,
    });
  }
}
