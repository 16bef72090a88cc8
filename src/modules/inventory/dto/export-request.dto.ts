import { ArrayMaxSize, IsArray, IsBoolean, IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { ALLOCATION_STATUSES, type AllocationStatus } from '../domain/warehouse-allocation';
import { RedistributionRequestDto } from './redistribution-request.dto';
import { ReplenishmentRequestDto } from './replenishment-request.dto';

export const EXPORT_FORMATS = ['general', 'picking'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export class ReplenishmentExportRequestDto extends ReplenishmentRequestDto {
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(500)
  @IsString({ each: true })
  @MaxLength(255, { each: true })
  stores?: string[];

  @IsOptional()
  @IsArray()
  @IsIn(ALLOCATION_STATUSES, { each: true })
  statuses?: AllocationStatus[];

  @IsOptional()
  @IsBoolean()
  excludeZeroQuantity: boolean = false;

  /** Keep only rows the warehouse cannot cover (`COMPRA`). */
  @IsOptional()
  @IsBoolean()
  onlyPurchase: boolean = false;

  @IsOptional()
  @IsIn(EXPORT_FORMATS)
  format: ExportFormat = 'general';
}

export class RedistributionExportRequestDto extends RedistributionRequestDto {
  /** Origin stores to include, one sheet each. */
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(500)
  @IsString({ each: true })
  @MaxLength(255, { each: true })
  stores?: string[];
}
