import { IsDateString, IsOptional } from 'class-validator';

export class BrandAnalysisQueryDto {
  @IsOptional()
  @IsDateString()
  asOf?: string;
}
