import { Transform } from 'class-transformer';
import { IsDateString, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export class RedistributionRequestDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(180)
  windowDays: number = 30;

  @IsOptional()
  @IsInt()
  @Min(1)
  minDestinationSales: number = 1;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @MaxLength(255)
  originStore?: string;

  @IsOptional()
  @IsDateString()
  asOf?: string;
}
