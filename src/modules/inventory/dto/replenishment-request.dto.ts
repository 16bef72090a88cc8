import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsDateString,
  IsInt,
  IsOptional,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { NewItemDto } from './new-item.dto';

export class ReplenishmentRequestDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(90)
  replenishmentWindowDays: number = 10;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(180)
  expansionWindowDays: number = 60;

  @IsOptional()
  @IsInt()
  @Min(0)
  expansionMinSales: number = 3;

  @IsOptional()
  @IsBoolean()
  excludeWithoutMovement: boolean = false;

  @IsOptional()
  @IsBoolean()
  includeFixedStores: boolean = true;

  @IsOptional()
  @IsBoolean()
  onlySelling: boolean = false;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(200)
  @ValidateNested({ each: true })
  @Type(() => NewItemDto)
  newItems: NewItemDto[] = [];

  /** Day treated as "today" for the sales windows; defaults to the current date. */
  @IsOptional()
  @IsDateString()
  asOf?: string;
}
