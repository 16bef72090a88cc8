import { Transform } from 'class-transformer';
import { IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

export class NewItemDto {
  @Transform(trim)
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  itemCode!: string;

  @Transform(trim)
  @IsString()
  @MinLength(1)
  @MaxLength(120)
  brand!: string;

  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(120)
  color?: string;
}
