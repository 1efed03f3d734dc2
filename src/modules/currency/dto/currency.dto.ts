import { applyDecorators } from '@nestjs/common';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';
import { CURRENCY_CODE_PATTERN } from '../utils/currency-code.util';

export const MAX_BULK_ITEMS = 500;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Trimmed, upper-cased ISO 4217 code. */
export function IsCurrencyCode(): PropertyDecorator {
  return applyDecorators(
    Transform(({ value }: TransformFnParams): unknown =>
      typeof value === 'string' ? value.trim().toUpperCase() : value,
    ),
    IsString(),
    Matches(CURRENCY_CODE_PATTERN, { message: '$property must be a 3-letter ISO 4217 currency code' }),
  );
}

/** Number parsed from the query string; a blank value counts as missing, not zero. */
function IsFiniteAmount(): PropertyDecorator {
  return applyDecorators(
    Type(() => Number),
    Transform(({ value, obj, key }: TransformFnParams): unknown => {
      const raw: unknown = obj[key];
      return typeof raw === 'string' && raw.trim() === '' ? undefined : value;
    }),
    IsNotEmpty({ message: '$property is required' }),
    IsNumber({ allowNaN: false, allowInfinity: false }),
  );
}

export class ConvertQueryDto {
  @ApiProperty({ example: 100 })
  @IsFiniteAmount()
  amount!: number;

  @ApiProperty({ example: 'USD' })
  @IsCurrencyCode()
  from!: string;

  @ApiProperty({ example: 'EUR' })
  @IsCurrencyCode()
  to!: string;
}

export class RateQueryDto {
  @ApiProperty({ example: 'USD' })
  @IsCurrencyCode()
  from!: string;

  @ApiProperty({ example: 'JPY' })
  @IsCurrencyCode()
  to!: string;
}

export class RatesQueryDto {
  @ApiPropertyOptional({ example: 'EUR', description: 'Defaults to the configured base currency' })
  @IsOptional()
  @IsCurrencyCode()
  base?: string;
}

export class HistoricalQueryDto {
  @ApiProperty({ example: '2024-01-02' })
  @IsString()
  @Matches(ISO_DATE_PATTERN, { message: '$property must be a date in YYYY-MM-DD format' })
  date!: string;

  @ApiPropertyOptional({ example: 'EUR', description: 'Defaults to the configured base currency' })
  @IsOptional()
  @IsCurrencyCode()
  base?: string;
}

export class BulkConvertItemDto {
  @ApiProperty({ example: 100 })
  @IsFiniteAmount()
  amount!: number;

  @ApiProperty({ example: 'USD' })
  @IsCurrencyCode()
  from!: string;
}

export class BulkConvertDto {
  @ApiProperty({ type: [BulkConvertItemDto], maxItems: MAX_BULK_ITEMS })
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(MAX_BULK_ITEMS)
  @ValidateNested({ each: true })
  @Type(() => BulkConvertItemDto)
  items!: BulkConvertItemDto[];

  @ApiProperty({ example: 'GBP' })
  @IsCurrencyCode()
  to!: string;
}
