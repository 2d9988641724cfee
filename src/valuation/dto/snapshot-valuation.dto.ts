import { Transform } from 'class-transformer';
import { IsISO8601, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Matches } from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../../common/utils/date.util';
import { toUpperTrimmed } from '../../common/utils/transform.util';

// Value a position at an explicit market price
export class SnapshotValuationDto {
  @IsString()
  @IsNotEmpty()
  accountId!: string;

  @Transform(toUpperTrimmed)
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Matches(CALENDAR_DATE_PATTERN)
  @IsISO8601({ strict: true })
  valuationDate!: string;

  @IsNumber()
  @IsPositive()
  price!: number;

  // defaults to valuationDate
  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN)
  @IsISO8601({ strict: true })
  priceDate?: string;
}

// Value a position at whatever the price feed has for the date
export class SnapshotFromFeedDto {
  @IsString()
  @IsNotEmpty()
  accountId!: string;

  @Transform(toUpperTrimmed)
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Matches(CALENDAR_DATE_PATTERN)
  @IsISO8601({ strict: true })
  valuationDate!: string;
}

// One feed-priced snapshot per calendar day
export class SnapshotRangeDto {
  @IsString()
  @IsNotEmpty()
  accountId!: string;

  @Transform(toUpperTrimmed)
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Matches(CALENDAR_DATE_PATTERN)
  @IsISO8601({ strict: true })
  startDate!: string;

  @Matches(CALENDAR_DATE_PATTERN)
  @IsISO8601({ strict: true })
  endDate!: string;
}
