import { Transform } from 'class-transformer';
import { IsISO8601, IsNotEmpty, IsNumber, IsObject, IsPositive, IsString, Matches } from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../../common/utils/date.util';
import { toUpperTrimmed } from '../../common/utils/transform.util';

// Close price of one symbol on one day
export class RecordCloseDto {
  @Transform(toUpperTrimmed)
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Matches(CALENDAR_DATE_PATTERN)
  @IsISO8601({ strict: true })
  date!: string;

  @IsNumber()
  @IsPositive()
  price!: number;
}

// Closes for several symbols on the same day
export class BulkRecordClosesDto {
  @Matches(CALENDAR_DATE_PATTERN)
  @IsISO8601({ strict: true })
  date!: string;

  @IsObject()
  prices!: Record<string, number>;  // { "AAPL": 190.5, "MSFT": 410 }
}
