import { Transform } from 'class-transformer';
import {
  IsEnum,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Min,
} from 'class-validator';
import { TransactionSide } from '../entities/transaction.entity';
import { CALENDAR_DATE_PATTERN } from '../../common/utils/date.util';
import { toUpperTrimmed } from '../../common/utils/transform.util';

// Candidate trade submitted to the ingestion gate.
// externalId is the idempotency key (unique per account).
export class RecordTransactionDto {
  @IsString()
  @IsNotEmpty()
  accountId!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  externalId?: string;

  @Transform(toUpperTrimmed)
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Transform(toUpperTrimmed)
  @IsEnum(TransactionSide, { message: 'side must be one of BUY, SELL' })
  side!: TransactionSide;

  @IsNumber()
  @IsPositive()
  quantity!: number;

  @IsNumber()
  @IsPositive()
  price!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  commission?: number;

  @Matches(CALENDAR_DATE_PATTERN, { message: 'transactionDate must be formatted as YYYY-MM-DD' })
  @IsISO8601({ strict: true }, { message: 'transactionDate must be a valid calendar date' })
  transactionDate!: string;

  @IsOptional()
  @IsString()
  notes?: string;
}
