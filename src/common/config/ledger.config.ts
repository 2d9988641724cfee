import { plainToInstance } from 'class-transformer';
import { IsInt, IsNumber, IsOptional, IsPositive, Max, Min, validateSync } from 'class-validator';

export const LEDGER_CONFIG = Symbol('LEDGER_CONFIG');

export interface LedgerConfig {
  port: number;
  maxAccountIdLength: number;
  maxSymbolLength: number;
  maxQuantityPerTransaction: number;
  maxPricePerUnit: number;
  maxCommissionRate: number;          // commission / (quantity × price)
  maxValuationRangeDays: number;
}

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  port: 3000,
  maxAccountIdLength: 100,
  maxSymbolLength: 20,
  maxQuantityPerTransaction: 10_000_000,
  maxPricePerUnit: 1_000_000,
  maxCommissionRate: 0.1,
  maxValuationRangeDays: 3650,
};

// Environment variables as they arrive; every one is optional.
class LedgerEnvironment {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  LEDGER_MAX_ACCOUNT_ID_LENGTH?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  LEDGER_MAX_SYMBOL_LENGTH?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  LEDGER_MAX_QUANTITY?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  LEDGER_MAX_PRICE?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  LEDGER_MAX_COMMISSION_RATE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  LEDGER_MAX_VALUATION_DAYS?: number;
}

/**
 * Builds the ledger config from environment variables, falling back to
 * defaults for anything unset.
 * @throws Error listing every invalid variable
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = plainToInstance(LedgerEnvironment, env, { enableImplicitConversion: true });
  const errors = validateSync(parsed, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid ledger configuration - ${details}`);
  }

  return {
    port: parsed.PORT ?? DEFAULT_LEDGER_CONFIG.port,
    maxAccountIdLength: parsed.LEDGER_MAX_ACCOUNT_ID_LENGTH ?? DEFAULT_LEDGER_CONFIG.maxAccountIdLength,
    maxSymbolLength: parsed.LEDGER_MAX_SYMBOL_LENGTH ?? DEFAULT_LEDGER_CONFIG.maxSymbolLength,
    maxQuantityPerTransaction: parsed.LEDGER_MAX_QUANTITY ?? DEFAULT_LEDGER_CONFIG.maxQuantityPerTransaction,
    maxPricePerUnit: parsed.LEDGER_MAX_PRICE ?? DEFAULT_LEDGER_CONFIG.maxPricePerUnit,
    maxCommissionRate: parsed.LEDGER_MAX_COMMISSION_RATE ?? DEFAULT_LEDGER_CONFIG.maxCommissionRate,
    maxValuationRangeDays: parsed.LEDGER_MAX_VALUATION_DAYS ?? DEFAULT_LEDGER_CONFIG.maxValuationRangeDays,
  };
}
