import {
  BadRequestException,
  ConflictException,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import Decimal from 'decimal.js';
import { FieldViolation } from '../interfaces/http-exception.interface';

// Ledger error taxonomy. Each error is an HTTP exception so the
// controllers can let it propagate straight to the exception filter.

/** Malformed transaction or valuation input. */
export class ValidationError extends BadRequestException {
  constructor(readonly violations: FieldViolation[]) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      message: violations
        .flatMap((violation) => Object.values(violation.constraints))
        .join('; '),
      error: 'ValidationError',
    });
  }

  static forField(property: string, constraint: string, message: string): ValidationError {
    return new ValidationError([{ property, constraints: { [constraint]: message } }]);
  }
}

/** SELL exceeds the open lot quantity; short selling is never implied. */
export class InsufficientLotsError extends UnprocessableEntityException {
  constructor(
    readonly symbol: string,
    readonly requested: Decimal,
    readonly available: Decimal,
  ) {
    super({
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      message: `Insufficient open lots for ${symbol}. Available: ${available.toString()}, Requested: ${requested.toString()}`,
      error: 'InsufficientLotsError',
    });
  }
}

/** Same externalId replayed with a different payload. */
export class DuplicateTransactionError extends ConflictException {
  constructor(
    readonly accountId: string,
    readonly externalId: string,
    readonly conflictingFields: string[],
  ) {
    super({
      statusCode: HttpStatus.CONFLICT,
      message: `Transaction ${externalId} already recorded for ${accountId} with different ${conflictingFields.join(', ')}`,
      error: 'DuplicateTransactionError',
    });
  }
}

export class PositionNotFoundError extends NotFoundException {
  constructor(readonly accountId: string, readonly symbol: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      message: `No position for ${symbol} in account ${accountId}`,
      error: 'PositionNotFoundError',
    });
  }
}

export class PriceNotFoundError extends NotFoundException {
  constructor(readonly symbol: string, readonly date: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      message: `No price for ${symbol} on or before ${date}`,
      error: 'PriceNotFoundError',
    });
  }
}

/** Persistence failure. Propagated as-is; retry policy belongs to the caller. */
export class StorageError extends InternalServerErrorException {
  constructor(message: string, cause?: unknown) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message,
        error: 'StorageError',
      },
      { cause },
    );
  }
}

export type RejectionError = ValidationError | InsufficientLotsError | DuplicateTransactionError;

export function isRejection(error: unknown): error is RejectionError {
  return (
    error instanceof ValidationError ||
    error instanceof InsufficientLotsError ||
    error instanceof DuplicateTransactionError
  );
}
