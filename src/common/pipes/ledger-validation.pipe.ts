import { ValidationPipe } from '@nestjs/common';
import { ValidationError } from '../errors/ledger.errors';

// Request-body validation that fails with the ledger's own ValidationError.
export function createLedgerValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    exceptionFactory: (errors) =>
      new ValidationError(
        errors.map((error) => ({ property: error.property, constraints: error.constraints ?? {} })),
      ),
  });
}
