/**
 * Typed currency exceptions.
 *
 * Each extends the matching NestJS HTTP exception and carries a
 * `{ code, message }` body, so the global filter can render the code while
 * callers branch on the class.
 *
 * @example
 * ```typescript
 * throw new RateNotFoundError('USD', 'XYZ');
 * throw new PersistenceFailureError('upsertRate', 'USD/EUR', error);
 * ```
 */

import {
  BadRequestException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// ==================== Validation ====================

export class InvalidCurrencyCodeError extends BadRequestException {
  constructor(
    readonly value: string,
    readonly field = 'currency',
  ) {
    super({
      code: 'currency.invalid_code',
      message: `Invalid ${field} code "${value}": expected a 3-letter ISO 4217 code`,
    });
  }
}

export class InvalidRateDateError extends BadRequestException {
  constructor(readonly value: string) {
    super({
      code: 'currency.invalid_date',
      message: `Invalid rate date "${value}": expected YYYY-MM-DD`,
    });
  }
}

// ==================== Lookup ====================

export class RateNotFoundError extends NotFoundException {
  constructor(
    readonly fromCurrency: string,
    readonly toCurrency: string,
    options?: { cause?: unknown },
  ) {
    super(
      {
        code: 'currency.rate_not_found',
        message: `Exchange rate not found for ${fromCurrency}/${toCurrency}`,
      },
      { cause: options?.cause },
    );
  }
}

export class BulkConversionError extends UnprocessableEntityException {
  constructor(
    readonly index: number,
    readonly fromCurrency: string,
    readonly toCurrency: string,
    cause: unknown,
  ) {
    super(
      {
        code: 'currency.bulk_conversion_failed',
        message: `Failed to convert item ${index} (${fromCurrency} to ${toCurrency}): ${describeCause(cause)}`,
      },
      { cause },
    );
  }
}

// ==================== Infrastructure ====================

export class ProviderUnavailableError extends ServiceUnavailableException {
  readonly upstreamStatus?: number;

  constructor(
    readonly operation: string,
    readonly detail: string,
    options: { upstreamStatus?: number; cause?: unknown } = {},
  ) {
    super(
      {
        code: 'currency.provider_unavailable',
        message: `Exchange rate provider failed during ${operation}: ${detail}`,
      },
      { cause: options.cause },
    );
    this.upstreamStatus = options.upstreamStatus;
  }
}

export class PersistenceFailureError extends InternalServerErrorException {
  constructor(
    readonly operation: string,
    readonly subject: string,
    cause: unknown,
  ) {
    super(
      {
        code: 'currency.persistence_failure',
        message: `Rate store ${operation} failed for ${subject}: ${describeCause(cause)}`,
      },
      { cause },
    );
  }
}
