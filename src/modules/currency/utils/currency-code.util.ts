import { InvalidCurrencyCodeError } from '../../../common/exceptions';

export const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

/**
 * Upper-case and validate an ISO 4217 code.
 *
 * @throws InvalidCurrencyCodeError when the trimmed, upper-cased value is not three letters
 */
export function normalizeCurrencyCode(code: string, field = 'currency'): string {
  const normalized = code.trim().toUpperCase();
  if (!CURRENCY_CODE_PATTERN.test(normalized)) {
    throw new InvalidCurrencyCodeError(code, field);
  }
  return normalized;
}

export function pairKey(base: string, target: string): string {
  return `${base}:${target}`;
}
