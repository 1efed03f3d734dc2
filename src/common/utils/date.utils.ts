/**
 * Date utility functions with strict type safety
 */

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Safely extract date string (YYYY-MM-DD, UTC) from a Date.
 * Handles noUncheckedIndexedAccess by providing a fallback.
 */
export function getDateString(date: Date): string {
  const isoString = date.toISOString();
  const datePart = isoString.split('T')[0];
  return datePart ?? isoString.slice(0, 10);
}

/**
 * True for a real calendar date written as YYYY-MM-DD.
 */
export function isIsoDateString(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && getDateString(parsed) === value;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * 24 * 60 * 60 * 1000);
}
