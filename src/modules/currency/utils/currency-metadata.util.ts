import metadata from '../data/currency-metadata.json';

const DEFAULT_DECIMAL_PLACES = 2;

const symbols: Record<string, string> = metadata.symbols;
const decimalPlaces: Record<string, number> = metadata.decimalPlaces;

export function getCurrencySymbol(code: string): string {
  return symbols[code] ?? code;
}

export function getCurrencyDecimalPlaces(code: string): number {
  return decimalPlaces[code] ?? DEFAULT_DECIMAL_PLACES;
}
