/**
 * Import Field Parsers
 *
 * Lenient parsers for the values fleet operators type into spreadsheets:
 * Brazilian decimals (`1.234,56`), day-first dates and plain integers.
 *
 * Every parser returns a {@link FieldParseResult} instead of throwing, so a
 * caller can inspect each field of a row and collect all of its errors.
 *
 * @module shared/fuel-import/field-parsers
 * @security SEC-014: INPUT_VALIDATION - Allowlist regexes on cleaned values
 */

import { parse, isValid } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import type { FuelType } from '../types/fuel-import.types';
import { DEFAULT_TIMEZONE } from '../types/config.types';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of parsing one field
 *
 * `empty` is distinct from `invalid` so optional columns can fall back to a
 * default while required ones report a missing value.
 */
export type FieldParseResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'empty' }
  | { status: 'invalid' };

// ============================================================================
// Constants
// ============================================================================

/** Plain signed decimal literal; no exponent, NaN or Infinity */
const DECIMAL_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)$/;

const INTEGER_REGEX = /^[+-]?\d+$/;

/** Currency marks and whitespace are dropped before parsing */
const DECIMAL_NOISE_REGEX = /[R$\s]/g;

/** One comma followed by 1-3 digits reads as a decimal comma */
const DECIMAL_COMMA_REGEX = /^[^,]*,\d{1,3}$/;

/**
 * Accepted date layouts, tried in order (first match wins)
 */
export const IMPORT_DATE_FORMATS = [
  'dd/MM/yyyy HH:mm:ss',
  'dd/MM/yyyy HH:mm',
  'dd/MM/yyyy',
  'dd-MM-yyyy HH:mm:ss',
  'dd-MM-yyyy HH:mm',
  'dd-MM-yyyy',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'yyyy-MM-dd',
] as const;

export const DEFAULT_IMPORT_TIMEZONE = DEFAULT_TIMEZONE;

const FUEL_TYPE_ALIASES: Readonly<Record<string, FuelType>> = {
  GASOLINA: 'GASOLINE',
  GASOLINE: 'GASOLINE',
  GAS: 'GASOLINE',
  G: 'GASOLINE',
  ETANOL: 'ETHANOL',
  ETHANOL: 'ETHANOL',
  ALCOOL: 'ETHANOL',
  E: 'ETHANOL',
  DIESEL: 'DIESEL',
  D: 'DIESEL',
};

const DEFAULT_FUEL_TYPE: FuelType = 'GASOLINE';

// Fixed reference keeps date-fns from borrowing fields off the current clock
const PARSE_REFERENCE_DATE = new Date(2000, 0, 1, 0, 0, 0, 0);

/** `yyyy` also matches 1-3 digits; years must be written in full */
const MIN_YEAR = 1000;

// ============================================================================
// Decimal
// ============================================================================

/**
 * Parse a decimal written in Brazilian or international notation
 *
 * - Both `,` and `.` present: whichever appears last is the decimal separator
 * - Only `,`: a single comma followed by 1-3 digits is the decimal separator;
 *   otherwise commas are thousands separators (`1,234,567`)
 * - `R$` and whitespace are ignored
 *
 * @example
 * ```typescript
 * parseBrazilianDecimal('1.234,56'); // { status: 'ok', value: 1234.56 }
 * parseBrazilianDecimal('R$ 45,5');  // { status: 'ok', value: 45.5 }
 * parseBrazilianDecimal('abc');      // { status: 'invalid' }
 * ```
 */
export function parseBrazilianDecimal(input: string | null | undefined): FieldParseResult<number> {
  if (input === null || input === undefined) {
    return { status: 'empty' };
  }

  let value = input.replace(DECIMAL_NOISE_REGEX, '');
  if (value === '') {
    return { status: 'empty' };
  }

  const lastComma = value.lastIndexOf(',');
  const lastDot = value.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    value =
      lastComma > lastDot
        ? value.replace(/\./g, '').replace(',', '.')
        : value.replace(/,/g, '');
  } else if (lastComma !== -1) {
    value = DECIMAL_COMMA_REGEX.test(value) ? value.replace(',', '.') : value.replace(/,/g, '');
  }

  if (!DECIMAL_REGEX.test(value)) {
    return { status: 'invalid' };
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? { status: 'ok', value: parsed } : { status: 'invalid' };
}

// ============================================================================
// Integer
// ============================================================================

/**
 * Parse an integer, ignoring whitespace and `.` thousands separators
 *
 * `125.430` reads as 125430. Anything that still is not a base-10 integer
 * after cleaning (including `12,5`) is invalid.
 */
export function parseImportInteger(input: string | null | undefined): FieldParseResult<number> {
  if (input === null || input === undefined) {
    return { status: 'empty' };
  }

  const value = input.replace(/[\s.]/g, '');
  if (value === '') {
    return { status: 'empty' };
  }
  if (!INTEGER_REGEX.test(value)) {
    return { status: 'invalid' };
  }

  const parsed = parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? { status: 'ok', value: parsed } : { status: 'invalid' };
}

// ============================================================================
// Date
// ============================================================================

/**
 * Parse a wall-clock date/time and resolve it in `timeZone`
 *
 * Calendar-invalid values (`31/02/2025`, `25:00`) are rejected by date-fns.
 *
 * @returns The UTC instant for that wall-clock time in `timeZone`
 */
export function parseImportDate(
  input: string | null | undefined,
  timeZone: string = DEFAULT_IMPORT_TIMEZONE
): FieldParseResult<Date> {
  const value = input?.trim() ?? '';
  if (value === '') {
    return { status: 'empty' };
  }

  for (const format of IMPORT_DATE_FORMATS) {
    const wallClock = parse(value, format, PARSE_REFERENCE_DATE);
    if (isValid(wallClock) && wallClock.getFullYear() >= MIN_YEAR) {
      return { status: 'ok', value: fromZonedTime(wallClock, timeZone) };
    }
  }

  return { status: 'invalid' };
}

// ============================================================================
// Fuel Type
// ============================================================================

/**
 * Map a fuel label to a {@link FuelType}. Unknown or empty labels fall back to
 * GASOLINE; this parser never fails.
 */
export function parseFuelType(input: string | null | undefined): FuelType {
  const key = input?.trim().toUpperCase() ?? '';
  return FUEL_TYPE_ALIASES[key] ?? DEFAULT_FUEL_TYPE;
}

// ============================================================================
// Rounding
// ============================================================================

/**
 * Round half away from zero to `places` decimals
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  const rounded = Math.round(Math.abs(value) * factor) / factor;
  return value < 0 ? -rounded : rounded;
}

/**
 * Multiply two decimals and round the exact product to `places` decimals
 *
 * Each operand is first taken as a whole number of its own smallest unit
 * (`aPlaces`, `bPlaces`), so the product is exact. Halfway products round
 * toward zero: 45.5 × 5.89 = 267.995 gives 267.99, 10 × 1.0999 = 10.999
 * gives 11.
 */
export function multiplyHalfDown(
  a: number,
  aPlaces: number,
  b: number,
  bPlaces: number,
  places: number
): number {
  const dropped = aPlaces + bPlaces - places;
  if (dropped < 0) {
    throw new RangeError('Result cannot have more decimals than both operands together');
  }

  const product = BigInt(Math.round(a * 10 ** aPlaces)) * BigInt(Math.round(b * 10 ** bPlaces));
  const negative = product < 0n;
  const magnitude = negative ? -product : product;
  const divisor = 10n ** BigInt(dropped);

  let steps = magnitude / divisor;
  if ((magnitude % divisor) * 2n > divisor) {
    steps += 1n;
  }

  const value = Number(steps) / 10 ** places;
  return negative ? -value : value;
}
